#!/usr/bin/env node
/**
 * =============================================================================
 * CITY DISTANCE CALCULATOR - COMMAND LINE ENTRY
 * =============================================================================
 *
 * Reads city pairs from a spreadsheet, looks up driving / transit / walking /
 * bicycling distance and duration through the Google Maps Distance Matrix,
 * estimates the flight (great-circle) distance, and writes the augmented
 * table back out.
 *
 * USAGE:
 *   city-distances [input.xlsx] [--output distances_output.xlsx] [--in-place]
 *                  [--api-key KEY] [--default-origin "New York, NY, USA"]
 *
 * EXIT CODES:
 *   0  run completed (rows may still contain N/A cells)
 *   1  setup failure (missing key / input file, malformed sheet, bad config)
 *   2  usage error
 * =============================================================================
 */

import { parseArgs } from 'util';
import { logger, logError } from './shared/services/logger.service';
import {
  RunSettingsOverrides,
  buildRunSettings,
  validateRunSettings,
} from './config/environment';
import { EXIT_CODE, getErrorCategory, isOperationalError } from './core';
import { BatchRunnerDeps, createBatchRunner, formatSummary } from './modules/batch';
import { sheetFormat } from './modules/spreadsheet';

export const USAGE = [
  'Usage: city-distances [input] [options]',
  '',
  'Options:',
  '  -i, --input <path>           input spreadsheet (.xlsx or .csv)',
  '  -o, --output <path>          output spreadsheet (default: distances_output.xlsx)',
  '      --in-place               write results back into the input file',
  '  -k, --api-key <key>          Google Maps API key (default: GOOGLE_MAPS_API_KEY)',
  '      --default-origin <city>  origin used when Starting_City is blank',
  '  -h, --help                   show this help',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  help: boolean;
  overrides: RunSettingsOverrides;
}

const CLI_OPTIONS = {
  input: { type: 'string', short: 'i' },
  output: { type: 'string', short: 'o' },
  'in-place': { type: 'boolean', default: false },
  'api-key': { type: 'string', short: 'k' },
  'default-origin': { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function readArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: CLI_OPTIONS });
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node/script entries) into run overrides
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgv(argv);

  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one input path, got ${positionals.length}`);
  }
  if (values.input !== undefined && positionals.length === 1) {
    throw new UsageError('Give the input path either positionally or with --input, not both');
  }
  if (values['in-place'] && values.output !== undefined) {
    throw new UsageError('--in-place and --output cannot be combined');
  }

  const inputPath = values.input ?? positionals[0];
  const overrides: RunSettingsOverrides = {};

  if (inputPath !== undefined) overrides.inputPath = inputPath;
  if (values.output !== undefined) overrides.outputPath = values.output;
  if (values['api-key'] !== undefined) overrides.apiKey = values['api-key'];
  if (values['default-origin'] !== undefined) overrides.defaultOriginCity = values['default-origin'];

  if (values['in-place']) {
    overrides.outputPath = buildRunSettings(overrides).inputPath;
  }

  return { help: values.help === true, overrides };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function run(argv: string[], deps: Partial<BatchRunnerDeps> = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return EXIT_CODE.USAGE;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_CODE.SUCCESS;
  }

  try {
    const settings = buildRunSettings(options.overrides);
    validateRunSettings(settings);
    sheetFormat(settings.inputPath);
    sheetFormat(settings.outputPath);

    const summary = await createBatchRunner(settings, deps).run();
    console.log(formatSummary(summary));
    return EXIT_CODE.SUCCESS;
  } catch (error: unknown) {
    if (isOperationalError(error)) {
      logger.error(`❌ ${error.message}`, {
        code: error.code,
        category: getErrorCategory(error.code),
      });
    } else {
      logError('❌ Unexpected failure', error);
    }
    return EXIT_CODE.SETUP_FAILURE;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError('❌ Fatal error', error);
      process.exitCode = EXIT_CODE.SETUP_FAILURE;
    });
}
