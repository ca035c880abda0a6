/**
 * =============================================================================
 * BATCH SERVICE - Load → Process → Write
 * =============================================================================
 *
 * Control flow:
 *   Input Loader → (for each row) Row Processor → accumulate → Output Writer
 *
 * Invariant: every input row yields exactly one output row, in input order.
 * Rows failing validation are skipped (no API calls) but still written,
 * with N/A in every computed column. Rows keep their sheet positions.
 *
 * =============================================================================
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../shared/services/logger.service';
import { GoogleMapsClient } from '../../shared/services/google-maps.service';
import { SleepFn, createRetryPolicy } from '../../shared/resilience/retry';
import { RunSettings } from '../../config/environment';
import {
  DistanceLookupService,
  FlightDistanceEstimator,
  RowProcessor,
  describeRoute,
} from '../distance';
import {
  SheetCell,
  SpreadsheetService,
  outputHeaders,
  parseTripRow,
  spreadsheetService,
  toOutputRow,
  toSkippedOutputRow,
} from '../spreadsheet';
import { FallbackRecord, RunSummary, SkippedRowRecord } from './batch.schema';

export interface BatchRunnerDeps {
  maps: Pick<GoogleMapsClient, 'distanceMatrix' | 'geocode' | 'getMetrics'>;
  spreadsheet?: Pick<SpreadsheetService, 'readTable' | 'writeTable'>;
  /** Used for backoff and inter-call delays; injected in tests */
  sleep?: SleepFn;
}

export class BatchRunner {
  private readonly rowProcessor: RowProcessor;
  private readonly spreadsheet: Pick<SpreadsheetService, 'readTable' | 'writeTable'>;

  constructor(
    private readonly settings: RunSettings,
    private readonly deps: BatchRunnerDeps
  ) {
    const retryPolicy = createRetryPolicy(settings.retry);

    this.spreadsheet = deps.spreadsheet ?? spreadsheetService;
    this.rowProcessor = new RowProcessor({
      distanceLookup: new DistanceLookupService({
        maps: deps.maps,
        retryPolicy,
        sleep: deps.sleep,
      }),
      flightEstimator: new FlightDistanceEstimator({
        maps: deps.maps,
        retryPolicy,
        cruiseSpeedKmh: settings.flightCruiseSpeedKmh,
        sleep: deps.sleep,
      }),
      requestDelayMs: settings.requestDelayMs,
      sleep: deps.sleep,
    });
  }

  async run(): Promise<RunSummary> {
    const runId = uuidv4();
    const startedAt = Date.now();
    const { inputPath, outputPath } = this.settings;

    logger.info(`🚀 Distance run started`, { runId, inputPath, outputPath });

    const table = await this.spreadsheet.readTable(inputPath);
    const total = table.rows.length;

    const outputRows: Array<Record<string, SheetCell>> = [];
    const fallbacks: FallbackRecord[] = [];
    const skipped: SkippedRowRecord[] = [];
    let completeRows = 0;
    let partialRows = 0;

    for (const row of table.rows) {
      const parsed = parseTripRow(row, this.settings.defaultOriginCity);

      if (!parsed.ok) {
        logger.warn(`Skipping row ${row.rowNumber}/${total}: ${parsed.error.message}`, { runId });
        skipped.push({ rowNumber: row.rowNumber, reason: parsed.error.message });
        outputRows.push(toSkippedOutputRow(row));
        continue;
      }

      const { request, unknownModeTokens } = parsed;
      if (unknownModeTokens.length > 0) {
        logger.warn(`Row ${row.rowNumber}: ignoring unknown transport method(s) ${unknownModeTokens.join(', ')}`, { runId });
      }
      if (request.originDefaulted) {
        logger.info(`Row ${row.rowNumber}: origin blank, using default "${this.settings.defaultOriginCity}"`, { runId });
      }

      const processed = await this.rowProcessor.process(request);

      for (const result of processed.results) {
        if (result.status !== 'ok') {
          fallbacks.push({
            rowNumber: row.rowNumber,
            mode: result.mode,
            status: result.status,
            reason: result.reason ?? 'unknown',
          });
        }
      }

      if (processed.outcome === 'complete') {
        completeRows++;
      } else {
        partialRows++;
      }

      outputRows.push(toOutputRow(row, processed));
      logger.info(`Processed row ${row.rowNumber}/${total}: ${describeRoute(request)}`, { runId });
    }

    // In place: the input workbook's other worksheets are kept
    const inPlace = path.resolve(inputPath) === path.resolve(outputPath);
    await this.spreadsheet.writeTable(outputPath, outputHeaders(table.headers), outputRows, {
      rowNumbers: table.rows.map(row => row.rowNumber),
      baseWorkbookPath: inPlace ? inputPath : undefined,
    });

    const summary: RunSummary = {
      runId,
      inputPath,
      outputPath,
      totalRows: total,
      completeRows,
      partialRows,
      skippedRows: skipped.length,
      fallbacks,
      skipped,
      apiCalls: this.deps.maps.getMetrics().apiCalls.total,
      durationMs: Date.now() - startedAt,
    };

    logger.info(`✅ Distance run finished`, {
      runId,
      complete: completeRows,
      partial: partialRows,
      skipped: skipped.length,
      apiCalls: summary.apiCalls,
    });

    return summary;
  }
}

/**
 * Wire a runner against the real Google Maps client
 */
export function createBatchRunner(settings: RunSettings, deps: Partial<BatchRunnerDeps> = {}): BatchRunner {
  const maps = deps.maps ?? new GoogleMapsClient({
    apiKey: settings.apiKey,
    timeoutMs: settings.requestTimeoutMs,
  });
  return new BatchRunner(settings, { ...deps, maps });
}
