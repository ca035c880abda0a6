/**
 * Writes a small demo input sheet covering short/long, domestic and
 * international routes, a blank origin and a few Transport_Methods selections.
 *
 * Run: npm run sample -- [output path]   (default: input_locations.xlsx)
 */

import { INPUT_COLUMNS } from '../src/core/constants';
import { logger } from '../src/shared/services/logger.service';
import { SheetCell } from '../src/modules/spreadsheet/spreadsheet.schema';
import { spreadsheetService } from '../src/modules/spreadsheet/spreadsheet.service';

interface SampleRoute {
  origin: string;
  destination: string;
  methods?: string;
  note: string;
}

const SAMPLE_ROUTES: SampleRoute[] = [
  { origin: 'New York, NY, USA', destination: 'Boston, MA, USA', note: 'short domestic, every mode available' },
  { origin: 'London, UK', destination: 'Paris, France', methods: 'transit, flight', note: 'international, rail or air' },
  { origin: 'Tokyo, Japan', destination: 'Kyoto, Japan', methods: 'car, train', note: 'domestic outside the US' },
  { origin: 'Paris, France', destination: 'Amsterdam, Netherlands', note: 'short international' },
  { origin: '', destination: 'Philadelphia, PA, USA', methods: 'driving', note: 'blank origin uses the default city' },
  { origin: 'Sydney, Australia', destination: 'Melbourne, Australia', methods: 'all', note: 'long domestic' },
  { origin: 'Toronto, Canada', destination: 'Montreal, Canada', methods: 'bus; bike', note: 'good public transport' },
  { origin: 'Honolulu, HI, USA', destination: 'Los Angeles, CA, USA', note: 'overseas, only flight resolves' },
];

async function main(): Promise<void> {
  const outputPath = process.argv[2] ?? 'input_locations.xlsx';
  const headers = [
    INPUT_COLUMNS.ORIGIN_CITY,
    INPUT_COLUMNS.DESTINATION_CITY,
    INPUT_COLUMNS.TRANSPORT_METHODS,
    'Notes',
  ];

  const rows: Array<Record<string, SheetCell>> = SAMPLE_ROUTES.map(route => ({
    [INPUT_COLUMNS.ORIGIN_CITY]: route.origin || null,
    [INPUT_COLUMNS.DESTINATION_CITY]: route.destination,
    [INPUT_COLUMNS.TRANSPORT_METHODS]: route.methods ?? null,
    Notes: route.note,
  }));

  await spreadsheetService.writeTable(outputPath, headers, rows);
  logger.info(`Sample input with ${rows.length} routes written to ${outputPath}`);
}

main().catch((error: unknown) => {
  logger.error('Failed to write sample input', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
