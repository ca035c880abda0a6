/**
 * =============================================================================
 * SPREADSHEET MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Input sheet layout (header row + one row per trip):
 *
 *   Starting_City | Destination | [Starting_State] | [Starting_Country]
 *   [Destination_State] | [Destination_Country] | [Transport_Methods]
 *
 * Output = every input column + a distance / duration column per mode.
 * =============================================================================
 */

import { z } from 'zod';
import {
  ALL_MODES_TOKEN,
  INPUT_COLUMNS,
  MODE_ALIASES,
  NOT_AVAILABLE,
  OUTPUT_COLUMNS,
  TRANSPORT_MODE_ORDER,
  TransportMode,
  distanceColumn,
  durationColumn,
} from '../../core/constants';
import { RowValidationError } from '../../core/errors/AppError';
import { ProcessedRow, TripRequest, formatLocation, toCellValue } from '../distance/distance.schema';

// =============================================================================
// TABLE TYPES
// =============================================================================

export type SheetCell = string | number | boolean | Date | null;

export interface SheetRow {
  /** 1-based data row index (header excluded) */
  rowNumber: number;
  cells: Record<string, SheetCell>;
}

export interface SheetTable {
  headers: string[];
  rows: SheetRow[];
}

// =============================================================================
// ROW VALIDATION
// =============================================================================

const MAX_LOCATION_LENGTH = 200;

const optionalText = z
  .string()
  .trim()
  .max(MAX_LOCATION_LENGTH, `must be at most ${MAX_LOCATION_LENGTH} characters`)
  .default('');

export const tripRowSchema = z.object({
  [INPUT_COLUMNS.ORIGIN_CITY]: optionalText,
  [INPUT_COLUMNS.ORIGIN_STATE]: optionalText,
  [INPUT_COLUMNS.ORIGIN_COUNTRY]: optionalText,
  [INPUT_COLUMNS.DESTINATION_CITY]: z
    .string({ required_error: 'Destination is required' })
    .trim()
    .min(1, 'Destination is required')
    .max(MAX_LOCATION_LENGTH, `must be at most ${MAX_LOCATION_LENGTH} characters`),
  [INPUT_COLUMNS.DESTINATION_STATE]: optionalText,
  [INPUT_COLUMNS.DESTINATION_COUNTRY]: optionalText,
  [INPUT_COLUMNS.TRANSPORT_METHODS]: z.string().trim().default(''),
});

export interface TransportMethodSelection {
  modes: TransportMode[];
  unknownTokens: string[];
}

/**
 * Parse the Transport_Methods cell. Blank, "all" or only-unknown tokens
 * select every mode.
 */
export function parseTransportMethods(raw: string): TransportMethodSelection {
  const tokens = raw
    .split(/[,;|]/)
    .map(token => token.trim().toLowerCase().replace(/\s+/g, ' '))
    .filter(token => token.length > 0);

  const selected = new Set<TransportMode>();
  const unknownTokens: string[] = [];
  let all = false;

  for (const token of tokens) {
    if (token === ALL_MODES_TOKEN) {
      all = true;
      continue;
    }
    if (Object.hasOwn(MODE_ALIASES, token)) {
      selected.add(MODE_ALIASES[token]);
    } else {
      unknownTokens.push(token);
    }
  }

  const modes = all || selected.size === 0
    ? [...TRANSPORT_MODE_ORDER]
    : TRANSPORT_MODE_ORDER.filter(mode => selected.has(mode));

  return { modes, unknownTokens };
}

export type ParsedTripRow =
  | { ok: true; request: TripRequest; unknownModeTokens: string[] }
  | { ok: false; error: RowValidationError };

/**
 * Validate one sheet row and normalize it into a TripRequest.
 * A blank origin becomes `defaultOriginCity`.
 */
export function parseTripRow(row: SheetRow, defaultOriginCity: string): ParsedTripRow {
  const result = tripRowSchema.safeParse(textCells(row));
  if (!result.success) {
    return { ok: false, error: RowValidationError.fromZodError(row.rowNumber, result.error) };
  }

  const data = result.data;
  const originCity = data[INPUT_COLUMNS.ORIGIN_CITY];
  const originDefaulted = originCity === '';
  const selection = parseTransportMethods(data[INPUT_COLUMNS.TRANSPORT_METHODS]);

  const request: TripRequest = {
    rowNumber: row.rowNumber,
    // The default city is already a complete location, so structured parts are not appended
    origin: originDefaulted
      ? { city: defaultOriginCity }
      : {
          city: originCity,
          state: data[INPUT_COLUMNS.ORIGIN_STATE] || undefined,
          country: data[INPUT_COLUMNS.ORIGIN_COUNTRY] || undefined,
        },
    destination: {
      city: data[INPUT_COLUMNS.DESTINATION_CITY],
      state: data[INPUT_COLUMNS.DESTINATION_STATE] || undefined,
      country: data[INPUT_COLUMNS.DESTINATION_COUNTRY] || undefined,
    },
    requestedModes: selection.modes,
    originDefaulted,
  };

  return { ok: true, request, unknownModeTokens: selection.unknownTokens };
}

/**
 * Cells as trimmed strings; empty cells are left out so schema defaults apply
 */
function textCells(row: SheetRow): Record<string, string> {
  const text: Record<string, string> = {};
  for (const [column, value] of Object.entries(row.cells)) {
    const rendered = cellToText(value);
    if (rendered !== '') {
      text[column] = rendered;
    }
  }
  return text;
}

export function cellToText(value: SheetCell): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

// =============================================================================
// OUTPUT ASSEMBLY
// =============================================================================

/**
 * Input headers followed by any computed column not already present
 */
export function outputHeaders(inputHeaders: readonly string[]): string[] {
  const existing = new Set(inputHeaders);
  return [...inputHeaders, ...OUTPUT_COLUMNS.filter(column => !existing.has(column))];
}

/**
 * Input cells with computed columns set. Modes that were not requested
 * stay blank; failed modes get the N/A sentinel.
 */
export function toOutputRow(row: SheetRow, processed: ProcessedRow): Record<string, SheetCell> {
  const cells: Record<string, SheetCell> = { ...row.cells };
  for (const column of OUTPUT_COLUMNS) {
    cells[column] = null;
  }

  // Effective origin (default city when the cell was blank)
  if (processed.request.originDefaulted) {
    cells[INPUT_COLUMNS.ORIGIN_CITY] = formatLocation(processed.request.origin);
  }

  for (const result of processed.results) {
    cells[distanceColumn(result.mode)] = toCellValue(result.distanceKm);
    cells[durationColumn(result.mode)] = toCellValue(result.durationHrs);
  }

  return cells;
}

/**
 * Row that failed validation: input cells kept, every computed column N/A
 */
export function toSkippedOutputRow(row: SheetRow): Record<string, SheetCell> {
  const cells: Record<string, SheetCell> = { ...row.cells };
  for (const column of OUTPUT_COLUMNS) {
    cells[column] = NOT_AVAILABLE;
  }
  return cells;
}
