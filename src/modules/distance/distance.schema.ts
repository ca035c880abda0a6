/**
 * =============================================================================
 * DISTANCE MODULE - TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - TripRequest: one spreadsheet row, normalized (origin defaulted, modes resolved)
 * - ModeResult: outcome of one (row, mode) lookup, frozen once built
 * - ProcessedRow: every ModeResult for a row, plus the row outcome
 *
 * EXAMPLE:
 * Row 2: "" → "Boston, MA, USA", modes [driving, flight]
 *
 *   TripRequest  { origin: New York, NY, USA (defaulted), destination: Boston, MA, USA }
 *   ModeResult   { mode: driving, distanceKm: 346.02, durationHrs: 3.71, status: ok }
 *   ModeResult   { mode: flight,  distanceKm: 306.11, durationHrs: 0.38, status: ok }
 * =============================================================================
 */

import { NOT_AVAILABLE, TransportMode } from '../../core/constants';

export interface LocationDescriptor {
  city: string;
  state?: string;
  country?: string;
}

export interface TripRequest {
  /** 1-based data row index (header excluded) */
  rowNumber: number;
  origin: LocationDescriptor;
  destination: LocationDescriptor;
  requestedModes: TransportMode[];
  originDefaulted: boolean;
}

export type ModeStatus = 'ok' | 'unavailable' | 'error';

export interface ModeResult {
  readonly mode: TransportMode;
  readonly distanceKm: number | null;
  readonly durationHrs: number | null;
  readonly status: ModeStatus;
  readonly reason?: string;
}

export type RowOutcome = 'complete' | 'partial' | 'skipped';

export interface ProcessedRow {
  request: TripRequest;
  results: ModeResult[];
  outcome: RowOutcome;
}

/**
 * Render a descriptor as the free-text location sent to the API
 */
export function formatLocation(location: LocationDescriptor): string {
  return [location.city, location.state, location.country]
    .map(part => (part ?? '').trim())
    .filter(part => part.length > 0)
    .join(', ');
}

export function okResult(mode: TransportMode, distanceKm: number, durationHrs: number): ModeResult {
  return Object.freeze({
    mode,
    distanceKm: Math.max(0, distanceKm),
    durationHrs: Math.max(0, durationHrs),
    status: 'ok' as const,
  });
}

export function fallbackResult(
  mode: TransportMode,
  status: Exclude<ModeStatus, 'ok'>,
  reason: string
): ModeResult {
  return Object.freeze({ mode, distanceKm: null, durationHrs: null, status, reason });
}

/**
 * Cell value for a result field (sentinel when the lookup fell back)
 */
export function toCellValue(value: number | null): number | typeof NOT_AVAILABLE {
  return value === null ? NOT_AVAILABLE : value;
}
