/**
 * =============================================================================
 * ROW PROCESSOR - Per-row Orchestration
 * =============================================================================
 *
 * Sequences the per-mode lookups for one TripRequest:
 *
 *   driving → transit → walking → bicycling   (Distance Lookup, retried)
 *   flight                                    (Flight Estimator)
 *
 * Only the row's requested modes are looked up, one at a time, with
 * `requestDelayMs` between calls to stay under the API rate limit.
 * A failing mode never aborts the row.
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { SleepFn, sleep as defaultSleep } from '../../shared/resilience/retry';
import { TRANSPORT_MODE_ORDER, TransportMode, isApiTransportMode } from '../../core/constants';
import { DistanceLookupService } from './distance-lookup.service';
import { FlightDistanceEstimator } from './flight-distance.service';
import {
  ModeResult,
  ProcessedRow,
  RowOutcome,
  TripRequest,
  formatLocation,
} from './distance.schema';

export interface RowProcessorOptions {
  distanceLookup: Pick<DistanceLookupService, 'lookup'>;
  flightEstimator: Pick<FlightDistanceEstimator, 'estimate'>;
  /** Pause after every lookup (ms) */
  requestDelayMs: number;
  sleep?: SleepFn;
}

export class RowProcessor {
  private readonly sleep: SleepFn;

  constructor(private readonly options: RowProcessorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async process(request: TripRequest): Promise<ProcessedRow> {
    const results: ModeResult[] = [];

    for (const mode of orderModes(request.requestedModes)) {
      const result = await this.lookupMode(request, mode);
      results.push(result);

      if (result.status !== 'ok') {
        logger.warn(`Row ${request.rowNumber}: ${mode} fell back to N/A`, {
          status: result.status,
          reason: result.reason,
        });
      }

      if (this.options.requestDelayMs > 0) {
        await this.sleep(this.options.requestDelayMs);
      }
    }

    return { request, results, outcome: rowOutcome(results) };
  }

  private lookupMode(request: TripRequest, mode: TransportMode): Promise<ModeResult> {
    if (isApiTransportMode(mode)) {
      return this.options.distanceLookup.lookup(request.origin, request.destination, mode);
    }
    return this.options.flightEstimator.estimate(request.origin, request.destination);
  }
}

/**
 * Requested modes, deduplicated, in canonical column order
 */
export function orderModes(modes: readonly TransportMode[]): TransportMode[] {
  const requested = new Set(modes);
  return TRANSPORT_MODE_ORDER.filter(mode => requested.has(mode));
}

export function rowOutcome(results: readonly ModeResult[]): RowOutcome {
  return results.every(result => result.status === 'ok') ? 'complete' : 'partial';
}

/**
 * Human-readable route for progress lines
 */
export function describeRoute(request: TripRequest): string {
  return `${formatLocation(request.origin)} to ${formatLocation(request.destination)}`;
}
