/**
 * =============================================================================
 * DISTANCE LOOKUP SERVICE - Distance Matrix with Retry / Fallback
 * =============================================================================
 *
 * Given origin, destination and one API transport mode, returns a ModeResult.
 * Never throws:
 * - success           → status 'ok', km / hours rounded to 2 decimals
 * - transient failure → retried per RetryPolicy; exhausted → status 'error'
 * - permanent failure → status 'unavailable', no retry
 * - unexpected error  → status 'error', no retry
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { GoogleMapsClient } from '../../shared/services/google-maps.service';
import { RetryPolicy, SleepFn, retryWithBackoff } from '../../shared/resilience/retry';
import { roundTo } from '../../shared/utils/geospatial.utils';
import { ApiTransportMode } from '../../core/constants';
import { describeError, isMapsApiError, isRetryExhaustedError } from '../../core/errors/AppError';
import {
  LocationDescriptor,
  ModeResult,
  fallbackResult,
  formatLocation,
  okResult,
} from './distance.schema';

export interface DistanceLookupOptions {
  maps: Pick<GoogleMapsClient, 'distanceMatrix'>;
  retryPolicy: RetryPolicy;
  sleep?: SleepFn;
}

/**
 * Convert a caught lookup error into the fallback result
 */
export function resultFromFailure(mode: ModeResult['mode'], error: unknown): ModeResult {
  if (isRetryExhaustedError(error)) {
    return fallbackResult(mode, 'error', describeError(error));
  }
  if (isMapsApiError(error)) {
    return fallbackResult(mode, 'unavailable', `${error.signal}: ${error.message}`);
  }
  return fallbackResult(mode, 'error', describeError(error));
}

export class DistanceLookupService {
  constructor(private readonly options: DistanceLookupOptions) {}

  async lookup(
    origin: LocationDescriptor,
    destination: LocationDescriptor,
    mode: ApiTransportMode
  ): Promise<ModeResult> {
    const from = formatLocation(origin);
    const to = formatLocation(destination);

    try {
      const estimate = await retryWithBackoff(
        () => this.options.maps.distanceMatrix(from, to, mode),
        this.options.retryPolicy,
        { operation: `distance:${mode}`, sleep: this.options.sleep }
      );

      return okResult(
        mode,
        roundTo(estimate.distanceMeters / 1000),
        roundTo(estimate.durationSeconds / 3600)
      );
    } catch (error: unknown) {
      const result = resultFromFailure(mode, error);
      if (result.status === 'error' && !isRetryExhaustedError(error)) {
        logger.error(`Unexpected failure looking up ${mode} distance from ${from} to ${to}`, {
          error: describeError(error),
        });
      }
      return result;
    }
  }
}
