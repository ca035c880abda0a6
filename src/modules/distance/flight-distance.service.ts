/**
 * =============================================================================
 * FLIGHT DISTANCE ESTIMATOR
 * =============================================================================
 *
 * Great-circle distance between the geocoded origin and destination.
 * Independent of the Distance Matrix: the only network calls are the two
 * geocoding lookups, each wrapped in the shared retry policy.
 *
 * Duration is an estimate: distance / cruise speed.
 *
 * =============================================================================
 */

import { GoogleMapsClient } from '../../shared/services/google-maps.service';
import { RetryPolicy, SleepFn, retryWithBackoff } from '../../shared/resilience/retry';
import { LatLng, greatCircleDistanceKm, isValidCoordinate, roundTo } from '../../shared/utils/geospatial.utils';
import { FAILURE_SIGNAL, TransportMode } from '../../core/constants';
import { MapsApiError } from '../../core/errors/AppError';
import {
  LocationDescriptor,
  ModeResult,
  formatLocation,
  okResult,
} from './distance.schema';
import { resultFromFailure } from './distance-lookup.service';

export const DEFAULT_FLIGHT_CRUISE_SPEED_KMH = 800;

export interface FlightDistanceOptions {
  maps: Pick<GoogleMapsClient, 'geocode'>;
  retryPolicy: RetryPolicy;
  cruiseSpeedKmh?: number;
  sleep?: SleepFn;
}

export class FlightDistanceEstimator {
  private readonly cruiseSpeedKmh: number;

  constructor(private readonly options: FlightDistanceOptions) {
    this.cruiseSpeedKmh = options.cruiseSpeedKmh ?? DEFAULT_FLIGHT_CRUISE_SPEED_KMH;
  }

  async estimate(origin: LocationDescriptor, destination: LocationDescriptor): Promise<ModeResult> {
    try {
      const from = await this.locate(origin);
      const to = await this.locate(destination);
      return this.fromCoordinates(from, to);
    } catch (error: unknown) {
      return resultFromFailure(TransportMode.FLIGHT, error);
    }
  }

  /**
   * Pure part of the estimate, given coordinates
   */
  fromCoordinates(from: LatLng, to: LatLng): ModeResult {
    const distanceKm = greatCircleDistanceKm(from, to);
    return okResult(
      TransportMode.FLIGHT,
      roundTo(distanceKm),
      roundTo(distanceKm / this.cruiseSpeedKmh)
    );
  }

  private async locate(location: LocationDescriptor): Promise<LatLng> {
    const address = formatLocation(location);
    const result = await retryWithBackoff(
      () => this.options.maps.geocode(address),
      this.options.retryPolicy,
      { operation: `geocode:${address}`, sleep: this.options.sleep }
    );
    const point = { lat: result.latitude, lng: result.longitude };
    if (!isValidCoordinate(point)) {
      throw new MapsApiError(
        `Geocoding "${address}" returned out-of-range coordinates`,
        FAILURE_SIGNAL.INVALID_RESPONSE
      );
    }
    return point;
  }
}
