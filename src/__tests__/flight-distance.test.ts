/**
 * =============================================================================
 * FLIGHT DISTANCE ESTIMATOR — Unit Tests
 * =============================================================================
 */

import {
  DEFAULT_FLIGHT_CRUISE_SPEED_KMH,
  FlightDistanceEstimator,
} from '../modules/distance/flight-distance.service';
import { createRetryPolicy } from '../shared/resilience/retry';
import { TransportMode } from '../core/constants';
import { FakeMapsClient, noSleep } from './helpers/fake-maps';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const NEW_YORK = { city: 'New York', state: 'NY', country: 'USA' };
const LOS_ANGELES = { city: 'Los Angeles', state: 'CA', country: 'USA' };
const BOSTON = { city: 'Boston', state: 'MA', country: 'USA' };

function createMaps(): FakeMapsClient {
  return new FakeMapsClient()
    .addPlace('New York, NY, USA', 40.7128, -74.006)
    .addPlace('Los Angeles, CA, USA', 34.0522, -118.2437)
    .addPlace('Boston, MA, USA', 42.3601, -71.0589);
}

describe('FlightDistanceEstimator', () => {
  let maps: FakeMapsClient;
  let estimator: FlightDistanceEstimator;

  beforeEach(() => {
    maps = createMaps();
    estimator = new FlightDistanceEstimator({
      maps,
      retryPolicy: createRetryPolicy({ maxAttempts: 3 }),
      sleep: noSleep,
    });
  });

  it('should default the cruise speed to 800 km/h', () => {
    expect(DEFAULT_FLIGHT_CRUISE_SPEED_KMH).toBe(800);
  });

  it('should estimate New York to Los Angeles', async () => {
    const result = await estimator.estimate(NEW_YORK, LOS_ANGELES);

    expect(result).toEqual({
      mode: TransportMode.FLIGHT,
      distanceKm: 3935.75,
      durationHrs: 4.92,
      status: 'ok',
    });
  });

  it('should geocode the origin before the destination', async () => {
    await estimator.estimate(NEW_YORK, BOSTON);

    expect(maps.calls).toEqual(['geocode:New York, NY, USA', 'geocode:Boston, MA, USA']);
  });

  it('should estimate a short hop', async () => {
    const result = await estimator.estimate(NEW_YORK, BOSTON);

    expect(result.distanceKm).toBe(306.11);
    expect(result.durationHrs).toBe(0.38);
  });

  it('should use a custom cruise speed for the duration', async () => {
    const slow = new FlightDistanceEstimator({
      maps,
      retryPolicy: createRetryPolicy(),
      cruiseSpeedKmh: 400,
      sleep: noSleep,
    });

    const result = await slow.estimate(NEW_YORK, LOS_ANGELES);

    expect(result.distanceKm).toBe(3935.75);
    expect(result.durationHrs).toBe(9.84);
  });

  it('should fall back to N/A when a place cannot be geocoded', async () => {
    const result = await estimator.estimate(NEW_YORK, { city: 'Atlantis' });

    expect(result).toEqual({
      mode: TransportMode.FLIGHT,
      distanceKm: null,
      durationHrs: null,
      status: 'unavailable',
      reason: 'ZERO_RESULTS: Geocoding "Atlantis" failed with status ZERO_RESULTS',
    });
  });

  it('should skip the destination lookup when the origin fails', async () => {
    await estimator.estimate({ city: 'Atlantis' }, BOSTON);

    expect(maps.calls).toEqual(['geocode:Atlantis']);
  });

  it('should retry a transient geocoding failure', async () => {
    maps.failNext('Boston, MA, USA', 'TIMEOUT');

    const result = await estimator.estimate(NEW_YORK, BOSTON);

    expect(result.status).toBe('ok');
    expect(maps.calls).toEqual([
      'geocode:New York, NY, USA',
      'geocode:Boston, MA, USA',
      'geocode:Boston, MA, USA',
    ]);
  });

  it('should reject out-of-range coordinates', async () => {
    maps.addPlace('Nowhere', 123, 0);

    const result = await estimator.estimate(NEW_YORK, { city: 'Nowhere' });

    expect(result.status).toBe('unavailable');
    expect(result.reason).toBe('INVALID_RESPONSE: Geocoding "Nowhere" returned out-of-range coordinates');
  });

  it('should compute directly from coordinates', () => {
    const result = estimator.fromCoordinates(
      { lat: 51.5074, lng: -0.1278 },
      { lat: 48.8566, lng: 2.3522 }
    );

    expect(result.distanceKm).toBe(343.56);
    expect(result.durationHrs).toBe(0.43);
  });

  it('should return zero for identical points', () => {
    const result = estimator.fromCoordinates({ lat: 10, lng: 20 }, { lat: 10, lng: 20 });

    expect(result.distanceKm).toBe(0);
    expect(result.durationHrs).toBe(0);
  });
});
