/**
 * =============================================================================
 * GOOGLE MAPS CLIENT — Unit Tests
 * =============================================================================
 *
 * Request building and failure-signal mapping for the Distance Matrix and
 * Geocoding endpoints. fetch is replaced with a jest mock.
 * =============================================================================
 */

import { GoogleMapsClient, httpSignal } from '../shared/services/google-maps.service';
import { MapsApiError } from '../core/errors/AppError';
import { TransportMode } from '../core/constants';
import {
  FetchMock,
  createFetchMock,
  distanceMatrixBody,
  geocodeBody,
  StalledBodyResponse,
  jsonResponse,
  requestParams,
} from './helpers/fake-fetch';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// SETUP
// =============================================================================

let fetchFn: FetchMock;
let client: GoogleMapsClient;

beforeEach(() => {
  fetchFn = createFetchMock();
  client = new GoogleMapsClient({ apiKey: 'test-key', fetchFn, timeoutMs: 1000 });
});

async function captureError(promise: Promise<unknown>): Promise<MapsApiError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof MapsApiError)) {
    throw new Error(`Expected MapsApiError, got ${String(error)}`);
  }
  return error;
}

// =============================================================================
// DISTANCE MATRIX
// =============================================================================

describe('GoogleMapsClient.distanceMatrix', () => {
  it('should return meters and seconds for an OK element', async () => {
    fetchFn.mockResolvedValue(jsonResponse(distanceMatrixBody('OK', 50000, 3600)));

    const estimate = await client.distanceMatrix('New York, NY, USA', 'Boston, MA, USA', TransportMode.DRIVING);

    expect(estimate).toEqual({ distanceMeters: 50000, durationSeconds: 3600 });
  });

  it('should send origin, destination, mode, metric units and departure_time=now', async () => {
    fetchFn.mockResolvedValue(jsonResponse(distanceMatrixBody('OK', 1000, 60)));

    await client.distanceMatrix('London, UK', 'Paris, France', TransportMode.TRANSIT);

    const params = requestParams(fetchFn);
    expect(params.get('origins')).toBe('London, UK');
    expect(params.get('destinations')).toBe('Paris, France');
    expect(params.get('mode')).toBe('transit');
    expect(params.get('units')).toBe('metric');
    expect(params.get('departure_time')).toBe('now');
    expect(params.get('key')).toBe('test-key');
    expect(String(fetchFn.mock.calls[0][0])).toMatch(
      /^https:\/\/maps\.googleapis\.com\/maps\/api\/distancematrix\/json\?/
    );
  });

  it('should prefer duration_in_traffic when present', async () => {
    fetchFn.mockResolvedValue(jsonResponse({
      status: 'OK',
      rows: [{
        elements: [{
          status: 'OK',
          distance: { value: 20000 },
          duration: { value: 1200 },
          duration_in_traffic: { value: 1800 },
        }],
      }],
    }));

    const estimate = await client.distanceMatrix('A', 'B', TransportMode.DRIVING);

    expect(estimate).toEqual({ distanceMeters: 20000, durationSeconds: 1800 });
  });

  it('should surface the element status as the signal', async () => {
    fetchFn.mockResolvedValue(jsonResponse(distanceMatrixBody('ZERO_RESULTS')));

    const error = await captureError(client.distanceMatrix('Honolulu', 'Tokyo', TransportMode.DRIVING));

    expect(error.signal).toBe('ZERO_RESULTS');
    expect(error.message).toBe('No driving route from "Honolulu" to "Tokyo" (ZERO_RESULTS)');
  });

  it('should surface the request status and error_message', async () => {
    fetchFn.mockResolvedValue(jsonResponse({
      status: 'OVER_QUERY_LIMIT',
      error_message: 'You have exceeded your rate-limit for this API.',
      rows: [],
    }));

    const error = await captureError(client.distanceMatrix('A', 'B', TransportMode.WALKING));

    expect(error.signal).toBe('OVER_QUERY_LIMIT');
    expect(error.message).toBe('You have exceeded your rate-limit for this API.');
  });

  it('should map HTTP failures to HTTP signals', async () => {
    fetchFn
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({}, 403));

    const serverError = await captureError(client.distanceMatrix('A', 'B', TransportMode.DRIVING));
    const rateLimited = await captureError(client.distanceMatrix('A', 'B', TransportMode.DRIVING));
    const forbidden = await captureError(client.distanceMatrix('A', 'B', TransportMode.DRIVING));

    expect(serverError.signal).toBe('HTTP_5XX');
    expect(rateLimited.signal).toBe('HTTP_429');
    expect(forbidden.signal).toBe('HTTP_4XX');
    expect(serverError.message).toBe('Google API request failed with HTTP 503');
  });

  it('should map a rejected fetch to NETWORK_ERROR', async () => {
    fetchFn.mockRejectedValue(new TypeError('fetch failed'));

    const error = await captureError(client.distanceMatrix('A', 'B', TransportMode.BICYCLING));

    expect(error.signal).toBe('NETWORK_ERROR');
    expect(error.message).toBe('Network error: fetch failed');
  });

  it('should abort a slow request and report TIMEOUT', async () => {
    const slowClient = new GoogleMapsClient({ apiKey: 'test-key', fetchFn, timeoutMs: 5 });
    fetchFn.mockImplementation((_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      })
    );

    const error = await captureError(slowClient.distanceMatrix('A', 'B', TransportMode.DRIVING));

    expect(error.signal).toBe('TIMEOUT');
    expect(error.message).toBe('Request timed out after 5ms');
  });

  it('should report TIMEOUT when the body is still streaming at the deadline', async () => {
    const slowClient = new GoogleMapsClient({ apiKey: 'test-key', fetchFn, timeoutMs: 20 });
    fetchFn.mockImplementation(async (_input, init) => new StalledBodyResponse(init?.signal));

    const error = await captureError(slowClient.geocode('Paris'));

    expect(error.signal).toBe('TIMEOUT');
    expect(error.message).toBe('Request timed out after 20ms');
  });

  it('should report INVALID_RESPONSE for a body that is not JSON', async () => {
    fetchFn.mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

    const error = await captureError(client.distanceMatrix('A', 'B', TransportMode.DRIVING));

    expect(error.signal).toBe('INVALID_RESPONSE');
  });

  it('should report INVALID_RESPONSE when an OK element lacks values', async () => {
    fetchFn.mockResolvedValue(jsonResponse({
      status: 'OK',
      rows: [{ elements: [{ status: 'OK', distance: { value: 100 } }] }],
    }));

    const error = await captureError(client.distanceMatrix('A', 'B', TransportMode.DRIVING));

    expect(error.signal).toBe('INVALID_RESPONSE');
  });
});

// =============================================================================
// GEOCODING
// =============================================================================

describe('GoogleMapsClient.geocode', () => {
  it('should return the first result location', async () => {
    fetchFn.mockResolvedValue(jsonResponse(geocodeBody(40.7128, -74.006, 'New York, NY, USA')));

    const result = await client.geocode('New York');

    expect(result).toEqual({ latitude: 40.7128, longitude: -74.006, address: 'New York, NY, USA' });
    expect(requestParams(fetchFn).get('address')).toBe('New York');
  });

  it('should surface ZERO_RESULTS as a signal', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: 'ZERO_RESULTS', results: [] }));

    const error = await captureError(client.geocode('Atlantis'));

    expect(error.signal).toBe('ZERO_RESULTS');
    expect(error.message).toBe('Geocoding "Atlantis" failed with status ZERO_RESULTS');
  });

  it('should treat an OK status with no results as ZERO_RESULTS', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ status: 'OK', results: [] }));

    const error = await captureError(client.geocode('Nowhere'));

    expect(error.signal).toBe('ZERO_RESULTS');
  });
});

// =============================================================================
// METRICS & HELPERS
// =============================================================================

describe('GoogleMapsClient metrics', () => {
  it('should count calls and errors per endpoint', async () => {
    fetchFn
      .mockResolvedValueOnce(jsonResponse(distanceMatrixBody('OK', 1000, 60)))
      .mockResolvedValueOnce(jsonResponse(distanceMatrixBody('NOT_FOUND')))
      .mockResolvedValueOnce(jsonResponse(geocodeBody(1, 2, 'x')));

    await client.distanceMatrix('A', 'B', TransportMode.DRIVING);
    await client.distanceMatrix('A', 'Nowhere', TransportMode.DRIVING).catch(() => undefined);
    await client.geocode('x');

    expect(client.getMetrics()).toEqual({
      apiCalls: { total: 3, distanceMatrix: 2, geocoding: 1 },
      errors: { total: 1, distanceMatrix: 1, geocoding: 0 },
    });
  });
});

describe('httpSignal', () => {
  it('should classify status codes', () => {
    expect(httpSignal(500)).toBe('HTTP_5XX');
    expect(httpSignal(502)).toBe('HTTP_5XX');
    expect(httpSignal(429)).toBe('HTTP_429');
    expect(httpSignal(400)).toBe('HTTP_4XX');
  });
});
