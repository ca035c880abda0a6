/**
 * =============================================================================
 * GOOGLE MAPS SERVICE - Distance Matrix, Geocoding
 * =============================================================================
 *
 * Thin client over the Google Maps web services:
 * - Distance Matrix API: distance/duration for one origin → destination per mode
 * - Geocoding API: coordinates for a free-text location
 *
 * Every failure is thrown as a MapsApiError carrying a `signal`:
 * - API statuses verbatim (OVER_QUERY_LIMIT, ZERO_RESULTS, NOT_FOUND, ...)
 * - HTTP-layer signals (NETWORK_ERROR, TIMEOUT, HTTP_429, HTTP_5XX, HTTP_4XX)
 * - INVALID_RESPONSE when the body does not match the documented shape
 *
 * Retrying is NOT done here - callers wrap calls in retryWithBackoff().
 * One call = one request = one unit of quota.
 *
 * =============================================================================
 */

import { z } from 'zod';
import { logger } from './logger.service';
import { ApiTransportMode, FAILURE_SIGNAL, MAPS_STATUS } from '../../core/constants';
import { MapsApiError } from '../../core/errors/AppError';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface GoogleMapsClientOptions {
    apiKey: string;
    /** Per-request timeout (ms) */
    timeoutMs?: number;
    /** Injected in tests; defaults to the global fetch */
    fetchFn?: typeof fetch;
    baseUrl?: string;
}

const DEFAULT_BASE_URL = 'https://maps.googleapis.com/maps/api';
const DEFAULT_TIMEOUT_MS = 15000;

// =============================================================================
// METRICS (reported in the run summary)
// =============================================================================

export interface GoogleMapsMetrics {
    apiCalls: { total: number; distanceMatrix: number; geocoding: number };
    errors: { total: number; distanceMatrix: number; geocoding: number };
}

type Endpoint = 'distanceMatrix' | 'geocoding';

// =============================================================================
// TYPES
// =============================================================================

export interface RouteEstimate {
    distanceMeters: number;
    durationSeconds: number;
}

export interface GeocodingResult {
    latitude: number;
    longitude: number;
    address: string;
}

const DistanceMatrixResponseSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
    rows: z.array(z.object({
        elements: z.array(z.object({
            status: z.string(),
            distance: z.object({ value: z.number() }).optional(),
            duration: z.object({ value: z.number() }).optional(),
            duration_in_traffic: z.object({ value: z.number() }).optional(),
        })),
    })).default([]),
});

const GeocodingResponseSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
    results: z.array(z.object({
        formatted_address: z.string().default(''),
        geometry: z.object({
            location: z.object({ lat: z.number(), lng: z.number() }),
        }),
    })).default([]),
});

// =============================================================================
// GOOGLE MAPS CLIENT CLASS
// =============================================================================

export class GoogleMapsClient {
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly fetchFn: typeof fetch;
    private readonly distanceMatrixUrl: string;
    private readonly geocodingUrl: string;

    private readonly metrics: GoogleMapsMetrics = {
        apiCalls: { total: 0, distanceMatrix: 0, geocoding: 0 },
        errors: { total: 0, distanceMatrix: 0, geocoding: 0 },
    };

    constructor(options: GoogleMapsClientOptions) {
        const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchFn = options.fetchFn ?? fetch;
        this.distanceMatrixUrl = `${baseUrl}/distancematrix/json`;
        this.geocodingUrl = `${baseUrl}/geocode/json`;
    }

    // =========================================================================
    // DISTANCE MATRIX API
    // =========================================================================

    async distanceMatrix(
        origin: string,
        destination: string,
        mode: ApiTransportMode
    ): Promise<RouteEstimate> {
        const params = new URLSearchParams({
            origins: origin,
            destinations: destination,
            mode,
            units: 'metric',
            departure_time: 'now',
            key: this.apiKey,
        });

        const body = await this.request('distanceMatrix', `${this.distanceMatrixUrl}?${params.toString()}`);
        const parsed = DistanceMatrixResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.fail('distanceMatrix', 'Distance Matrix returned an unexpected body', FAILURE_SIGNAL.INVALID_RESPONSE);
        }

        const data = parsed.data;
        if (data.status !== MAPS_STATUS.OK) {
            throw this.fail(
                'distanceMatrix',
                data.error_message || `Distance Matrix failed with status ${data.status}`,
                data.status
            );
        }

        const element = data.rows[0]?.elements[0];
        if (!element) {
            throw this.fail('distanceMatrix', 'Distance Matrix returned an empty response', FAILURE_SIGNAL.INVALID_RESPONSE);
        }

        if (element.status !== MAPS_STATUS.OK) {
            throw this.fail(
                'distanceMatrix',
                `No ${mode} route from "${origin}" to "${destination}" (${element.status})`,
                element.status
            );
        }

        const distanceMeters = element.distance?.value;
        const durationSeconds = element.duration_in_traffic?.value ?? element.duration?.value;
        if (distanceMeters === undefined || durationSeconds === undefined) {
            throw this.fail(
                'distanceMatrix',
                'Distance Matrix response is missing distance or duration values',
                FAILURE_SIGNAL.INVALID_RESPONSE
            );
        }

        logger.debug(`📍 Distance Matrix ${mode}: ${origin} → ${destination} = ${distanceMeters} m`);

        return { distanceMeters, durationSeconds };
    }

    // =========================================================================
    // GEOCODING API
    // =========================================================================

    async geocode(address: string): Promise<GeocodingResult> {
        const params = new URLSearchParams({
            address,
            key: this.apiKey,
        });

        const body = await this.request('geocoding', `${this.geocodingUrl}?${params.toString()}`);
        const parsed = GeocodingResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.fail('geocoding', 'Geocoding returned an unexpected body', FAILURE_SIGNAL.INVALID_RESPONSE);
        }

        const data = parsed.data;
        if (data.status !== MAPS_STATUS.OK) {
            throw this.fail(
                'geocoding',
                data.error_message || `Geocoding "${address}" failed with status ${data.status}`,
                data.status
            );
        }

        const result = data.results[0];
        if (!result) {
            throw this.fail('geocoding', `Geocoding "${address}" returned no results`, MAPS_STATUS.ZERO_RESULTS);
        }

        logger.debug(`📍 Geocoded "${address}" → ${result.geometry.location.lat},${result.geometry.location.lng}`);

        return {
            latitude: result.geometry.location.lat,
            longitude: result.geometry.location.lng,
            address: result.formatted_address,
        };
    }

    getMetrics(): GoogleMapsMetrics {
        return {
            apiCalls: { ...this.metrics.apiCalls },
            errors: { ...this.metrics.errors },
        };
    }

    // =========================================================================
    // HTTP HELPERS
    // =========================================================================

    /**
     * GET a JSON body, mapping transport failures to MapsApiError signals
     */
    private async request(endpoint: Endpoint, url: string): Promise<unknown> {
        this.metrics.apiCalls.total++;
        this.metrics.apiCalls[endpoint]++;

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        let response: Response;
        try {
            response = await this.fetchFn(url, {
                method: 'GET',
                signal: controller.signal,
                headers: { Accept: 'application/json' },
            });
        } catch (error: unknown) {
            clearTimeout(timeout);
            if (controller.signal.aborted) {
                throw this.fail(endpoint, `Request timed out after ${this.timeoutMs}ms`, FAILURE_SIGNAL.TIMEOUT);
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw this.fail(endpoint, `Network error: ${reason}`, FAILURE_SIGNAL.NETWORK_ERROR);
        }

        try {
            if (!response.ok) {
                throw this.fail(
                    endpoint,
                    `Google API request failed with HTTP ${response.status}`,
                    httpSignal(response.status),
                    { httpStatus: response.status }
                );
            }

            try {
                return await response.json();
            } catch {
                // The timer stays armed while the body streams in
                if (controller.signal.aborted) {
                    throw this.fail(endpoint, `Request timed out after ${this.timeoutMs}ms`, FAILURE_SIGNAL.TIMEOUT);
                }
                throw this.fail(endpoint, 'Google API returned a body that is not JSON', FAILURE_SIGNAL.INVALID_RESPONSE);
            }
        } finally {
            clearTimeout(timeout);
        }
    }

    private fail(
        endpoint: Endpoint,
        message: string,
        signal: string,
        details?: Record<string, unknown>
    ): MapsApiError {
        this.metrics.errors.total++;
        this.metrics.errors[endpoint]++;
        logger.debug(`Google ${endpoint} error: ${signal}`, { message });
        return new MapsApiError(message, signal, { endpoint, ...details });
    }
}

/**
 * Map a non-2xx HTTP status to a failure signal
 */
export function httpSignal(status: number): string {
    if (status === 429) return FAILURE_SIGNAL.HTTP_429;
    if (status >= 500) return FAILURE_SIGNAL.HTTP_5XX;
    return FAILURE_SIGNAL.HTTP_4XX;
}
