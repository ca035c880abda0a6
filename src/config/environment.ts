/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - The Google Maps key is only ever read from the environment (or CLI flag)
 * - The key is never logged (see logger.service.ts redaction)
 *
 * FOR DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - Run-time checks live in validateRunSettings(), called by the CLI
 * =============================================================================
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors/AppError';
import { ErrorCode } from '../core/constants';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value && value.trim() !== '' ? value.trim() : defaultValue;
}

/**
 * Values that could not be parsed; reported by validateRunSettings()
 */
const invalidValues: string[] = [];

/**
 * Get number environment variable (floats allowed)
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key]?.trim();
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    invalidValues.push(`${key} must be a number (got "${value}")`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse comma-separated list
 */
function getList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : defaultValue;
}

// =============================================================================
// RETRY DEFAULTS
// =============================================================================

export const DEFAULT_TRANSIENT_SIGNALS = [
  'NETWORK_ERROR',
  'TIMEOUT',
  'HTTP_429',
  'HTTP_5XX',
  'OVER_QUERY_LIMIT',
  'UNKNOWN_ERROR',
];

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

export const config = {
  nodeEnv,

  // Google Maps
  googleMaps: {
    apiKey: getOptional('GOOGLE_MAPS_API_KEY', ''),
    requestTimeoutMs: getNumber('REQUEST_TIMEOUT_MS', 15000),
  },

  // Files
  files: {
    input: getOptional('INPUT_FILE', 'input_locations.xlsx'),
    output: getOptional('OUTPUT_FILE', 'distances_output.xlsx'),
  },

  // Row processing
  processing: {
    defaultOriginCity: getOptional('DEFAULT_ORIGIN_CITY', 'New York, NY, USA'),
    requestDelayMs: getNumber('REQUEST_DELAY_MS', 100),
    flightCruiseSpeedKmh: getNumber('FLIGHT_CRUISE_SPEED_KMH', 800),
  },

  // Retry / backoff
  retry: {
    maxAttempts: getNumber('RETRY_MAX_ATTEMPTS', 3),
    baseDelayMs: getNumber('RETRY_BASE_DELAY_MS', 500),
    backoffMultiplier: getNumber('RETRY_BACKOFF_MULTIPLIER', 2),
    maxDelayMs: getNumber('RETRY_MAX_DELAY_MS', 8000),
    transientSignals: getList('RETRY_TRANSIENT_SIGNALS', DEFAULT_TRANSIENT_SIGNALS),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),
  logFile: getOptional('LOG_FILE', ''),

  invalidValues,

  // Helpers
  isTest: nodeEnv === 'test',
} as const;

// =============================================================================
// RUN SETTINGS
// =============================================================================

/**
 * Everything a batch run needs, after CLI flags are merged over the environment.
 */
export interface RunSettings {
  apiKey: string;
  inputPath: string;
  outputPath: string;
  defaultOriginCity: string;
  requestDelayMs: number;
  requestTimeoutMs: number;
  flightCruiseSpeedKmh: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    backoffMultiplier: number;
    maxDelayMs: number;
    transientSignals: string[];
  };
  /** Environment values rejected while loading (e.g. a non-numeric number) */
  invalidValues: string[];
}

export type RunSettingsOverrides = Partial<
  Pick<RunSettings, 'apiKey' | 'inputPath' | 'outputPath' | 'defaultOriginCity'>
>;

/**
 * Build run settings from the loaded config, letting CLI flags win.
 */
export function buildRunSettings(overrides: RunSettingsOverrides = {}): RunSettings {
  return {
    apiKey: overrides.apiKey ?? config.googleMaps.apiKey,
    inputPath: overrides.inputPath ?? config.files.input,
    outputPath: overrides.outputPath ?? config.files.output,
    defaultOriginCity: overrides.defaultOriginCity ?? config.processing.defaultOriginCity,
    requestDelayMs: config.processing.requestDelayMs,
    requestTimeoutMs: config.googleMaps.requestTimeoutMs,
    flightCruiseSpeedKmh: config.processing.flightCruiseSpeedKmh,
    retry: {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      backoffMultiplier: config.retry.backoffMultiplier,
      maxDelayMs: config.retry.maxDelayMs,
      transientSignals: [...config.retry.transientSignals],
    },
    invalidValues: [...config.invalidValues],
  };
}

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate settings before any row is processed.
 * Fails fast if the credential is missing or a tuning value is out of range.
 */
export function validateRunSettings(settings: RunSettings): void {
  if (settings.apiKey.trim() === '') {
    throw new ConfigurationError(
      'GOOGLE_MAPS_API_KEY is not set (use the environment, a .env file or --api-key)',
      ErrorCode.CONFIG_MISSING_CREDENTIAL
    );
  }

  const errors: string[] = [...settings.invalidValues];

  if (settings.defaultOriginCity.trim() === '') {
    errors.push('DEFAULT_ORIGIN_CITY must not be empty');
  }
  if (!Number.isInteger(settings.retry.maxAttempts) || settings.retry.maxAttempts < 1) {
    errors.push('RETRY_MAX_ATTEMPTS must be an integer >= 1');
  }
  if (settings.retry.baseDelayMs < 0 || settings.retry.maxDelayMs < 0) {
    errors.push('RETRY_BASE_DELAY_MS and RETRY_MAX_DELAY_MS must be >= 0');
  }
  if (settings.retry.backoffMultiplier < 1) {
    errors.push('RETRY_BACKOFF_MULTIPLIER must be >= 1');
  }
  if (settings.requestDelayMs < 0) {
    errors.push('REQUEST_DELAY_MS must be >= 0');
  }
  if (settings.requestTimeoutMs <= 0) {
    errors.push('REQUEST_TIMEOUT_MS must be > 0');
  }
  if (settings.flightCruiseSpeedKmh <= 0) {
    errors.push('FLIGHT_CRUISE_SPEED_KMH must be > 0');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`,
      ErrorCode.CONFIG_INVALID,
      { errors }
    );
  }
}
