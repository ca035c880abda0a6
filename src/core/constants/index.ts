/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Column names live next to the modes they describe
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// TRANSPORT MODES
// =============================================================================

/**
 * Modes a distance/duration is computed for.
 * The first four go to the Distance Matrix API; FLIGHT is computed locally.
 */
export enum TransportMode {
  DRIVING = 'driving',
  TRANSIT = 'transit',
  WALKING = 'walking',
  BICYCLING = 'bicycling',
  FLIGHT = 'flight'
}

/**
 * Canonical processing (and column) order
 */
export const TRANSPORT_MODE_ORDER: readonly TransportMode[] = [
  TransportMode.DRIVING,
  TransportMode.TRANSIT,
  TransportMode.WALKING,
  TransportMode.BICYCLING,
  TransportMode.FLIGHT
];

/**
 * Modes the remote Distance Matrix understands
 */
export type ApiTransportMode = Exclude<TransportMode, TransportMode.FLIGHT>;

export function isApiTransportMode(mode: TransportMode): mode is ApiTransportMode {
  return mode !== TransportMode.FLIGHT;
}

/**
 * Output column prefix per mode (`<prefix>_Distance_km`, `<prefix>_Duration_hrs`)
 */
export const MODE_COLUMN_PREFIX: Record<TransportMode, string> = {
  [TransportMode.DRIVING]: 'Car',
  [TransportMode.TRANSIT]: 'Public_Transport',
  [TransportMode.WALKING]: 'Walking',
  [TransportMode.BICYCLING]: 'Bicycle',
  [TransportMode.FLIGHT]: 'Flight'
};

/**
 * Words accepted in the Transport_Methods column (lower-cased, trimmed)
 */
export const MODE_ALIASES: Record<string, TransportMode> = {
  driving: TransportMode.DRIVING,
  drive: TransportMode.DRIVING,
  car: TransportMode.DRIVING,
  transit: TransportMode.TRANSIT,
  'public transport': TransportMode.TRANSIT,
  public_transport: TransportMode.TRANSIT,
  bus: TransportMode.TRANSIT,
  train: TransportMode.TRANSIT,
  walking: TransportMode.WALKING,
  walk: TransportMode.WALKING,
  bicycling: TransportMode.BICYCLING,
  bicycle: TransportMode.BICYCLING,
  bike: TransportMode.BICYCLING,
  cycling: TransportMode.BICYCLING,
  flight: TransportMode.FLIGHT,
  fly: TransportMode.FLIGHT,
  plane: TransportMode.FLIGHT,
  air: TransportMode.FLIGHT
};

export const ALL_MODES_TOKEN = 'all';

// =============================================================================
// SPREADSHEET LAYOUT
// =============================================================================

export const INPUT_COLUMNS = {
  ORIGIN_CITY: 'Starting_City',
  ORIGIN_STATE: 'Starting_State',
  ORIGIN_COUNTRY: 'Starting_Country',
  DESTINATION_CITY: 'Destination',
  DESTINATION_STATE: 'Destination_State',
  DESTINATION_COUNTRY: 'Destination_Country',
  TRANSPORT_METHODS: 'Transport_Methods'
} as const;

export const REQUIRED_INPUT_COLUMNS: readonly string[] = [
  INPUT_COLUMNS.ORIGIN_CITY,
  INPUT_COLUMNS.DESTINATION_CITY
];

export function distanceColumn(mode: TransportMode): string {
  return `${MODE_COLUMN_PREFIX[mode]}_Distance_km`;
}

export function durationColumn(mode: TransportMode): string {
  return `${MODE_COLUMN_PREFIX[mode]}_Duration_hrs`;
}

/**
 * Computed columns in output order
 */
export const OUTPUT_COLUMNS: readonly string[] = TRANSPORT_MODE_ORDER.flatMap(mode => [
  distanceColumn(mode),
  durationColumn(mode)
]);

/**
 * Written into a cell whose computation could not be completed
 */
export const NOT_AVAILABLE = 'N/A';

export const SUPPORTED_SHEET_EXTENSIONS = ['.xlsx', '.csv'] as const;

// =============================================================================
// GOOGLE MAPS API STATUSES
// =============================================================================

/**
 * Statuses meaning the request itself succeeded
 */
export const MAPS_STATUS = {
  OK: 'OK',
  ZERO_RESULTS: 'ZERO_RESULTS',
  NOT_FOUND: 'NOT_FOUND'
} as const;

/**
 * Failure signals produced by the HTTP layer (API statuses are used verbatim)
 */
export const FAILURE_SIGNAL = {
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  HTTP_429: 'HTTP_429',
  HTTP_5XX: 'HTTP_5XX',
  HTTP_4XX: 'HTTP_4XX',
  INVALID_RESPONSE: 'INVALID_RESPONSE'
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 1xxx: Configuration
 * - 2xxx: Input file / row validation
 * - 9xxx: External API / system
 */
export enum ErrorCode {
  // Configuration (1xxx)
  CONFIG_INVALID = 'CFG_1001',
  CONFIG_MISSING_CREDENTIAL = 'CFG_1002',
  CONFIG_UNSUPPORTED_FILE_TYPE = 'CFG_1003',

  // Input (2xxx)
  INPUT_FILE_NOT_FOUND = 'IN_2001',
  INPUT_SCHEMA_INVALID = 'IN_2002',
  ROW_INVALID = 'IN_2003',

  // System & external (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  MAPS_API_ERROR = 'SYS_9006',
  RETRY_EXHAUSTED = 'SYS_9011'
}

/**
 * Error category for grouping in log output
 */
export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  INPUT = 'input',
  SYSTEM = 'system'
}

export const ERROR_CATEGORY_MAP: Record<string, ErrorCategory> = {
  'CFG_': ErrorCategory.CONFIGURATION,
  'IN_': ErrorCategory.INPUT,
  'SYS_': ErrorCategory.SYSTEM
};

/**
 * Get error category from error code
 */
export function getErrorCategory(errorCode: string): ErrorCategory {
  const prefix = errorCode.split('_')[0] + '_';
  return ERROR_CATEGORY_MAP[prefix] || ErrorCategory.SYSTEM;
}

// =============================================================================
// PROCESS EXIT CODES
// =============================================================================

export const EXIT_CODE = {
  SUCCESS: 0,
  SETUP_FAILURE: 1,
  USAGE: 2
} as const;
