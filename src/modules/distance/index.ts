/**
 * =============================================================================
 * DISTANCE MODULE
 * =============================================================================
 *
 * Handles per-row distance calculations:
 * - Distance Matrix lookups per transport mode (retried, with N/A fallback)
 * - Flight distance (great-circle between geocoded endpoints)
 * - Row orchestration (one ModeResult per requested mode)
 * =============================================================================
 */

export * from './distance.schema';
export * from './distance-lookup.service';
export * from './flight-distance.service';
export * from './row-processor.service';
