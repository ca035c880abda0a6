/**
 * =============================================================================
 * BATCH MODULE
 * =============================================================================
 *
 * Runs a whole spreadsheet through the row processor and writes the result.
 * =============================================================================
 */

export * from './batch.schema';
export * from './batch.service';
