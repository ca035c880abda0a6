/**
 * =============================================================================
 * SPREADSHEET MODULE
 * =============================================================================
 *
 * Input loading (row validation, default origin, mode selection) and output
 * writing for .xlsx / .csv files.
 * =============================================================================
 */

export * from './spreadsheet.schema';
export * from './spreadsheet.service';
