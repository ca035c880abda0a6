/**
 * =============================================================================
 * BATCH MODULE - SCHEMAS & TYPES
 * =============================================================================
 */

import { TransportMode } from '../../core/constants';
import { ModeStatus } from '../distance/distance.schema';

/**
 * One (row, mode) pair that fell back to N/A
 */
export interface FallbackRecord {
  rowNumber: number;
  mode: TransportMode;
  status: Exclude<ModeStatus, 'ok'>;
  reason: string;
}

export interface SkippedRowRecord {
  rowNumber: number;
  reason: string;
}

export interface RunSummary {
  runId: string;
  inputPath: string;
  outputPath: string;
  totalRows: number;
  completeRows: number;
  partialRows: number;
  skippedRows: number;
  fallbacks: FallbackRecord[];
  skipped: SkippedRowRecord[];
  apiCalls: number;
  durationMs: number;
}

/**
 * Multi-line summary printed at the end of a run
 */
export function formatSummary(summary: RunSummary): string {
  const lines = [
    `Run ${summary.runId}: ${summary.totalRows} row(s) processed`,
    `  complete: ${summary.completeRows}`,
    `  partial:  ${summary.partialRows}`,
    `  skipped:  ${summary.skippedRows}`,
    `  API calls: ${summary.apiCalls}`,
    `  output: ${summary.outputPath}`,
  ];

  if (summary.fallbacks.length > 0) {
    lines.push('  fell back to N/A:');
    for (const fallback of summary.fallbacks) {
      lines.push(`    row ${fallback.rowNumber} ${fallback.mode} (${fallback.status}): ${fallback.reason}`);
    }
  }

  if (summary.skipped.length > 0) {
    lines.push('  skipped rows:');
    for (const skipped of summary.skipped) {
      lines.push(`    row ${skipped.rowNumber}: ${skipped.reason}`);
    }
  }

  return lines.join('\n');
}
