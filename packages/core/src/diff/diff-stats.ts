import { DiffSummary, DiffTotals } from '../types.js';

/**
 * Derive aggregate totals from the file list; they are never stored on the
 * summary itself.
 */
export function summarizeDiff(diff: DiffSummary): DiffTotals {
  return {
    filesChanged: diff.files.length,
    additions: diff.files.reduce((sum, f) => sum + f.additions, 0),
    deletions: diff.files.reduce((sum, f) => sum + f.deletions, 0),
  };
}
