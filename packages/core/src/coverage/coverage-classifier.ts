import { CoverageAssessment, DiffSummary, FileChange } from '../types.js';
import { createTestFileMatcher } from './test-file-matcher.js';

export const COVERAGE_MESSAGES = {
  none: 'No tests found. Consider adding tests for the new functionality.',
  low: 'Low test coverage. Consider adding more comprehensive tests.',
  moderate: 'Moderate test coverage. Good, but could be improved.',
  good: 'Good test coverage detected.',
} as const;

/**
 * Fixed threshold ladder:
 *
 *   no test files -> none
 *   ratio < 0.3   -> low
 *   ratio < 0.7   -> moderate
 *   otherwise     -> good
 */
export function coverageRecommendation(ratio: number, testFileCount: number): string {
  if (testFileCount === 0) return COVERAGE_MESSAGES.none;
  if (ratio < 0.3) return COVERAGE_MESSAGES.low;
  if (ratio < 0.7) return COVERAGE_MESSAGES.moderate;
  return COVERAGE_MESSAGES.good;
}

/**
 * Fill in the test-file flag for files whose source left it unset, using the
 * configured patterns. Files that already carry a flag are returned as-is.
 */
export function classifyTestFiles(files: FileChange[], testPatterns: string[]): FileChange[] {
  const matches = createTestFileMatcher(testPatterns);
  return files.map((file) =>
    file.isTestFile === undefined ? { ...file, isTestFile: matches(file.path) } : file,
  );
}

/**
 * Summarize how much test code accompanies the change. The ratio is
 * test files per non-test file, with the denominator floored at 1.
 */
export function assessCoverage(diff: DiffSummary): CoverageAssessment {
  const testFiles = diff.files.filter((f) => f.isTestFile === true);
  const codeFileCount = diff.files.length - testFiles.length;
  const testToCodeRatio = testFiles.length / Math.max(codeFileCount, 1);

  return {
    hasTests: testFiles.length > 0,
    testFileCount: testFiles.length,
    codeFileCount,
    testToCodeRatio,
    testFiles: testFiles.map((f) => f.path),
    recommendation: coverageRecommendation(testToCodeRatio, testFiles.length),
  };
}
