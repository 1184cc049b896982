import { DiffSummary, FileChange, QualityFinding } from '../types.js';
import { extractAddedLines } from '../diff/patch-parser.js';

export const MAX_LINE_LENGTH = 120;

/** Leading whitespace beyond six 4-space indentation levels. */
export const MAX_INDENT_WIDTH = 24;

const CODE_IN_COMMENT_MARKERS = ['function', 'def ', 'class ', 'import'];

const LONG_STRING_LITERAL = /["'][^"']{20,}["']/;

function isCommentedCode(trimmed: string): boolean {
  if (!trimmed.startsWith('//') && !trimmed.startsWith('#')) return false;
  const lower = trimmed.toLowerCase();
  return CODE_IN_COMMENT_MARKERS.some((marker) => lower.includes(marker));
}

function leadingWhitespaceWidth(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Scan the added lines of one file. Fail keywords are reported once per
 * keyword, at their first occurrence.
 */
export function scanFileChange(file: FileChange, failKeywords: string[]): QualityFinding[] {
  if (!file.patch) return [];

  const findings: QualityFinding[] = [];
  const reportedKeywords = new Set<string>();
  const keywords = failKeywords.filter((k) => k.length > 0);

  for (const { line, content } of extractAddedLines(file.patch)) {
    const lower = content.toLowerCase();
    const trimmed = content.trim();

    for (const keyword of keywords) {
      if (reportedKeywords.has(keyword)) continue;
      if (lower.includes(keyword.toLowerCase())) {
        reportedKeywords.add(keyword);
        findings.push({
          path: file.path,
          kind: 'fail-keyword',
          keyword,
          line,
          message: `Found '${keyword}' in ${file.path}`,
        });
      }
    }

    if (content.length > MAX_LINE_LENGTH) {
      findings.push({
        path: file.path,
        kind: 'long-line',
        line,
        message: `Line exceeds ${MAX_LINE_LENGTH} characters (${content.length} chars)`,
      });
    }

    if (leadingWhitespaceWidth(content) > MAX_INDENT_WIDTH) {
      findings.push({
        path: file.path,
        kind: 'deep-nesting',
        line,
        message: 'Deeply nested code detected',
      });
    }

    if (isCommentedCode(trimmed)) {
      findings.push({
        path: file.path,
        kind: 'commented-code',
        line,
        message: 'Potential commented out code',
      });
    }

    if (LONG_STRING_LITERAL.test(trimmed)) {
      findings.push({
        path: file.path,
        kind: 'hardcoded-literal',
        line,
        message: 'Long hardcoded string detected',
      });
    }
  }

  return findings;
}

/**
 * Heuristic text scan over every added line of the diff. Files without patch
 * text (binary or truncated) are skipped.
 *
 * Findings are ordered by file, then by line, then by rule.
 */
export function scanDiffQuality(diff: DiffSummary, failKeywords: string[]): QualityFinding[] {
  return diff.files.flatMap((file) => scanFileChange(file, failKeywords));
}
