import picomatch from 'picomatch';

/**
 * Directory names that mark everything beneath them as test code.
 */
const TEST_DIRECTORIES = new Set(['test', 'tests', 'spec', 'specs', '__tests__']);

type PathMatcher = (filePath: string) => boolean;

/**
 * Compile one configured pattern. Patterns without a '/' match the file
 * name; patterns with one match the path or any of its trailing segments,
 * so `tests/*.py` also flags `pkg/tests/test_api.py`.
 */
function compilePattern(pattern: string): PathMatcher {
  const matchesPath = pattern.includes('/');
  const isMatch = picomatch(pattern, { nocase: true, dot: true, basename: !matchesPath });
  if (!matchesPath) return isMatch;

  return (filePath) => {
    const segments = filePath.split('/');
    return segments.some((_, i) => isMatch(segments.slice(i).join('/')));
  };
}

/**
 * Build a predicate that flags test files by the configured glob patterns,
 * falling back to well-known test directory names anywhere in the path.
 */
export function createTestFileMatcher(patterns: string[]): PathMatcher {
  const matchers = patterns.map(compilePattern);

  return (filePath: string): boolean => {
    const normalized = filePath.replace(/\\/g, '/');
    if (matchers.some((matches) => matches(normalized))) return true;

    const segments = normalized.split('/');
    return segments
      .slice(0, -1)
      .some((segment) => TEST_DIRECTORIES.has(segment.toLowerCase()));
  };
}

export function isTestFile(filePath: string, patterns: string[]): boolean {
  return createTestFileMatcher(patterns)(filePath);
}
