export interface AddedLine {
  /** Line number in the new version of the file. */
  line: number;
  /** Line content without the leading '+'. */
  content: string;
}

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

/**
 * Extract the added lines of a unified-diff patch together with their line
 * numbers in the new file. Removed and context lines are skipped but still
 * advance the new-file line counter where they exist in the new file.
 *
 * A patch without hunk headers is numbered from 1.
 */
export function extractAddedLines(patch: string): AddedLine[] {
  const added: AddedLine[] = [];
  let newLine = 1;
  let inHunk = false;

  for (const raw of patch.split('\n')) {
    const header = raw.match(HUNK_HEADER);
    if (header) {
      newLine = parseInt(header[1], 10);
      inHunk = true;
      continue;
    }

    // File headers only precede the first hunk; inside one, "+++ x" is an added "++ x".
    if (!inHunk && (raw.startsWith('+++ ') || raw.startsWith('--- '))) continue;
    if (raw.startsWith('\\')) continue; // "\ No newline at end of file"

    if (raw.startsWith('+')) {
      added.push({ line: newLine, content: raw.slice(1) });
      newLine++;
    } else if (!raw.startsWith('-')) {
      newLine++;
    }
  }

  return added;
}
