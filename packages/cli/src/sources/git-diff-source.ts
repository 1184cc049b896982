import simpleGit, { SimpleGit } from 'simple-git';
import { ChangeKind, DiffSummary, FetchError, FileChange, errorMessage } from '@review-gate/core';

const FILE_HEADER = /^diff --git a\/(.+) b\/(.+)$/;

interface FileSection {
  header: string;
  lines: string[];
}

function splitSections(diff: string): FileSection[] {
  const sections: FileSection[] = [];
  let current: FileSection | undefined;

  for (const line of diff.replace(/\r\n/g, '\n').split('\n')) {
    if (line.startsWith('diff --git ')) {
      current = { header: line, lines: [] };
      sections.push(current);
    } else if (current) {
      current.lines.push(line);
    }
  }

  return sections;
}

function toFileChange({ header, lines }: FileSection): FileChange | undefined {
  const match = header.match(FILE_HEADER);
  if (!match) return undefined;

  let path = match[2];
  let changeKind: ChangeKind = 'modified';

  const hunkStart = lines.findIndex((line) => line.startsWith('@@'));
  const meta = hunkStart === -1 ? lines : lines.slice(0, hunkStart);

  for (const line of meta) {
    if (line.startsWith('new file mode')) changeKind = 'added';
    else if (line.startsWith('deleted file mode')) changeKind = 'removed';
    else if (line.startsWith('rename to ')) path = line.slice('rename to '.length);
    else if (line.startsWith('+++ b/')) path = line.slice('+++ b/'.length);
  }

  if (hunkStart === -1) {
    // Binary, mode-only or pure rename change: nothing to scan.
    return { path, changeKind, additions: 0, deletions: 0 };
  }

  const hunks = lines.slice(hunkStart);
  while (hunks.length > 0 && hunks[hunks.length - 1] === '') hunks.pop();

  return {
    path,
    changeKind,
    additions: hunks.filter((line) => line.startsWith('+')).length,
    deletions: hunks.filter((line) => line.startsWith('-')).length,
    patch: hunks.join('\n'),
  };
}

/**
 * Split `git diff` output into one entry per file, with the hunks kept as the
 * file's patch. Test files are left unclassified.
 */
export function splitUnifiedDiff(diff: string): FileChange[] {
  return splitSections(diff).flatMap((section) => toFileChange(section) ?? []);
}

export interface GitDiffSourceOptions {
  repoPath: string;
}

/**
 * Diff source for a local `base...head` range, for reviewing a branch before
 * it has a pull request.
 */
export class GitDiffSource {
  private readonly git: SimpleGit;

  constructor(options: GitDiffSourceOptions) {
    this.git = simpleGit(options.repoPath);
  }

  async getDiff(base: string, head = 'HEAD'): Promise<DiffSummary> {
    const range = `${base}...${head}`;

    try {
      const [diff, log] = await Promise.all([
        this.git.diff([range]),
        this.git.log({ from: base, to: head }),
      ]);

      const commits = log.all;
      const latest = log.latest;
      const title = commits.length === 1 && latest ? latest.message : range;

      return {
        title,
        description: commits.map((commit) => `- ${commit.message}`).join('\n'),
        author: latest?.author_name ?? 'unknown',
        state: 'local',
        baseBranch: base,
        headBranch: head,
        files: splitUnifiedDiff(diff),
      };
    } catch (error) {
      throw new FetchError('diff', range, errorMessage(error), { cause: error });
    }
  }
}
