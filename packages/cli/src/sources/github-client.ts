import { z } from 'zod';
import { ChangeKind, ConfigError, DiffSummary, FileChange, createTestFileMatcher } from '@review-gate/core';
import { GITHUB_API_URL, GITHUB_PAGE_SIZE, githubHeaders } from '../github/api.js';
import { RequestTarget, getJson } from './http.js';

const PULL_REQUEST_URL = /https:\/\/github\.com\/([^/\s]+\/[^/\s]+)\/pull\/(\d+)/;

const pullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullish(),
  state: z.string(),
  user: z.object({ login: z.string() }).nullish(),
  base: z.object({ ref: z.string() }),
  head: z.object({ ref: z.string() }),
});

const pullRequestFilesSchema = z.array(
  z.object({
    filename: z.string(),
    status: z.string(),
    additions: z.number().int(),
    deletions: z.number().int(),
    patch: z.string().optional(),
  }),
);

export interface PullRequestRef {
  /** "owner/repo" */
  repo: string;
  number: number;
}

export function parsePullRequestUrl(url: string): PullRequestRef {
  const match = url.match(PULL_REQUEST_URL);
  if (!match) {
    throw new ConfigError(`Invalid GitHub pull request URL: ${url}`, ['pr']);
  }
  return { repo: match[1], number: Number(match[2]) };
}

/** GitHub reports renamed, copied and changed files too; all count as modified. */
export function toChangeKind(status: string): ChangeKind {
  if (status === 'added') return 'added';
  if (status === 'removed') return 'removed';
  return 'modified';
}

export interface GitHubClientOptions {
  token: string;
  testPatterns: string[];
  apiUrl?: string;
}

/**
 * Pull request diff source backed by the GitHub REST API.
 */
export class GitHubClient {
  private readonly headers: Record<string, string>;
  private readonly apiUrl: string;
  private readonly isTestFile: (path: string) => boolean;

  constructor(options: GitHubClientOptions) {
    this.headers = githubHeaders(options.token);
    this.apiUrl = options.apiUrl ?? GITHUB_API_URL;
    this.isTestFile = createTestFileMatcher(options.testPatterns);
  }

  async getPullRequestDiff(url: string): Promise<DiffSummary> {
    const { repo, number } = parsePullRequestUrl(url);
    const target: RequestTarget = { source: 'diff', identifier: url };
    const prUrl = `${this.apiUrl}/repos/${repo}/pulls/${number}`;

    const pr = await getJson(prUrl, this.headers, pullRequestSchema, target);
    const files = await this.listFiles(prUrl, target);

    return {
      number: pr.number,
      title: pr.title,
      description: pr.body ?? '',
      author: pr.user?.login ?? 'unknown',
      state: pr.state,
      baseBranch: pr.base.ref,
      headBranch: pr.head.ref,
      files,
    };
  }

  private async listFiles(prUrl: string, target: RequestTarget): Promise<FileChange[]> {
    const files: FileChange[] = [];

    for (let page = 1; ; page++) {
      const batch = await getJson(
        `${prUrl}/files?per_page=${GITHUB_PAGE_SIZE}&page=${page}`,
        this.headers,
        pullRequestFilesSchema,
        target,
      );

      for (const file of batch) {
        files.push({
          path: file.filename,
          changeKind: toChangeKind(file.status),
          additions: file.additions,
          deletions: file.deletions,
          ...(file.patch !== undefined ? { patch: file.patch } : {}),
          isTestFile: this.isTestFile(file.filename),
        });
      }

      if (batch.length < GITHUB_PAGE_SIZE) break;
    }

    return files;
  }
}
