/**
 * Post or update the review comment on a GitHub pull request (REST API,
 * native fetch).
 *
 * Hidden HTML markers identify an earlier review comment, so re-running a
 * review replaces it instead of adding another.
 */
import { z } from 'zod';
import { ReviewGateError } from '@review-gate/core';
import { GITHUB_API_URL, GITHUB_PAGE_SIZE, githubHeaders } from './api.js';

export const MARKER_START = '<!-- review-gate:start -->';
export const MARKER_END = '<!-- review-gate:end -->';

export interface PostCommentOptions {
  /** GitHub API token allowed to comment on the repository. */
  token: string;
  /** Repository in "owner/repo" format. */
  repo: string;
  prNumber: number;
  /** Markdown body of the comment (markers are added automatically). */
  body: string;
  apiUrl?: string;
}

const commentListSchema = z.array(
  z.object({
    id: z.number(),
    body: z.string().nullish(),
  }),
);

const savedCommentSchema = z.object({ html_url: z.string() });

/**
 * Post a new comment or update the one carrying the review-gate marker.
 *
 * Returns the comment URL on success or throws on failure.
 */
export async function postOrUpdateComment(opts: PostCommentOptions): Promise<string> {
  const { token, repo, prNumber, body } = opts;
  const apiUrl = opts.apiUrl ?? GITHUB_API_URL;
  const markedBody = `${MARKER_START}\n${body}\n${MARKER_END}`;

  const commentsUrl = `${apiUrl}/repos/${repo}/issues/${prNumber}/comments`;
  const headers = githubHeaders(token);

  // 1. Find existing comment with our marker
  const existingId = await findExistingComment(commentsUrl, headers);

  // 2. Update it, or create a new one
  const [url, method, action] =
    existingId !== null
      ? [`${apiUrl}/repos/${repo}/issues/comments/${existingId}`, 'PATCH', 'updating']
      : [commentsUrl, 'POST', 'creating'];

  const res = await fetch(url, {
    method,
    headers: { ...headers, 'Content-Type': 'application/json' },
    body: JSON.stringify({ body: markedBody }),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new ReviewGateError(`GitHub API error ${action} comment: ${res.status} ${text}`);
  }

  const saved = savedCommentSchema.safeParse(await res.json());
  if (!saved.success) {
    throw new ReviewGateError(`GitHub API returned an unexpected response ${action} comment`);
  }
  return saved.data.html_url;
}

/**
 * Search through paginated issue comments to find one with our marker.
 */
async function findExistingComment(
  commentsUrl: string,
  headers: Record<string, string>,
): Promise<number | null> {
  for (let page = 1; ; page++) {
    const res = await fetch(`${commentsUrl}?per_page=${GITHUB_PAGE_SIZE}&page=${page}`, { method: 'GET', headers });

    // If we can't list comments, treat as "no existing comment"
    if (!res.ok) return null;

    const parsed = commentListSchema.safeParse(await res.json());
    if (!parsed.success) return null;

    const comments = parsed.data;
    const marked = comments.find((comment) => comment.body?.includes(MARKER_START));
    if (marked) return marked.id;

    if (comments.length < GITHUB_PAGE_SIZE) return null;
  }
}
