import { z } from 'zod';
import { ReviewLogger, TicketInfo, errorMessage } from '@review-gate/core';
import type { JiraCredentials } from '../config/load-config.js';
import { getJson } from './http.js';
import { extractPullRequestUrls, extractTicketKey, parseTicketDescription } from './ticket-parser.js';

const ISSUE_FIELDS = 'summary,description,status,priority,issuetype,issuelinks';

const namedSchema = z.object({ name: z.string() });

const linkedIssueSchema = z.object({
  key: z.string(),
  fields: z.object({ summary: z.string().nullish() }).partial().optional(),
});

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string(),
    description: z.string().nullish(),
    status: namedSchema,
    priority: namedSchema.nullish(),
    issuetype: namedSchema,
    issuelinks: z
      .array(
        z.object({
          inwardIssue: linkedIssueSchema.optional(),
          outwardIssue: linkedIssueSchema.optional(),
        }),
      )
      .nullish(),
  }),
});

const commentsSchema = z.object({
  comments: z.array(z.object({ body: z.string().nullish() })),
});

type JiraIssue = z.infer<typeof issueSchema>;

export interface JiraClientOptions {
  logger?: ReviewLogger;
}

/**
 * Reads tickets from the Jira REST API (v2) with basic auth.
 */
export class JiraClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly logger?: ReviewLogger;

  constructor(credentials: JiraCredentials, options: JiraClientOptions = {}) {
    this.baseUrl = credentials.server.replace(/\/+$/, '');
    const auth = Buffer.from(`${credentials.username}:${credentials.token}`).toString('base64');
    this.headers = {
      Authorization: `Basic ${auth}`,
      Accept: 'application/json',
    };
    this.logger = options.logger;
  }

  /**
   * Fetch a ticket by key or browse URL and extract the problem statement,
   * acceptance criteria and linked pull requests.
   */
  async getTicket(keyOrUrl: string): Promise<TicketInfo> {
    const key = extractTicketKey(keyOrUrl);
    const issue = await getJson(
      `${this.baseUrl}/rest/api/2/issue/${encodeURIComponent(key)}?fields=${ISSUE_FIELDS}`,
      this.headers,
      issueSchema,
      { source: 'ticket', identifier: key },
    );

    const { problemDescription, acceptanceCriteria } = parseTicketDescription(issue.fields.description);

    return {
      key: issue.key,
      summary: issue.fields.summary,
      problemDescription,
      acceptanceCriteria,
      linkedPrs: await this.findLinkedPullRequests(issue),
      status: issue.fields.status.name,
      priority: issue.fields.priority?.name ?? 'Unknown',
      issueType: issue.fields.issuetype.name,
    };
  }

  /**
   * Pull request URLs from issue links, comments and the description, in
   * first-seen order without duplicates.
   */
  private async findLinkedPullRequests(issue: JiraIssue): Promise<string[]> {
    const urls: string[] = [];

    for (const link of issue.fields.issuelinks ?? []) {
      const linked = link.inwardIssue ?? link.outwardIssue;
      urls.push(...extractPullRequestUrls(linked?.fields?.summary));
    }

    for (const body of await this.fetchCommentBodies(issue.key)) {
      urls.push(...extractPullRequestUrls(body));
    }

    urls.push(...extractPullRequestUrls(issue.fields.description));

    return [...new Set(urls)];
  }

  private async fetchCommentBodies(key: string): Promise<string[]> {
    try {
      const { comments } = await getJson(
        `${this.baseUrl}/rest/api/2/issue/${encodeURIComponent(key)}/comment`,
        this.headers,
        commentsSchema,
        { source: 'ticket', identifier: key },
      );
      return comments.flatMap((c) => (c.body ? [c.body] : []));
    } catch (error) {
      this.logger?.warn(`Could not fetch comments for ${key}: ${errorMessage(error)}`);
      return [];
    }
  }
}
