import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import {
  ConfigError,
  DiffSummary,
  ReviewMetadata,
  ReviewResult,
  ReviewStatus,
  TicketInfo,
  createModelBackend,
  createReviewEngine,
  errorMessage,
  formatJSON,
  formatMarkdown,
} from '@review-gate/core';
import {
  assertCredentials,
  backendConfig,
  githubToken,
  jiraCredentials,
  loadConfig,
  qualityConfig,
} from '../config/load-config.js';
import { createLogger, CliLogger } from '../logger.js';
import { JiraClient } from '../sources/jira-client.js';
import { GitHubClient, parsePullRequestUrl } from '../sources/github-client.js';
import { GitDiffSource } from '../sources/git-diff-source.js';
import { postOrUpdateComment } from '../github/comment-poster.js';
import { formatConsole } from '../formatting/console-reporter.js';
import { EXIT_CODES, FATAL_EXIT_CODE } from './exit-codes.js';

export const OUTPUT_FORMATS = ['console', 'md', 'json'] as const;

const reviewOptionsSchema = z.object({
  pr: z.array(z.string()).optional(),
  base: z.string().optional(),
  head: z.string().default('HEAD'),
  repo: z.string(),
  format: z.enum(OUTPUT_FORMATS).default('console'),
  output: z.string().optional(),
  config: z.string().optional(),
  comment: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ReviewOptions = z.infer<typeof reviewOptionsSchema>;

export function renderReport(
  format: ReviewOptions['format'],
  result: ReviewResult,
  metadata: ReviewMetadata,
): string {
  switch (format) {
    case 'json':
      return formatJSON(result, metadata);
    case 'md':
      return formatMarkdown(result, metadata);
    case 'console':
      return formatConsole(result, metadata);
  }
}

/**
 * The pull request to review: the first one named on the command line,
 * otherwise the first one linked from the ticket.
 */
export function selectPullRequest(ticket: TicketInfo, prUrls: string[] | undefined, logger: CliLogger): string {
  const candidates = prUrls && prUrls.length > 0 ? prUrls : ticket.linkedPrs;
  if (candidates.length === 0) {
    throw new ConfigError(
      `No pull request given and none linked from ${ticket.key}; pass --pr <url> or --base <ref>`,
      ['pr'],
    );
  }
  if (candidates.length > 1) {
    logger.warn(`${candidates.length} pull requests found; reviewing ${candidates[0]}`);
  }
  return candidates[0];
}

export function registerReviewCommand(program: Command): void {
  program
    .command('review')
    .description('Review a change against the acceptance criteria of a ticket')
    .argument('<ticket>', 'Ticket key or URL (e.g. AUTH-12)')
    .option('--pr <url...>', 'Pull request URL(s) to review (default: PRs linked from the ticket)')
    .option('--base <ref>', 'Review the local range <base>...<head> instead of a pull request')
    .option('--head <ref>', 'Head ref for a local review', 'HEAD')
    .option('--repo <path>', 'Repository path for a local review', process.cwd())
    .addOption(new Option('--format <type>', 'Output format').choices(OUTPUT_FORMATS).default('console'))
    .option('--output <file>', 'Write to file instead of stdout')
    .option('--config <file>', 'Config file (default: review-gate.config.json)')
    .option('--comment', 'Post the report as a comment on the pull request')
    .option('--verbose', 'Print debug output')
    .action(async (ticketInput: string, rawOpts: unknown) => {
      const spinner = ora({ text: 'Loading configuration...', stream: process.stderr }).start();
      let stage = 'Configuration';
      let status: ReviewStatus;

      try {
        const opts = reviewOptionsSchema.parse(rawOpts);
        const logger = createLogger({ verbose: opts.verbose });
        const local = opts.base !== undefined;

        if (local && opts.comment) {
          throw new ConfigError('--comment needs a pull request; it cannot be combined with --base', ['comment']);
        }

        const config = await loadConfig({ path: opts.config, logger });
        assertCredentials(config, { jira: true, ai: true, github: !local });
        const backend = createModelBackend(backendConfig(config));

        // 1. Ticket
        stage = 'Fetching ticket';
        spinner.text = `Fetching ticket ${ticketInput}...`;
        const ticket = await new JiraClient(jiraCredentials(config), { logger }).getTicket(ticketInput);
        logger.debug(`Found ticket ${ticket.key} - ${ticket.summary}`);
        logger.debug(`Acceptance criteria: ${ticket.acceptanceCriteria.length} item(s)`);

        // 2. Diff
        stage = 'Fetching diff';
        let diff: DiffSummary;
        let prUrl: string | undefined;
        if (opts.base !== undefined) {
          spinner.text = `Reading ${opts.base}...${opts.head}...`;
          diff = await new GitDiffSource({ repoPath: resolve(opts.repo) }).getDiff(opts.base, opts.head);
        } else {
          prUrl = selectPullRequest(ticket, opts.pr, logger);
          spinner.text = `Fetching ${prUrl}...`;
          const github = new GitHubClient({ token: githubToken(), testPatterns: config.review.testPatterns });
          diff = await github.getPullRequestDiff(prUrl);
        }
        logger.debug(`${diff.files.length} file(s) changed`);

        // 3. Review
        stage = 'AI review';
        spinner.text = `Reviewing with ${backend.provider}/${backend.model}...`;
        const result = await createReviewEngine({ backend, logger }).review(ticket, diff, qualityConfig(config));
        spinner.stop();
        status = result.status;

        // 4. Report
        stage = 'Writing report';
        const metadata: ReviewMetadata = {
          ticketKey: ticket.key,
          ticketSummary: ticket.summary,
          prNumber: diff.number,
          prTitle: diff.title,
          author: diff.author,
          reviewedAt: new Date().toISOString(),
        };
        const output = renderReport(opts.format, result, metadata);

        if (opts.output) {
          await writeFile(resolve(opts.output), output);
          console.log(chalk.green(`Report written to ${opts.output}`));
        } else {
          console.log(output);
        }

        // 5. Comment
        if (opts.comment && prUrl !== undefined) {
          stage = 'Posting comment';
          spinner.start('Posting comment...');
          const { repo, number } = parsePullRequestUrl(prUrl);
          const commentUrl = await postOrUpdateComment({
            token: githubToken(),
            repo,
            prNumber: number,
            body: formatMarkdown(result, metadata),
          });
          spinner.succeed('Comment posted');
          console.error(chalk.green(commentUrl));
        }
      } catch (err) {
        spinner.fail(`${stage} failed`);
        console.error(chalk.red(errorMessage(err)));
        process.exit(FATAL_EXIT_CODE);
        return;
      }

      process.exit(EXIT_CODES[status]);
    });
}
