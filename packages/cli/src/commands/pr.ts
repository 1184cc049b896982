import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { DiffSummary, errorMessage, summarizeDiff } from '@review-gate/core';
import { githubToken, loadConfig } from '../config/load-config.js';
import { createLogger } from '../logger.js';
import { GitHubClient } from '../sources/github-client.js';
import { FATAL_EXIT_CODE } from './exit-codes.js';

const DESCRIPTION_PREVIEW_LENGTH = 200;

const prOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

export function formatPullRequest(diff: DiffSummary): string {
  const totals = summarizeDiff(diff);
  const description =
    diff.description.length > DESCRIPTION_PREVIEW_LENGTH
      ? `${diff.description.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`
      : diff.description;

  const lines = [
    chalk.bold(diff.number !== undefined ? `PR #${diff.number}: ${diff.title}` : diff.title),
    `Author: ${diff.author}`,
    `State: ${diff.state}`,
    `Base: ${diff.baseBranch} -> Head: ${diff.headBranch}`,
    `Files changed: ${totals.filesChanged}`,
    `Changes: ${chalk.green(`+${totals.additions}`)}, ${chalk.red(`-${totals.deletions}`)}`,
    '',
    chalk.bold('Description:'),
    description,
    '',
    chalk.bold('Files:'),
    ...diff.files.map((f) => `  ${f.changeKind}: ${f.path}${f.isTestFile ? chalk.cyan(' (test)') : ''}`),
  ];
  return lines.join('\n');
}

export function registerPrCommand(program: Command): void {
  program
    .command('pr')
    .description('Show a pull request and its changed files')
    .argument('<url>', 'GitHub pull request URL')
    .option('--config <file>', 'Config file (default: review-gate.config.json)')
    .option('--verbose', 'Print debug output')
    .action(async (url: string, rawOpts: unknown) => {
      const spinner = ora({ text: `Fetching ${url}...`, stream: process.stderr }).start();
      try {
        const opts = prOptionsSchema.parse(rawOpts);
        const logger = createLogger({ verbose: opts.verbose });
        const config = await loadConfig({ path: opts.config, logger });

        const github = new GitHubClient({ token: githubToken(), testPatterns: config.review.testPatterns });
        const diff = await github.getPullRequestDiff(url);
        spinner.stop();
        console.log(formatPullRequest(diff));
      } catch (err) {
        spinner.fail('Failed to fetch pull request');
        console.error(chalk.red(errorMessage(err)));
        process.exit(FATAL_EXIT_CODE);
      }
    });
}
