import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { TicketInfo, errorMessage } from '@review-gate/core';
import { assertCredentials, jiraCredentials, loadConfig } from '../config/load-config.js';
import { createLogger } from '../logger.js';
import { JiraClient } from '../sources/jira-client.js';
import { FATAL_EXIT_CODE } from './exit-codes.js';

const ticketOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

export function formatTicket(ticket: TicketInfo): string {
  const lines = [
    `${chalk.bold('Ticket:')} ${ticket.key}`,
    `${chalk.bold('Summary:')} ${ticket.summary}`,
    `${chalk.bold('Status:')} ${ticket.status}`,
    `${chalk.bold('Priority:')} ${ticket.priority}`,
    `${chalk.bold('Type:')} ${ticket.issueType}`,
    '',
    chalk.bold('Problem Description:'),
    ticket.problemDescription,
    '',
    chalk.bold(`Acceptance Criteria (${ticket.acceptanceCriteria.length}):`),
    ...ticket.acceptanceCriteria.map((criterion, i) => `  ${i + 1}. ${criterion}`),
    '',
    chalk.bold(`Linked PRs (${ticket.linkedPrs.length}):`),
    ...ticket.linkedPrs.map((url) => `  - ${url}`),
  ];
  return lines.join('\n');
}

export function registerTicketCommand(program: Command): void {
  program
    .command('ticket')
    .description('Show what review-gate extracts from a ticket')
    .argument('<ticket>', 'Ticket key or URL (e.g. AUTH-12)')
    .option('--config <file>', 'Config file (default: review-gate.config.json)')
    .option('--verbose', 'Print debug output')
    .action(async (ticketInput: string, rawOpts: unknown) => {
      const spinner = ora({ text: `Fetching ticket ${ticketInput}...`, stream: process.stderr }).start();
      try {
        const opts = ticketOptionsSchema.parse(rawOpts);
        const logger = createLogger({ verbose: opts.verbose });
        const config = await loadConfig({ path: opts.config, logger });
        assertCredentials(config, { jira: true });

        const ticket = await new JiraClient(jiraCredentials(config), { logger }).getTicket(ticketInput);
        spinner.stop();
        console.log(formatTicket(ticket));
      } catch (err) {
        spinner.fail('Failed to fetch ticket');
        console.error(chalk.red(errorMessage(err)));
        process.exit(FATAL_EXIT_CODE);
      }
    });
}
