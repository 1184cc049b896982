#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { registerReviewCommand } from './commands/review.js';
import { registerTicketCommand } from './commands/ticket.js';
import { registerPrCommand } from './commands/pr.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json') as { version: string };

const program = new Command();
program
  .name('rgate')
  .description('review-gate: review a change against the acceptance criteria of its ticket')
  .version(version);

registerReviewCommand(program);
registerTicketCommand(program);
registerPrCommand(program);

await program.parseAsync();
