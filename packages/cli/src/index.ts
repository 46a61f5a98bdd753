#!/usr/bin/env node

/**
 * @standup-report/cli - Main CLI entry point.
 * `standup` builds the daily report; `standup init` writes a config.
 */

// Load .env from the working directory; existing variables win.
import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { registerInitCommand } from './commands/init.js';
import { registerReportCommand } from './commands/report.js';

const program = new Command();

program
  .name('standup')
  .version('0.1.0')
  .description('Daily standup report from Plane issues and GitHub commits');

registerReportCommand(program);
registerInitCommand(program);

// Global error handler
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    if (error instanceof Error) {
      console.error(chalk.red(`\nError: ${error.message}`));
      if (process.env.STANDUP_DEBUG) {
        console.error(chalk.gray(error.stack ?? ''));
      }
      process.exit(1);
    }
  }
}

void main();
