/**
 * `standup init` command.
 *
 * Writes a commented default .standup.yml into the project directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import { CONFIG_FILENAME, writeDefaultConfig } from '@standup-report/core';

/** Prompt the user for a line of input */
function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Write a default ${CONFIG_FILENAME}`)
    .option('--path <dir>', 'Project directory', '.')
    .option('--force', 'Overwrite an existing file without asking')
    .option('--non-interactive', 'Never prompt; keep an existing file')
    .action(
      async (options: { path: string; force?: boolean; nonInteractive?: boolean }) => {
        const projectDir = path.resolve(options.path);
        const configPath = path.join(projectDir, CONFIG_FILENAME);

        if (fs.existsSync(configPath) && !options.force) {
          const overwrite = options.nonInteractive
            ? 'n'
            : await prompt(
                chalk.yellow(`  ${CONFIG_FILENAME} already exists. Overwrite? (y/N): `)
              );
          if (overwrite.toLowerCase() !== 'y') {
            console.log(chalk.gray('  Keeping existing configuration.\n'));
            return;
          }
        }

        const writtenPath = writeDefaultConfig(projectDir);
        console.log(chalk.green(`\n  ✓ Configuration written to ${chalk.bold(writtenPath)}`));
        console.log(chalk.gray('  Secrets are read from the environment or a .env file:'));
        console.log(
          chalk.cyan(
            '    PLANE_API_KEY, PLANE_WORKSPACE_SLUG, GITHUB_TOKEN, GITHUB_ORG,\n' +
              '    GITHUB_USERNAME, SLACK_BOT_TOKEN, SLACK_USER_ID\n'
          )
        );
      }
    );
}
