#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { serveCommand } from './commands/serve.js';
import { quotaCommand } from './commands/quota.js';
import { detectCommand } from './commands/detect.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('quotascope')
  .description('Local quota monitor for the Antigravity language server')
  .version('0.1.0');

program.addCommand(quotaCommand);
program.addCommand(serveCommand);
program.addCommand(detectCommand);
program.addCommand(configCommand);

try {
  await program.parseAsync();
} catch (err) {
  console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
  process.exitCode = 1;
}
