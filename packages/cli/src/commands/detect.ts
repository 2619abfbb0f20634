import { Command } from 'commander';
import chalk from 'chalk';
import { ConnectionCache, loadConfig } from '@quotascope/core';

export const detectCommand = new Command('detect')
  .description('Locate the language server and its API port without fetching quota')
  .option('--json', 'Print the connection as JSON')
  .action(async (opts: { json?: boolean }) => {
    const config = await loadConfig();
    const cache = new ConnectionCache({
      requestTimeoutMs: config.requestTimeoutMs,
      processName: config.processName,
    });

    try {
      const lease = await cache.get();
      if (!lease) {
        console.error(chalk.red('✗ Language server not found'));
        process.exitCode = 1;
        return;
      }

      const { connection } = lease;
      if (opts.json) {
        console.log(JSON.stringify({
          pid: connection.pid,
          port: connection.port,
          advertisedPort: connection.advertisedPort,
        }, null, 2));
        return;
      }
      console.log(chalk.green('✓ Language server found'));
      console.log(chalk.white('  PID:             ') + chalk.cyan(String(connection.pid)));
      console.log(chalk.white('  API port:        ') + chalk.cyan(String(connection.port)));
      console.log(chalk.white('  Advertised port: ') + chalk.cyan(connection.advertisedPort ? String(connection.advertisedPort) : '-'));
    } finally {
      await cache.reset();
    }
  });
