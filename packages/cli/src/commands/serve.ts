import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig, QuotaService } from '@quotascope/core';
import { QuotaGateway } from '@quotascope/gateway';
import { parseMillis, parsePort } from '../options.js';

interface ServeOptions {
  port?: number;
  host?: string;
  poll?: number;
  allowOrigin?: string[];
}

export const serveCommand = new Command('serve')
  .description('Start the quota gateway (HTTP API + WebSocket feed)')
  .addOption(new Option('-p, --port <port>', 'Gateway port').argParser(parsePort))
  .option('-H, --host <host>', 'Gateway host')
  .addOption(new Option('--poll <ms>', 'Background poll interval, 0 disables').argParser(parseMillis))
  .option('--allow-origin <origins...>', 'Extra browser origins allowed by CORS')
  .action(async (opts: ServeOptions) => {
    const config = await loadConfig();
    const service = new QuotaService({
      requestTimeoutMs: config.requestTimeoutMs,
      processName: config.processName,
    });
    const gateway = new QuotaGateway({
      service,
      port: opts.port ?? config.gatewayPort,
      host: opts.host ?? config.gatewayHost,
      pollIntervalMs: opts.poll ?? config.pollIntervalMs,
      allowedOrigins: opts.allowOrigin,
    });
    const info = await gateway.start();

    console.log(chalk.green('Quota gateway started'));
    console.log();
    console.log(chalk.white('  HTTP API:  ') + chalk.cyan(`http://${info.host}:${info.port}`));
    console.log(chalk.white('  WebSocket: ') + chalk.cyan(`ws://${info.host}:${info.port}/ws`));
    console.log();
    console.log(chalk.dim('Endpoints:'));
    console.log(chalk.dim('  GET  /healthz               - Health check'));
    console.log(chalk.dim('  GET  /api/quota             - Current quota report'));
    console.log(chalk.dim('  POST /api/quota/invalidate  - Forget the cached connection'));
    console.log(chalk.dim('  GET  /api/connection        - Cached connection, if any'));
    console.log();
    console.log(chalk.gray('Press Ctrl+C to stop'));

    const shutdown = () => {
      console.log(chalk.yellow('\nShutting down...'));
      gateway.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(chalk.red(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`));
          process.exit(1);
        },
      );
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
