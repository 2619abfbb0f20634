import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig, QuotaService } from '@quotascope/core';
import { renderReport, type ReportView } from '../format.js';

interface QuotaOptions {
  json?: boolean;
  view: ReportView;
}

export const quotaCommand = new Command('quota')
  .description('Fetch one quota report from the running language server')
  .option('--json', 'Print the raw report as JSON')
  .addOption(new Option('--view <view>', 'Group by pool or list models').choices(['pools', 'models']).default('pools'))
  .action(async (opts: QuotaOptions) => {
    const config = await loadConfig();
    const service = new QuotaService({
      requestTimeoutMs: config.requestTimeoutMs,
      processName: config.processName,
    });

    try {
      const result = await service.getQuotaReport();
      if (!result.success) {
        if (opts.json) {
          console.log(JSON.stringify({ error: result.error.message, type: result.error.type }, null, 2));
        } else {
          console.error(chalk.red(`✗ ${result.error.message}`));
        }
        process.exitCode = 1;
        return;
      }

      console.log(opts.json
        ? JSON.stringify(result.report, null, 2)
        : renderReport(result.report, { view: opts.view }));
    } finally {
      await service.close();
    }
  });
