import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, loadConfig, parseConfigEntry, saveConfig } from '@quotascope/core';

export const configCommand = new Command('config')
  .description('View and modify quotascope configuration');

configCommand
  .command('show')
  .description('Show the effective configuration (file + environment)')
  .action(async () => {
    const config = await loadConfig();
    console.log(chalk.bold('quotascope configuration'));
    console.log();
    console.log(JSON.stringify(config, null, 2));
  });

configCommand
  .command('set')
  .description('Set a configuration value')
  .argument('<key>', 'Config key')
  .argument('<value>', 'Config value')
  .action(async (key: string, value: string) => {
    await saveConfig(parseConfigEntry(key, value));
    console.log(chalk.green(`✓ Set ${key} = ${value}`));
  });

configCommand
  .command('path')
  .description('Show config file path')
  .action(async () => {
    const config = await loadConfig();
    console.log(getConfigPath(config.configDir));
  });
