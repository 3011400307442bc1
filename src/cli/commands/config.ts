/**
 * Config Command
 *
 * Manages ~/.concierge/config.toml via CLI:
 *   concierge config get <key>          - Get a specific value
 *   concierge config set <key> <value>  - Set a value (validated before saving)
 *   concierge config list               - Show all configuration
 *   concierge config path               - Show config file location
 *
 * Invalid keys and values throw ConfigError, which exits with code 2.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands.
 *
 * @param configPath - Resolved per call so CONCIERGE_HOME changes are seen
 */
export function createConfigCommand(
  getContext: () => CommandContext,
  configPath: () => string = getConfigPath
): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  // concierge config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., concierge config get retrieval.top_k)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key, configPath());

      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, 'Run: concierge config list  to see all available keys');
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // concierge config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., concierge config set retrieval.top_k 6)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      const path = configPath();
      setConfigValue(key, value, path);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key, path) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  // concierge config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const path = configPath();
      const entries = listConfig(path);

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${path}`));
    });

  // concierge config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const path = configPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path }));
      } else {
        ctx.log(path);
      }
    });

  return configCmd;
}
