/**
 * Admin CLI commands
 * config
 */

import { Command } from 'commander';
import { getConfig, type Config } from '../../config/index.js';

/** Options for the config command */
export interface ConfigOptions {
  json?: boolean;
}

const CONFIG_LABELS: Array<[keyof Config, string]> = [
  ['logLevel', 'Log level'],
  ['logFormat', 'Log format'],
  ['splitMode', 'Split mode'],
  ['filePrefix', 'File prefix'],
  ['bookTitle', 'Book title'],
  ['progressInterval', 'Progress interval'],
];

/**
 * Render the configuration as aligned "label: value" lines
 */
export function formatConfig(config: Config): string[] {
  const width = Math.max(...CONFIG_LABELS.map(([, label]) => label.length));
  return CONFIG_LABELS.map(([key, label]) => `  ${`${label}:`.padEnd(width + 1)} ${String(config[key])}`);
}

/**
 * Register admin commands on the program
 */
export function registerAdminCommands(program: Command): void {
  program
    .command('config')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action((options: ConfigOptions) => {
      const config = getConfig();
      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
      } else {
        console.log('Configuration:');
        for (const line of formatConfig(config)) {
          console.log(line);
        }
      }
    });
}
