/**
 * binswap config
 *
 * Show resolved locations and the registry document
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getLogPath, getSwitchService, serializeRegistry } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';

interface ConfigOptions {
  json?: boolean;
}

export const configCommand = new Command('config')
  .description('Show binswap locations and the registry')
  .option('--json', 'Output as JSON')
  .action(
    withErrorHandling('config', async (options: ConfigOptions) => {
      const service = getSwitchService();
      const { settings } = service;
      const document = serializeRegistry(await service.registry());

      if (options.json) {
        console.log(JSON.stringify({ settings, registry: JSON.parse(document) }, null, 2));
        return;
      }

      console.log(chalk.bold('\n  binswap configuration\n'));
      console.log(chalk.white(`    Registry:  ${settings.configPath}`));
      console.log(chalk.white(`    Launchers: ${settings.binDir}`));
      console.log(chalk.white(`    Storage:   ${settings.dataDir}`));
      console.log(chalk.white(`    Debug log: ${getLogPath()}`));
      console.log('');
      console.log(document);
    })
  );
