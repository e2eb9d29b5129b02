/**
 * binswap unlink
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { assertAppName, getSwitchService } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';

interface UnlinkOptions {
  force?: boolean;
}

export const unlinkCommand = new Command('unlink')
  .description('Remove the launcher and clear the active tag, keeping every tag')
  .argument('<app>', 'Application name')
  .option('-f, --force', 'Remove the launcher even if binswap did not create it')
  .action(
    withErrorHandling('unlink', async (appName: string, options: UnlinkOptions) => {
      assertAppName(appName);
      await getSwitchService().unlink(appName, { force: options.force });
      console.log(chalk.green(`\n  ✓ ${appName} unlinked\n`));
    })
  );
