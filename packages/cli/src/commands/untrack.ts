/**
 * binswap untrack
 *
 * Forget a tag of an application
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatAppSpec, getSwitchService, parseAppSpec } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { pickTag } from '../prompt.js';

interface UntrackOptions {
  force?: boolean;
}

export const untrackCommand = new Command('untrack')
  .description('Remove a tag; untracking the active tag removes the launcher')
  .argument('<app>', 'Application and tag: app@tag (choose from a list if the tag is omitted)')
  .option('-f, --force', 'Remove the launcher even if binswap did not create it')
  .action(
    withErrorHandling('untrack', async (spec: string, options: UntrackOptions) => {
      const service = getSwitchService();
      const { appName, tag: givenTag } = parseAppSpec(spec);

      let tag = givenTag;
      if (tag === undefined) {
        const rows = await service.list({ app: appName, all: true });
        tag = await pickTag(appName, rows, `Tag of ${appName} to untrack:`);
      }

      await service.untrack(appName, tag, { force: options.force });
      console.log(chalk.green(`\n  ✓ Untracked ${formatAppSpec(appName, tag)}\n`));
    })
  );
