/**
 * binswap rename-tag
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatAppSpec, getSwitchService } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { requireTaggedSpec } from './app-spec.js';

interface RenameTagOptions {
  force?: boolean;
}

export const renameTagCommand = new Command('rename-tag')
  .description('Rename a tag; an active tag stays active')
  .argument('<app>', 'Application and tag: app@tag')
  .argument('<newTag>', 'New tag name')
  .option('-f, --force', 'Replace a launcher binswap did not create')
  .action(
    withErrorHandling('rename-tag', async (spec: string, newTag: string, options: RenameTagOptions) => {
      const { appName, tag } = requireTaggedSpec(spec);
      await getSwitchService().renameTag(appName, tag, newTag, { force: options.force });
      console.log(chalk.green(`\n  ✓ Renamed ${formatAppSpec(appName, tag)} to ${formatAppSpec(appName, newTag)}\n`));
    })
  );
