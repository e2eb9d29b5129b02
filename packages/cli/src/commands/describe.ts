/**
 * binswap describe
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatAppSpec, getSwitchService } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { confirm } from '../prompt.js';
import { requireTaggedSpec } from './app-spec.js';

interface DescribeOptions {
  description?: string;
}

export const describeCommand = new Command('describe')
  .description("Set a tag's description; without -d the description is removed")
  .argument('<app>', 'Application and tag: app@tag')
  .option('-d, --description <text>', 'Description shown by list')
  .action(
    withErrorHandling('describe', async (spec: string, options: DescribeOptions) => {
      const { appName, tag } = requireTaggedSpec(spec);

      if (options.description === undefined) {
        if (!(await confirm('Description will be deleted, are you sure?'))) {
          console.log(chalk.gray('\n  Cancelled.\n'));
          return;
        }
      }

      await getSwitchService().describe(appName, tag, options.description);
      console.log(chalk.green(`\n  ✓ Updated ${formatAppSpec(appName, tag)}\n`));
    })
  );
