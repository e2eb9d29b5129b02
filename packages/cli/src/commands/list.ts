/**
 * binswap list
 *
 * List tracked applications and their tags
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SwitchError, formatAppSpec, getSwitchService } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { formatListRows } from '../format.js';
import type { Painter } from '../format.js';

interface ListCommandOptions {
  all?: boolean;
  short?: boolean;
  currentTag?: boolean;
  json?: boolean;
}

const chalkPainter: Painter = {
  app: (text) => chalk.bold.cyan(text),
  tag: (text) => chalk.magenta(text),
  marker: (text) => chalk.bold.green(text),
  path: (text) => chalk.white(text),
  command: (text) => chalk.yellow(text),
  muted: (text) => chalk.gray(text),
};

export const listCommand = new Command('list')
  .description('List tracked applications')
  .argument('[app]', 'Only show this application')
  .option('-a, --all', 'Show every tag, not only active ones')
  .option('-s, --short', 'Show tags without their targets')
  .option('-t, --current-tag', "Print only the application's active tag")
  .option('--json', 'Output as JSON')
  .action(
    withErrorHandling('list', async (appName: string | undefined, options: ListCommandOptions) => {
      const service = getSwitchService();

      if (options.currentTag) {
        const active = await service.list({ app: appName });
        if (appName === undefined) {
          // One app@tag line per application with an active tag
          for (const row of active) console.log(formatAppSpec(row.appName, row.tag));
          return;
        }
        const [row] = active;
        if (!row) {
          throw new SwitchError('NoActiveTag', `Application ${appName} doesn't have an active tag`, { appName });
        }
        console.log(row.tag);
        return;
      }

      const rows = await service.list({ app: appName, all: options.all });

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      const applications = await service.listApplications();
      if (applications.length === 0) {
        console.log(chalk.gray('\n  No applications tracked.\n'));
        console.log(chalk.cyan('  To track one:'));
        console.log(chalk.gray('    binswap track path python@3.8 /usr/bin/python3.8\n'));
        return;
      }

      if (rows.length === 0) {
        console.log(chalk.gray('\n  No active tags. Use --all to show every tag.\n'));
        return;
      }

      console.log('');
      for (const line of formatListRows(rows, { short: options.short, applications }, chalkPainter)) {
        console.log(line === '' ? line : `  ${line}`);
      }
      console.log('');
    })
  );
