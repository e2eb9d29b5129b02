/**
 * binswap use
 *
 * Point an application's launcher at one of its tags
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatAppSpec, getSwitchService, parseAppSpec } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { binDirOnPath } from '../format.js';
import { pickTag } from '../prompt.js';

interface UseOptions {
  pick?: boolean;
  force?: boolean;
}

export const useCommand = new Command('use')
  .description('Select which tag of an application runs')
  .argument('<app>', 'Application, optionally with a tag: app@tag (reinstalls the active tag if omitted)')
  .option('-p, --pick', 'Choose the tag from a list')
  .option('-f, --force', 'Replace a launcher binswap did not create')
  .action(
    withErrorHandling('use', async (spec: string, options: UseOptions) => {
      const service = getSwitchService();
      const parsed = parseAppSpec(spec);

      let tag = parsed.tag;
      if (tag === undefined && options.pick) {
        const rows = await service.list({ app: parsed.appName, all: true });
        tag = await pickTag(parsed.appName, rows, `Tag of ${parsed.appName} to use:`);
      }

      const result = await service.use(parsed.appName, tag, { force: options.force });
      console.log(chalk.green(`\n  ✓ Using ${formatAppSpec(result.appName, result.tag)}`));
      console.log(chalk.gray(`  Launcher: ${result.launcherPath}\n`));

      if (!binDirOnPath(service.settings.binDir, process.env.PATH ?? '')) {
        console.log(chalk.yellow(`  ${service.settings.binDir} is not on your PATH.`));
        console.log(chalk.gray(`  Add it to run ${result.appName} directly.\n`));
      }
    })
  );
