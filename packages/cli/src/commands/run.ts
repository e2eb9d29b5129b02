/**
 * binswap run
 *
 * Run an application's active tag with extra arguments
 */

import { Command } from 'commander';
import { assertAppName, createCommandLogger, getSwitchService } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { runPlan } from '../run.js';

const logger = createCommandLogger('run');

export const runCommand = new Command('run')
  .description('Run the active tag of an application, passing arguments through')
  .argument('<app>', 'Application name')
  .argument('[args...]', 'Arguments for the application')
  .passThroughOptions()
  .action(
    withErrorHandling('run', async (appName: string, args: string[]) => {
      assertAppName(appName);
      const plan = await getSwitchService().planRun(appName);
      logger.command(plan.command, { tag: plan.tag, args, cwd: plan.cwd });

      const status = await runPlan(plan, args);
      logger.debug(`exited with ${status}`);
      process.exit(status);
    })
  );
