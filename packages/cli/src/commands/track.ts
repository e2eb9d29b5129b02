/**
 * binswap track
 *
 * Track an executable file or a shell command under an application tag
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { formatAppSpec, getSwitchService, parseAppSpec } from '@binswap/registry';
import type { TrackResult } from '@binswap/registry';
import { withErrorHandling } from '../error-handler.js';
import { parseEnvPairs } from '../format.js';

interface TrackPathOptions {
  copy?: boolean;
  description?: string;
  force?: boolean;
}

interface TrackCommandOptions {
  workingDirectory?: string;
  env?: string[];
  description?: string;
  force?: boolean;
}

function printTracked(result: TrackResult): void {
  console.log(chalk.green(`\n  ✓ Tracked ${formatAppSpec(result.appName, result.tag)}`));
  if (result.reinstalled) {
    console.log(chalk.gray('  The tag is active; its launcher was updated.'));
  } else {
    console.log(chalk.gray(`  Activate it with: binswap use ${formatAppSpec(result.appName, result.tag)}`));
  }
  console.log('');
}

const trackPathCommand = new Command('path')
  .description('Track an executable file')
  .argument('<app>', 'Application, optionally with a tag: app@tag (derived from the file contents if omitted)')
  .argument('<path>', 'File to track')
  .option('-c, --copy', 'Copy the file into managed storage')
  .option('-d, --description <text>', 'Description shown by list')
  .option('-f, --force', 'Replace a launcher binswap did not create')
  .action(
    withErrorHandling('track path', async (spec: string, file: string, options: TrackPathOptions) => {
      const { appName, tag } = parseAppSpec(spec);
      const service = getSwitchService();
      const spinner = options.copy ? ora('Copying into managed storage...').start() : null;

      let result: TrackResult;
      try {
        result = await service.trackPath({
          app: appName,
          tag,
          path: file,
          copy: options.copy,
          description: options.description,
          force: options.force,
        });
      } catch (error) {
        spinner?.fail('Could not track file');
        throw error;
      }

      spinner?.succeed('Copied into managed storage');
      printTracked(result);
    })
  );

const trackCommandCommand = new Command('command')
  .description('Track a shell command, run through a wrapper script')
  .argument('<app>', 'Application and tag: app@tag')
  .argument('<command>', 'Command line to run')
  .option('-w, --working-directory <dir>', 'Directory to run in (defaults to the caller\'s directory)')
  .option('-e, --env <KEY=VALUE...>', 'Environment variables to set')
  .option('-d, --description <text>', 'Description shown by list')
  .option('-f, --force', 'Replace a launcher binswap did not create')
  .action(
    withErrorHandling('track command', async (spec: string, commandLine: string, options: TrackCommandOptions) => {
      const { appName, tag } = parseAppSpec(spec);
      const result = await getSwitchService().trackCommand({
        app: appName,
        tag,
        command: commandLine,
        workingDirectory: options.workingDirectory,
        env: parseEnvPairs(options.env),
        description: options.description,
        force: options.force,
      });
      printTracked(result);
    })
  );

export const trackCommand = new Command('track')
  .description('Track a file or command under an application tag')
  .addCommand(trackPathCommand)
  .addCommand(trackCommandCommand);
