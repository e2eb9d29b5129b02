/**
 * @binswap/cli
 *
 * CLI entry point for binswap commands.
 */

import { Command } from 'commander';
import {
  // Tracking commands
  trackCommand,
  untrackCommand,
  renameTagCommand,
  describeCommand,
  // Switching commands
  useCommand,
  unlinkCommand,
  runCommand,
  // Inspection commands
  listCommand,
  configCommand,
} from './commands/index.js';

const program = new Command();

program
  .name('binswap')
  .description('Switch between tagged versions of a command')
  .version('0.1.0')
  .enablePositionalOptions();

// Tracking commands
program.addCommand(trackCommand);
program.addCommand(untrackCommand);
program.addCommand(renameTagCommand);
program.addCommand(describeCommand);

// Switching commands
program.addCommand(useCommand);
program.addCommand(unlinkCommand);
program.addCommand(runCommand);

// Inspection commands
program.addCommand(listCommand);
program.addCommand(configCommand);

await program.parseAsync(process.argv);
