/**
 * Turn failures into a one-line message, a hint and a non-zero exit
 */

import chalk from 'chalk';
import { getLogPath, isSwitchError, logFullError } from '@binswap/registry';
import type { SwitchErrorCode } from '@binswap/registry';

const HINTS: Partial<Record<SwitchErrorCode, string>> = {
  CorruptRegistry: 'Fix or remove the registry file, then retry.',
  TargetMissing: 'Track the tag again, or untrack it.',
  NoActiveTag: 'Select a tag first: binswap use <app>@<tag>',
  UnknownApplication: 'Run `binswap list` to see tracked applications.',
  UnknownTag: 'Run `binswap list <app> --all` to see its tags.',
  MissingTag: 'Name the tag as <app>@<tag>.',
  AmbiguousTag: 'Name the tag as <app>@<tag>.',
};

export interface Failure {
  message: string;
  hint?: string;
}

export function describeFailure(error: unknown): Failure {
  if (isSwitchError(error)) {
    const hint = HINTS[error.code];
    return hint ? { message: error.message, hint } : { message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { message: `Unexpected error: ${message}`, hint: `Details in ${getLogPath()}` };
}

export function reportError(context: string, error: unknown): void {
  logFullError(context, error);
  const failure = describeFailure(error);
  console.error(chalk.red(`\n  Error: ${failure.message}`));
  if (failure.hint) {
    console.error(chalk.gray(`  ${failure.hint}`));
  }
  console.error('');
}

/**
 * Wrap a command action so failures are logged and exit with status 1
 */
export function withErrorHandling<A extends unknown[]>(
  context: string,
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(context, error);
      process.exit(1);
    }
  };
}
