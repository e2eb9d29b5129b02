/**
 * Launchers in the personal binary directory
 *
 * A launcher is <binDir>/<app>: a symlink for path entries, or a small shell
 * script for command entries. Both are installed through the same
 * temp-then-rename primitive.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { replaceAtomically } from './atomic.js';
import { SwitchError, describeCause, errnoCode } from './errors.js';
import { logDebug } from './logger.js';
import { formatAppSpec } from './names.js';
import type { LauncherArtifact, LauncherState, ResolvedTarget } from './types.js';

export const LAUNCHER_MARKER = '# binswap launcher:';

// Scripts we generate are tiny; anything larger is not ours
const MAX_SCRIPT_SIZE = 64 * 1024;

/**
 * Quote a value for POSIX sh
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Wrapper script that runs a command line in its working directory,
 * forwarding the launcher's arguments
 */
export function renderWrapperScript(
  target: Extract<ResolvedTarget, { kind: 'wrapper' }>,
  appName: string,
  tag: string
): string {
  const lines = [
    '#!/bin/sh',
    `${LAUNCHER_MARKER} ${formatAppSpec(appName, tag)}`,
    `cd ${shellQuote(target.workingDirectory)} || exit 1`,
  ];

  for (const [key, value] of Object.entries(target.env)) {
    lines.push(`export ${key}=${shellQuote(value)}`);
  }

  lines.push(`${target.commandLine} "$@"`);
  return lines.join('\n') + '\n';
}

export function toArtifact(target: ResolvedTarget, appName: string, tag: string): LauncherArtifact {
  switch (target.kind) {
    case 'link':
      return { kind: 'symlink', target: target.path };
    case 'wrapper':
      return { kind: 'script', content: renderWrapperScript(target, appName, tag) };
  }
}

/**
 * Inspect whatever is at a launcher path
 */
export async function readLauncher(launcherPath: string): Promise<LauncherState> {
  let stats: Stats;
  try {
    stats = await fs.lstat(launcherPath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return { kind: 'missing' };
    throw err;
  }

  if (stats.isSymbolicLink()) {
    return { kind: 'symlink', target: await fs.readlink(launcherPath) };
  }

  if (!stats.isFile()) {
    return { kind: 'foreign', reason: 'directory or special file' };
  }

  if (stats.size > MAX_SCRIPT_SIZE) {
    return { kind: 'foreign', reason: 'regular file not created by binswap' };
  }

  const content = await fs.readFile(launcherPath, 'utf-8');
  if (!content.split('\n').some((line) => line.startsWith(LAUNCHER_MARKER))) {
    return { kind: 'foreign', reason: 'regular file not created by binswap' };
  }
  return { kind: 'script', content };
}

/**
 * Fail unless the launcher is absent, one of our scripts, or a symlink to one
 * of the application's known targets
 */
export function assertLauncherOwned(
  state: LauncherState,
  knownTargets: ReadonlySet<string>,
  appName: string,
  launcherPath: string
): void {
  switch (state.kind) {
    case 'missing':
    case 'script':
      return;
    case 'symlink':
      if (knownTargets.has(state.target)) return;
      throw new SwitchError(
        'UnmanagedLauncher',
        `${launcherPath} links to ${state.target}, which is not tracked for ${appName}; remove it or use --force`,
        { appName, path: launcherPath, target: state.target }
      );
    case 'foreign':
      throw new SwitchError(
        'UnmanagedLauncher',
        `${launcherPath} is a ${state.reason}; remove it or use --force`,
        { appName, path: launcherPath }
      );
  }
}

/**
 * Atomically install (or replace) <binDir>/<appName>. The binary directory is
 * created when missing.
 */
export async function installLauncher(
  binDir: string,
  appName: string,
  artifact: LauncherArtifact
): Promise<string> {
  const launcherPath = path.join(binDir, appName);

  try {
    await fs.mkdir(binDir, { recursive: true });
    await replaceAtomically(launcherPath, async (tempPath) => {
      switch (artifact.kind) {
        case 'symlink':
          await fs.symlink(artifact.target, tempPath);
          break;
        case 'script':
          await fs.writeFile(tempPath, artifact.content, { encoding: 'utf-8', mode: 0o755, flag: 'wx' });
          await fs.chmod(tempPath, 0o755);
          break;
      }
    });
  } catch (err) {
    throw new SwitchError(
      'InstallFailed',
      `Cannot install launcher ${launcherPath}: ${describeCause(err)}`,
      { appName, path: launcherPath },
      { cause: err }
    );
  }

  logDebug(
    `Installed launcher ${launcherPath}`,
    artifact.kind === 'symlink' ? { target: artifact.target } : { kind: 'script' }
  );
  return launcherPath;
}

/**
 * Remove <binDir>/<appName> if present
 */
export async function removeLauncher(binDir: string, appName: string): Promise<void> {
  const launcherPath = path.join(binDir, appName);
  try {
    await fs.rm(launcherPath, { force: true });
  } catch (err) {
    throw new SwitchError(
      'InstallFailed',
      `Cannot remove launcher ${launcherPath}: ${describeCause(err)}`,
      { appName, path: launcherPath },
      { cause: err }
    );
  }
  logDebug(`Removed launcher ${launcherPath}`);
}

function sameState(a: LauncherState, b: LauncherState): boolean {
  switch (a.kind) {
    case 'missing':
      return b.kind === 'missing';
    case 'symlink':
      return b.kind === 'symlink' && b.target === a.target;
    case 'script':
      return b.kind === 'script' && b.content === a.content;
    case 'foreign':
      return b.kind === 'foreign' && b.reason === a.reason;
  }
}

/**
 * Put <binDir>/<appName> back to a state recorded with readLauncher.
 * Returns false when nothing had changed.
 */
export async function restoreLauncher(binDir: string, appName: string, state: LauncherState): Promise<boolean> {
  const launcherPath = path.join(binDir, appName);
  if (sameState(await readLauncher(launcherPath), state)) {
    return false;
  }

  switch (state.kind) {
    case 'missing':
      await removeLauncher(binDir, appName);
      break;
    case 'symlink':
    case 'script':
      await installLauncher(binDir, appName, state);
      break;
    case 'foreign':
      throw new SwitchError(
        'InstallFailed',
        `Cannot restore the ${state.reason} that was at ${launcherPath}`,
        { appName, path: launcherPath }
      );
  }
  logDebug(`Restored launcher ${launcherPath}`, { kind: state.kind });
  return true;
}
