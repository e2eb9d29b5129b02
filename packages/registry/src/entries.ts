/**
 * Entry construction and target resolution
 */

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { homedir } from 'os';
import * as path from 'path';
import { copyFileAtomic, temporaryPathFor } from './atomic.js';
import { SwitchError, describeCause, errnoCode } from './errors.js';
import { expandPath } from './names.js';
import { getAppStorageDir, getManagedCopyPath } from './settings.js';
import type { Settings } from './settings.js';
import { fingerprintFile } from './tags.js';
import type { CommandEntry, Entry, PathEntry, ResolvedTarget, StagedCopy } from './types.js';

export interface PathEntryInput {
  /** Absolute path of the file to track */
  sourcePath: string;
  copy?: boolean;
  description?: string;
  /** Precomputed digest, skips re-reading the file */
  fingerprint?: string;
}

export interface EntryLocation {
  appName: string;
  tag: string;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected entry: ${JSON.stringify(value)}`);
}

/**
 * Fail with SourceNotFound unless `filePath` is a readable regular file
 */
export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new SwitchError('SourceNotFound', `Path ${filePath} is not a file`, { path: filePath });
    }
    await fs.access(filePath, fsConstants.R_OK);
  } catch (err) {
    if (err instanceof SwitchError) throw err;
    const reason = errnoCode(err) === 'ENOENT' ? "doesn't exist" : `isn't readable (${describeCause(err)})`;
    throw new SwitchError('SourceNotFound', `Path ${filePath} ${reason}`, { path: filePath }, { cause: err });
  }
}

export interface PreparedPathEntry {
  entry: PathEntry;
  /** Set with `copy`: the new copy, not yet at entry.managedCopyPath */
  staged?: StagedCopy;
}

/**
 * Build a path entry. With `copy`, the file is staged next to the
 * deterministic managed location for (app, tag); an earlier copy of that tag
 * stays untouched until the staged one is promoted.
 */
export async function makePathEntry(
  input: PathEntryInput,
  location: EntryLocation,
  settings: Settings
): Promise<PreparedPathEntry> {
  const sourcePath = path.resolve(input.sourcePath);
  await assertReadableFile(sourcePath);

  const entry: PathEntry = {
    kind: 'path',
    sourcePath,
    fingerprint: input.fingerprint ?? (await fingerprintFile(sourcePath)),
  };
  if (input.description !== undefined) {
    entry.description = input.description;
  }

  if (!input.copy) {
    return { entry };
  }

  const staged = await stageCopy(sourcePath, location, settings);
  entry.managedCopyPath = staged.destination;
  return { entry, staged };
}

/**
 * Copy a file into <versions>/<app>/ under a temporary name, destined for
 * <app>_<tag>. The copy keeps its permission bits and is executable by the owner.
 */
export async function stageCopy(
  sourcePath: string,
  location: EntryLocation,
  settings: Settings
): Promise<StagedCopy> {
  const destination = getManagedCopyPath(settings, location.appName, location.tag);
  const stagedPath = temporaryPathFor(destination);
  const { mode } = await fs.stat(sourcePath);
  await fs.mkdir(getAppStorageDir(settings, location.appName), { recursive: true });
  await copyFileAtomic(sourcePath, stagedPath, (mode & 0o777) | 0o100);
  return { stagedPath, destination };
}

export async function promoteCopy(staged: StagedCopy): Promise<void> {
  await fs.rename(staged.stagedPath, staged.destination);
}

export async function discardCopy(staged: StagedCopy): Promise<void> {
  await fs.rm(staged.stagedPath, { force: true });
}

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface CommandEntryOptions {
  env?: Record<string, string>;
  description?: string;
  /** Base for a relative working directory */
  cwd?: string;
  homeDir?: string;
}

/**
 * Build a command entry. No filesystem access.
 */
export function makeCommandEntry(
  commandLine: string,
  workingDirectory?: string,
  options: CommandEntryOptions = {}
): CommandEntry {
  if (commandLine.trim() === '') {
    throw new SwitchError('EmptyCommand', 'Command must not be empty');
  }

  const entry: CommandEntry = { kind: 'command', commandLine };

  if (workingDirectory !== undefined) {
    entry.workingDirectory = expandPath(
      workingDirectory,
      options.homeDir ?? homedir(),
      options.cwd ?? process.cwd()
    );
  }
  if (options.env && Object.keys(options.env).length > 0) {
    for (const key of Object.keys(options.env)) {
      if (!ENV_KEY_PATTERN.test(key)) {
        throw new SwitchError('InvalidName', `Invalid environment variable name "${key}"`, { key });
      }
    }
    entry.env = { ...options.env };
  }
  if (options.description !== undefined) {
    entry.description = options.description;
  }

  return entry;
}

/**
 * Path a path entry launches: its managed copy when there is one
 */
export function linkTargetOf(entry: PathEntry): string {
  return entry.managedCopyPath ?? entry.sourcePath;
}

/**
 * Resolve an entry to what its launcher should run
 *
 * @param cwd - working directory for command entries that have none
 * @param staged - copy that will land on the entry's managed path at commit
 */
export async function resolveTarget(entry: Entry, cwd: string, staged?: StagedCopy): Promise<ResolvedTarget> {
  switch (entry.kind) {
    case 'path': {
      const target = linkTargetOf(entry);
      try {
        await fs.stat(staged?.destination === target ? staged.stagedPath : target);
      } catch (err) {
        throw new SwitchError(
          'TargetMissing',
          `Target ${target} no longer exists`,
          { path: target },
          { cause: err }
        );
      }
      return { kind: 'link', path: target };
    }
    case 'command':
      return {
        kind: 'wrapper',
        commandLine: entry.commandLine,
        workingDirectory: entry.workingDirectory ?? cwd,
        env: { ...entry.env },
      };
    default:
      return assertNever(entry);
  }
}

/**
 * One-line description of where an entry points
 */
export function summarizeEntry(entry: Entry): string {
  switch (entry.kind) {
    case 'path':
      return entry.managedCopyPath
        ? `${entry.managedCopyPath} (copy of ${entry.sourcePath})`
        : entry.sourcePath;
    case 'command':
      return entry.workingDirectory
        ? `${entry.commandLine} in ${entry.workingDirectory}`
        : entry.commandLine;
    default:
      return assertNever(entry);
  }
}
