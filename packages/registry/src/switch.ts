/**
 * Switch engine
 *
 * Per application: Untracked -> Tracked (inactive) -> Tracked (active).
 * Every operation takes the registry as a value and returns the next one
 * without persisting it. Launcher changes happen before the outcome is
 * returned, so a thrown error means the caller must not save; a caller whose
 * save fails must put the launcher back and discard the staged copies.
 */

import { SwitchError, describeCause } from './errors.js';
import { assertNever, discardCopy, linkTargetOf, resolveTarget, stageCopy } from './entries.js';
import { assertLauncherOwned, installLauncher, readLauncher, removeLauncher, toArtifact } from './launcher.js';
import { assertAppName, assertTag } from './names.js';
import {
  getApplication,
  getEntry,
  requireApplication,
  requireEntry,
  withActiveTag,
  withApplication,
  withEntry,
  withoutEntry,
} from './registry.js';
import { getLauncherPath } from './settings.js';
import type { Settings } from './settings.js';
import type { Application, Entry, LauncherState, Registry, RunPlan, StagedCopy, SwitchOutcome } from './types.js';

export interface SwitchContext {
  settings: Settings;
  /** Working directory for command entries that have none */
  cwd: string;
  /** Replace or remove a launcher binswap does not own */
  force?: boolean;
}

/**
 * Every path a symlink launcher of this application may legitimately point to
 */
function knownTargets(app: Application | undefined): Set<string> {
  const targets = new Set<string>();
  if (!app) return targets;
  for (const entry of Object.values(app.entries)) {
    if (entry.kind === 'path') {
      targets.add(entry.sourcePath);
      if (entry.managedCopyPath) targets.add(entry.managedCopyPath);
    }
  }
  return targets;
}

async function assertOwned(appName: string, app: Application | undefined, ctx: SwitchContext): Promise<void> {
  if (ctx.force) return;

  const launcherPath = getLauncherPath(ctx.settings, appName);
  let state: LauncherState;
  try {
    state = await readLauncher(launcherPath);
  } catch (err) {
    throw new SwitchError(
      'InstallFailed',
      `Cannot inspect launcher ${launcherPath}: ${describeCause(err)}`,
      { appName, path: launcherPath },
      { cause: err }
    );
  }
  assertLauncherOwned(state, knownTargets(app), appName, launcherPath);
}

/**
 * Resolve `entry` and atomically point the launcher at it
 *
 * @param owner - the application as currently recorded, for the ownership check
 */
async function installEntry(
  appName: string,
  tag: string,
  entry: Entry,
  owner: Application | undefined,
  ctx: SwitchContext,
  staged?: StagedCopy
): Promise<void> {
  const target = await resolveTarget(entry, ctx.cwd, staged);
  await assertOwned(appName, owner, ctx);
  await installLauncher(ctx.settings.binDir, appName, toArtifact(target, appName, tag));
}

async function removeOwnedLauncher(appName: string, app: Application, ctx: SwitchContext): Promise<void> {
  await assertOwned(appName, app, ctx);
  await removeLauncher(ctx.settings.binDir, appName);
}

/**
 * Managed copy of `previous` that `next` no longer references
 */
function orphanedCopy(previous: Entry | undefined, next: Entry | undefined): string[] {
  if (previous?.kind !== 'path' || !previous.managedCopyPath) return [];
  if (next?.kind === 'path' && next.managedCopyPath === previous.managedCopyPath) return [];
  return [previous.managedCopyPath];
}

export interface TrackOutcome extends SwitchOutcome {
  reinstalled: boolean;
}

/**
 * Insert or overwrite entries[tag]. The active tag is unchanged; when the
 * overwritten tag is the active one its launcher is reinstalled.
 *
 * @param staged - the entry's new managed copy; discarded if the step fails
 */
export async function track(
  registry: Registry,
  appName: string,
  tag: string,
  entry: Entry,
  ctx: SwitchContext,
  staged?: StagedCopy
): Promise<TrackOutcome> {
  const stagedCopies = staged ? [staged] : [];
  try {
    assertAppName(appName);
    assertTag(tag);

    const previousApp = getApplication(registry, appName);
    const previousEntry = previousApp ? getEntry(previousApp, tag) : undefined;
    const app = withEntry(previousApp ?? { entries: {} }, tag, entry);

    const reinstalled = previousApp?.activeTag === tag;
    if (reinstalled) {
      await installEntry(appName, tag, entry, previousApp, ctx, staged);
    }

    return {
      registry: withApplication(registry, appName, app),
      obsoleteFiles: orphanedCopy(previousEntry, entry),
      stagedCopies,
      reinstalled,
    };
  } catch (err) {
    await Promise.all(stagedCopies.map(discardCopy));
    throw err;
  }
}

/**
 * Point the launcher at `tag`, or reinstall the active tag when omitted
 */
export async function use(
  registry: Registry,
  appName: string,
  tag: string | undefined,
  ctx: SwitchContext
): Promise<SwitchOutcome> {
  const app = requireApplication(registry, appName);
  const selected = tag ?? app.activeTag;
  if (selected === undefined) {
    throw new SwitchError('NoActiveTag', `Application ${appName} doesn't have an active tag`, { appName });
  }

  const entry = requireEntry(app, appName, selected);
  await installEntry(appName, selected, entry, app, ctx);

  return {
    registry: withApplication(registry, appName, withActiveTag(app, selected)),
    obsoleteFiles: [],
    stagedCopies: [],
  };
}

/**
 * Remove the launcher and clear the active tag; entries are kept
 */
export async function unlink(registry: Registry, appName: string, ctx: SwitchContext): Promise<SwitchOutcome> {
  const app = requireApplication(registry, appName);
  if (app.activeTag !== undefined) {
    await removeOwnedLauncher(appName, app, ctx);
  }
  return {
    registry: withApplication(registry, appName, withActiveTag(app, undefined)),
    obsoleteFiles: [],
    stagedCopies: [],
  };
}

/**
 * Forget one tag. Untracking the active tag removes the launcher; the last
 * tag takes the application with it.
 */
export async function untrack(
  registry: Registry,
  appName: string,
  tag: string,
  ctx: SwitchContext
): Promise<SwitchOutcome> {
  const app = requireApplication(registry, appName);
  const entry = requireEntry(app, appName, tag);

  let next = withoutEntry(app, tag);
  if (app.activeTag === tag) {
    await removeOwnedLauncher(appName, app, ctx);
    next = withActiveTag(next, undefined);
  }

  return {
    registry: withApplication(registry, appName, next),
    obsoleteFiles: orphanedCopy(entry, undefined),
    stagedCopies: [],
  };
}

/**
 * Move an entry to a new tag. A managed copy follows the deterministic
 * <app>_<tag> naming; an active tag stays active under its new name.
 */
export async function renameTag(
  registry: Registry,
  appName: string,
  tag: string,
  newTag: string,
  ctx: SwitchContext
): Promise<SwitchOutcome> {
  assertTag(newTag);
  const app = requireApplication(registry, appName);
  const entry = requireEntry(app, appName, tag);

  if (newTag === tag) {
    return { registry, obsoleteFiles: [], stagedCopies: [] };
  }
  if (getEntry(app, newTag)) {
    throw new SwitchError('TagExists', `Tag ${newTag} already exists in application ${appName}`, {
      appName,
      tag: newTag,
    });
  }

  let moved: Entry = entry;
  let staged: StagedCopy | undefined;
  let obsoleteFiles: string[] = [];
  if (entry.kind === 'path' && entry.managedCopyPath) {
    await resolveTarget(entry, ctx.cwd);
    staged = await stageCopy(entry.managedCopyPath, { appName, tag: newTag }, ctx.settings);
    moved = { ...entry, managedCopyPath: staged.destination };
    obsoleteFiles = [entry.managedCopyPath];
  }

  let next = withEntry(withoutEntry(app, tag), newTag, moved);
  if (app.activeTag === tag) {
    try {
      await installEntry(appName, newTag, moved, app, ctx, staged);
    } catch (err) {
      if (staged) await discardCopy(staged);
      throw err;
    }
    next = withActiveTag(next, newTag);
  }

  return {
    registry: withApplication(registry, appName, next),
    obsoleteFiles,
    stagedCopies: staged ? [staged] : [],
  };
}

/**
 * Set or clear (empty / undefined) an entry's description
 */
export function describeTag(
  registry: Registry,
  appName: string,
  tag: string,
  description: string | undefined
): SwitchOutcome {
  const app = requireApplication(registry, appName);
  const entry: Entry = { ...requireEntry(app, appName, tag) };

  if (description === undefined || description === '') {
    delete entry.description;
  } else {
    entry.description = description;
  }

  return {
    registry: withApplication(registry, appName, withEntry(app, tag, entry)),
    obsoleteFiles: [],
    stagedCopies: [],
  };
}

/**
 * How to execute the active entry of an application directly
 */
export function planRun(registry: Registry, appName: string, cwd: string): RunPlan {
  const app = requireApplication(registry, appName);
  const tag = app.activeTag;
  if (tag === undefined) {
    throw new SwitchError('NoActiveTag', `Application ${appName} doesn't have an active tag`, { appName });
  }

  const entry = requireEntry(app, appName, tag);
  switch (entry.kind) {
    case 'path':
      return { appName, tag, command: linkTargetOf(entry), shell: false, cwd, env: {} };
    case 'command':
      return {
        appName,
        tag,
        command: entry.commandLine,
        shell: true,
        cwd: entry.workingDirectory ?? cwd,
        env: { ...entry.env },
      };
    default:
      return assertNever(entry);
  }
}
