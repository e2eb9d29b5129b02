/**
 * Switch Service - public operations of the binswap registry
 *
 * Every mutating call is one load -> mutate -> save cycle. If anything fails
 * before the save, the in-memory registry is dropped and the persisted file is
 * left as it was. If the save itself fails, the launcher is put back the way
 * it was found and staged copies are discarded.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { assertReadableFile, discardCopy, makeCommandEntry, makePathEntry, promoteCopy } from '../entries.js';
import { SwitchError, describeCause } from '../errors.js';
import { readLauncher, restoreLauncher } from '../launcher.js';
import { logDebug, logInfo, logWarn } from '../logger.js';
import { assertAppName, assertTag, expandPath, formatAppSpec } from '../names.js';
import { getActiveTag, list, listApplications } from '../query.js';
import { FileRegistryRepository } from '../repositories/registry.repository.js';
import type { RegistryRepository } from '../repositories/registry.repository.js';
import { getLauncherPath, getSettings, getVersionsDir } from '../settings.js';
import type { Settings } from '../settings.js';
import {
  describeTag,
  planRun,
  renameTag,
  track,
  unlink,
  untrack,
  use,
} from '../switch.js';
import type { SwitchContext } from '../switch.js';
import { deriveTag } from '../tags.js';
import type {
  ApplicationSummary,
  Entry,
  ListOptions,
  LauncherState,
  ListRow,
  Registry,
  RunPlan,
  StagedCopy,
  SwitchOutcome,
  TrackCommandInput,
  TrackPathInput,
  TrackResult,
} from '../types.js';

export interface SwitchServiceOptions {
  repository?: RegistryRepository;
  settings?: Settings;
  /** Base for relative paths and default command working directory */
  cwd?: string;
}

export interface ForceOption {
  /** Replace or remove a launcher binswap does not own */
  force?: boolean;
}

export interface UseResult {
  appName: string;
  tag: string;
  launcherPath: string;
}

interface TrackedOutcome extends SwitchOutcome {
  tag: string;
  entry: Entry;
  reinstalled: boolean;
}

function isInside(dir: string, file: string): boolean {
  const relative = path.relative(dir, file);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export class SwitchService {
  readonly settings: Settings;
  private repository: RegistryRepository;
  private cwd: string;

  constructor(options: SwitchServiceOptions = {}) {
    this.settings = options.settings ?? getSettings();
    this.repository = options.repository ?? new FileRegistryRepository(this.settings.configPath);
    this.cwd = options.cwd ?? process.cwd();
  }

  private context(force?: boolean): SwitchContext {
    return { settings: this.settings, cwd: this.cwd, force };
  }

  /**
   * Load, apply `mutate`, save, then move staged copies into place and delete
   * copies the new state no longer uses
   */
  private async commit<T extends SwitchOutcome>(
    operation: string,
    appName: string,
    mutate: (registry: Registry) => Promise<T> | T
  ): Promise<T> {
    assertAppName(appName);
    const registry = await this.repository.load();
    const launcherBefore = await this.recordLauncher(appName);
    const outcome = await mutate(registry);

    try {
      await this.repository.save(outcome.registry);
    } catch (err) {
      logWarn(`${operation}: save failed, rolling back`, err);
      await this.rollBack(appName, launcherBefore, outcome.stagedCopies);
      throw err;
    }
    logInfo(`${operation}: saved registry`);

    await this.promoteCopies(appName, outcome.stagedCopies);
    await this.removeObsoleteFiles(outcome.obsoleteFiles);
    return outcome;
  }

  private async recordLauncher(appName: string): Promise<LauncherState | undefined> {
    const launcherPath = getLauncherPath(this.settings, appName);
    try {
      return await readLauncher(launcherPath);
    } catch (err) {
      // The engine reports this itself unless --force skips the read
      logWarn(`Cannot read launcher ${launcherPath}; it will not be restored on failure`, err);
      return undefined;
    }
  }

  private async rollBack(
    appName: string,
    launcherBefore: LauncherState | undefined,
    stagedCopies: StagedCopy[]
  ): Promise<void> {
    for (const staged of stagedCopies) {
      try {
        await discardCopy(staged);
      } catch (err) {
        logWarn(`Could not discard staged copy ${staged.stagedPath}`, err);
      }
    }
    if (!launcherBefore) return;
    try {
      await restoreLauncher(this.settings.binDir, appName, launcherBefore);
    } catch (err) {
      logWarn(`Could not restore launcher for ${appName}`, err);
    }
  }

  private async promoteCopies(appName: string, stagedCopies: StagedCopy[]): Promise<void> {
    for (const staged of stagedCopies) {
      try {
        await promoteCopy(staged);
      } catch (err) {
        throw new SwitchError(
          'InstallFailed',
          `Registry saved, but ${staged.destination} could not be put in place: ${describeCause(err)}`,
          { appName, path: staged.destination },
          { cause: err }
        );
      }
      logDebug(`Stored managed copy ${staged.destination}`);
    }
  }

  private async removeObsoleteFiles(files: string[]): Promise<void> {
    const versionsDir = getVersionsDir(this.settings);
    for (const file of files) {
      if (!isInside(versionsDir, file)) {
        logWarn(`Not removing ${file}: outside managed storage ${versionsDir}`);
        continue;
      }
      try {
        await fs.rm(file, { force: true });
        logDebug(`Removed obsolete managed copy ${file}`);
      } catch (err) {
        // The registry is already saved; a stale copy is only wasted space
        logWarn(`Could not remove obsolete managed copy ${file}`, err);
      }
    }
  }

  // ==================== Tracking ====================

  /**
   * Track a file. Without a tag, one is derived from the file's contents.
   */
  async trackPath(input: TrackPathInput): Promise<TrackResult> {
    assertAppName(input.app);
    if (input.tag !== undefined) assertTag(input.tag);

    const sourcePath = expandPath(input.path, this.settings.homeDir, this.cwd);
    await assertReadableFile(sourcePath);

    const outcome = await this.commit<TrackedOutcome>(
      `track path ${input.app}`,
      input.app,
      async (registry) => {
        let tag: string;
        let fingerprint: string | undefined;
        if (input.tag !== undefined) {
          tag = input.tag;
        } else {
          const derived = await deriveTag(registry, input.app, sourcePath);
          tag = derived.tag;
          fingerprint = derived.fingerprint;
        }

        const { entry, staged } = await makePathEntry(
          { sourcePath, copy: input.copy, description: input.description, fingerprint },
          { appName: input.app, tag },
          this.settings
        );
        const tracked = await track(registry, input.app, tag, entry, this.context(input.force), staged);
        return { ...tracked, tag, entry };
      }
    );

    logInfo(`Tracked ${formatAppSpec(input.app, outcome.tag)}`, outcome.entry);
    return { appName: input.app, tag: outcome.tag, entry: outcome.entry, reinstalled: outcome.reinstalled };
  }

  /**
   * Track a shell command. Commands have no content to hash, so the tag is required.
   */
  async trackCommand(input: TrackCommandInput): Promise<TrackResult> {
    assertAppName(input.app);
    if (input.tag === undefined || input.tag.trim() === '') {
      throw new SwitchError('MissingTag', `Command entries need an explicit tag: ${input.app}@<tag>`, {
        appName: input.app,
      });
    }
    const tag = input.tag;
    assertTag(tag);

    const entry = makeCommandEntry(input.command, input.workingDirectory, {
      env: input.env,
      description: input.description,
      cwd: this.cwd,
      homeDir: this.settings.homeDir,
    });

    const outcome = await this.commit(`track command ${input.app}`, input.app, (registry) =>
      track(registry, input.app, tag, entry, this.context(input.force))
    );

    logInfo(`Tracked ${formatAppSpec(input.app, tag)}`, entry);
    return { appName: input.app, tag, entry, reinstalled: outcome.reinstalled };
  }

  // ==================== Switching ====================

  /**
   * Point the launcher at `tag`; without a tag, reinstall the active one
   */
  async use(appName: string, tag?: string, options: ForceOption = {}): Promise<UseResult> {
    let selected = tag;
    await this.commit(`use ${formatAppSpec(appName, tag)}`, appName, async (registry) => {
      const outcome = await use(registry, appName, tag, this.context(options.force));
      selected = getActiveTag(outcome.registry, appName);
      return outcome;
    });

    if (selected === undefined) {
      throw new SwitchError('NoActiveTag', `Application ${appName} doesn't have an active tag`, { appName });
    }
    return { appName, tag: selected, launcherPath: getLauncherPath(this.settings, appName) };
  }

  /**
   * Remove the launcher and clear the active tag
   */
  async unlink(appName: string, options: ForceOption = {}): Promise<void> {
    await this.commit(`unlink ${appName}`, appName, (registry) =>
      unlink(registry, appName, this.context(options.force))
    );
  }

  /**
   * Forget one tag of an application
   */
  async untrack(appName: string, tag: string, options: ForceOption = {}): Promise<void> {
    await this.commit(`untrack ${formatAppSpec(appName, tag)}`, appName, (registry) =>
      untrack(registry, appName, tag, this.context(options.force))
    );
  }

  async renameTag(appName: string, tag: string, newTag: string, options: ForceOption = {}): Promise<void> {
    await this.commit(`rename ${formatAppSpec(appName, tag)} -> ${newTag}`, appName, (registry) =>
      renameTag(registry, appName, tag, newTag, this.context(options.force))
    );
  }

  /**
   * Set a tag's description; undefined or empty clears it
   */
  async describe(appName: string, tag: string, description: string | undefined): Promise<void> {
    await this.commit(`describe ${formatAppSpec(appName, tag)}`, appName, (registry) =>
      describeTag(registry, appName, tag, description)
    );
  }

  // ==================== Queries ====================

  async list(options: ListOptions = {}): Promise<ListRow[]> {
    return list(await this.repository.load(), options);
  }

  async listApplications(): Promise<ApplicationSummary[]> {
    return listApplications(await this.repository.load());
  }

  async activeTag(appName: string): Promise<string | undefined> {
    return getActiveTag(await this.repository.load(), appName);
  }

  async planRun(appName: string): Promise<RunPlan> {
    return planRun(await this.repository.load(), appName, this.cwd);
  }

  /**
   * Current registry state
   */
  async registry(): Promise<Registry> {
    return this.repository.load();
  }
}

let serviceInstance: SwitchService | null = null;

/**
 * Get the process-wide service built from environment settings
 */
export function getSwitchService(): SwitchService {
  if (!serviceInstance) {
    serviceInstance = new SwitchService();
  }
  return serviceInstance;
}

/**
 * Drop the process-wide service (for testing)
 */
export function resetSwitchService(): void {
  serviceInstance = null;
}
