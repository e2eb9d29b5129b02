/**
 * @binswap/registry
 *
 * Registry of tracked binaries and commands, and the engine that switches
 * the launcher at <binDir>/<app> between them.
 * Stores data at ~/.config/binswap/registry.json
 */

// Types
export type {
  EntryKind,
  PathEntry,
  CommandEntry,
  Entry,
  Application,
  Registry,
  ResolvedTarget,
  LauncherArtifact,
  LauncherState,
  StagedCopy,
  SwitchOutcome,
  ListRow,
  ApplicationSummary,
  ListOptions,
  RunPlan,
  TrackPathInput,
  TrackCommandInput,
  TrackResult,
} from './types.js';

// Errors
export { SwitchError, isSwitchError, errnoCode, describeCause } from './errors.js';
export type { SwitchErrorCode } from './errors.js';

// Settings
export {
  PACKAGE_NAME,
  loadSettings,
  getSettings,
  resetSettings,
  getVersionsDir,
  getAppStorageDir,
  getManagedCopyPath,
  getLauncherPath,
} from './settings.js';
export type { Settings } from './settings.js';

// Logging
export {
  getLogPath,
  resetLogger,
  logInfo,
  logWarn,
  logDebug,
  logFullError,
  createCommandLogger,
} from './logger.js';
export type { CommandLogger, LogLevel } from './logger.js';

// Names and tags
export {
  isValidAppName,
  isValidTag,
  assertAppName,
  assertTag,
  parseAppSpec,
  formatAppSpec,
  expandPath,
} from './names.js';
export type { AppSpec } from './names.js';
export { fingerprintFile, tagForFingerprint, deriveTag, compareTags, sortTags } from './tags.js';
export type { DerivedTag } from './tags.js';

// Entries and launchers
export {
  assertReadableFile,
  makePathEntry,
  makeCommandEntry,
  stageCopy,
  promoteCopy,
  discardCopy,
  linkTargetOf,
  resolveTarget,
  summarizeEntry,
} from './entries.js';
export type { PathEntryInput, PreparedPathEntry, EntryLocation, CommandEntryOptions } from './entries.js';
export {
  LAUNCHER_MARKER,
  shellQuote,
  renderWrapperScript,
  readLauncher,
  installLauncher,
  removeLauncher,
  restoreLauncher,
} from './launcher.js';

// Engine and queries
export { track, use, unlink, untrack, renameTag, describeTag, planRun } from './switch.js';
export type { SwitchContext, TrackOutcome } from './switch.js';
export { list, listApplications, getActiveTag } from './query.js';

// Repositories
export {
  FileRegistryRepository,
  emptyRegistry,
  parseRegistry,
  serializeRegistry,
} from './repositories/registry.repository.js';
export type { RegistryRepository } from './repositories/registry.repository.js';
export { InMemoryRegistryRepository } from './repositories/memory.repository.js';

// Services
export { SwitchService, getSwitchService, resetSwitchService } from './services/switch.service.js';
export type { SwitchServiceOptions, ForceOption, UseResult } from './services/switch.service.js';
