/**
 * Public types for the binswap registry
 */

// Entry variants
export type EntryKind = 'path' | 'command';

/**
 * A tracked file on disk, optionally copied into managed storage
 */
export interface PathEntry {
  kind: 'path';
  /** Absolute path of the file at track time */
  sourcePath: string;
  /** Copy under <dataDir>/versions/<app>/, set when tracked with --copy */
  managedCopyPath?: string;
  /** SHA-256 hex digest of the file contents at track time */
  fingerprint: string;
  description?: string;
}

/**
 * A shell command launched through a generated wrapper script
 */
export interface CommandEntry {
  kind: 'command';
  commandLine: string;
  /** Absolute directory to run in; the resolver's cwd when omitted */
  workingDirectory?: string;
  env?: Record<string, string>;
  description?: string;
}

export type Entry = PathEntry | CommandEntry;

/**
 * One logical command and its tagged variants
 */
export interface Application {
  entries: Record<string, Entry>;
  activeTag?: string;
}

/**
 * Full registry state: application name -> application
 */
export interface Registry {
  applications: Record<string, Application>;
}

/**
 * What a tag resolves to when it is switched on
 */
export type ResolvedTarget =
  | { kind: 'link'; path: string }
  | {
      kind: 'wrapper';
      commandLine: string;
      workingDirectory: string;
      env: Record<string, string>;
    };

/**
 * The file written at <binDir>/<app>
 */
export type LauncherArtifact =
  | { kind: 'symlink'; target: string }
  | { kind: 'script'; content: string };

/**
 * What is currently at <binDir>/<app>
 */
export type LauncherState =
  | { kind: 'missing' }
  | { kind: 'symlink'; target: string }
  | { kind: 'script'; content: string }
  | { kind: 'foreign'; reason: string };

/**
 * A managed copy written under a temporary name in the application's storage
 * directory. It is renamed onto `destination` once the registry is saved.
 */
export interface StagedCopy {
  stagedPath: string;
  destination: string;
}

/**
 * Result of an engine operation. Nothing is persisted yet; obsoleteFiles are
 * managed copies that become unreferenced once `registry` is saved, and
 * stagedCopies must be moved into place at the same point.
 */
export interface SwitchOutcome {
  registry: Registry;
  obsoleteFiles: string[];
  stagedCopies: StagedCopy[];
}

/**
 * One row of `list`
 */
export interface ListRow {
  appName: string;
  tag: string;
  kind: EntryKind;
  summary: string;
  isActive: boolean;
  description?: string;
}

export interface ApplicationSummary {
  name: string;
  activeTag?: string;
  tagCount: number;
}

export interface ListOptions {
  app?: string;
  all?: boolean;
}

/**
 * How to execute the active entry of an application
 */
export interface RunPlan {
  appName: string;
  tag: string;
  /** Executable path, or a shell command line when `shell` is true */
  command: string;
  shell: boolean;
  cwd: string;
  env: Record<string, string>;
}

export interface TrackPathInput {
  app: string;
  tag?: string;
  path: string;
  copy?: boolean;
  description?: string;
  force?: boolean;
}

export interface TrackCommandInput {
  app: string;
  tag?: string;
  command: string;
  workingDirectory?: string;
  env?: Record<string, string>;
  description?: string;
  force?: boolean;
}

export interface TrackResult {
  appName: string;
  tag: string;
  entry: Entry;
  /** True when the overwritten tag was active and its launcher was reinstalled */
  reinstalled: boolean;
}
