/**
 * binswap paths
 *
 * Registry file:   ~/.config/binswap/registry.json
 * Launchers:       ~/.local/bin/<app>
 * Managed copies:  ~/.local/share/binswap/versions/<app>/<app>_<tag>
 *
 * Each location can be overridden through the environment.
 */

import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';

export const PACKAGE_NAME = 'binswap';

export interface Settings {
  homeDir: string;
  /** Registry JSON document */
  configPath: string;
  /** Personal binary directory holding one launcher per application */
  binDir: string;
  /** Root of binswap-owned data (managed copies, debug log) */
  dataDir: string;
  logPath: string;
}

type Env = Record<string, string | undefined>;

function envPath(env: Env, key: string, base: string): string | undefined {
  const value = env[key];
  if (!value) return undefined;
  return isAbsolute(value) ? value : resolve(base, value);
}

/**
 * Resolve settings from environment variables and defaults
 *
 * BINSWAP_HOME: base for every default below (defaults to the user's home)
 * BINSWAP_CONFIG_PATH: registry file
 * BINSWAP_BIN_PATH: personal binary directory
 * BINSWAP_DATA_PATH: managed storage root
 * BINSWAP_LOG_PATH: debug log file
 */
export function loadSettings(env: Env = process.env): Settings {
  const homeDir = envPath(env, 'BINSWAP_HOME', process.cwd()) ?? homedir();
  const dataDir =
    envPath(env, 'BINSWAP_DATA_PATH', homeDir) ?? join(homeDir, '.local', 'share', PACKAGE_NAME);

  return {
    homeDir,
    configPath:
      envPath(env, 'BINSWAP_CONFIG_PATH', homeDir) ??
      join(homeDir, '.config', PACKAGE_NAME, 'registry.json'),
    binDir: envPath(env, 'BINSWAP_BIN_PATH', homeDir) ?? join(homeDir, '.local', 'bin'),
    dataDir,
    logPath: envPath(env, 'BINSWAP_LOG_PATH', homeDir) ?? join(dataDir, 'debug.log'),
  };
}

/**
 * Directory holding managed copies for every application
 */
export function getVersionsDir(settings: Settings): string {
  return join(settings.dataDir, 'versions');
}

/**
 * Managed storage directory dedicated to one application
 */
export function getAppStorageDir(settings: Settings, appName: string): string {
  return join(getVersionsDir(settings), appName);
}

/**
 * Deterministic location of the managed copy for (app, tag)
 */
export function getManagedCopyPath(settings: Settings, appName: string, tag: string): string {
  return join(getAppStorageDir(settings, appName), `${appName}_${tag}`);
}

/**
 * Location of the launcher for an application
 */
export function getLauncherPath(settings: Settings, appName: string): string {
  return join(settings.binDir, appName);
}

let cachedSettings: Settings | null = null;

/**
 * Get the current settings (cached)
 */
export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

/**
 * Reset the cached settings (for testing)
 */
export function resetSettings(): void {
  cachedSettings = null;
}
