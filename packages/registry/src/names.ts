/**
 * Application names, tags and user-supplied paths
 */

import { isAbsolute, join, resolve } from 'path';
import { SwitchError } from './errors.js';

const RESERVED = new Set(['.', '..', '__proto__']);

// No separators, whitespace or NUL: both end up in file names
const APP_NAME_PATTERN = /^[^@/\\\s\0]+$/;
const TAG_PATTERN = /^[^/\\\s\0]+$/;

export function isValidAppName(name: string): boolean {
  return APP_NAME_PATTERN.test(name) && !RESERVED.has(name);
}

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag) && !RESERVED.has(tag);
}

export function assertAppName(name: string): void {
  if (!isValidAppName(name)) {
    throw new SwitchError('InvalidName', `Invalid application name "${name}"`, { appName: name });
  }
}

export function assertTag(tag: string): void {
  if (!isValidTag(tag)) {
    throw new SwitchError('InvalidName', `Invalid tag "${tag}"`, { tag });
  }
}

export interface AppSpec {
  appName: string;
  tag?: string;
}

/**
 * Parse `<app>[@<tag>]`, e.g. "python@3.9.8" or "python"
 */
export function parseAppSpec(value: string): AppSpec {
  const at = value.indexOf('@');
  const appName = at === -1 ? value : value.slice(0, at);
  assertAppName(appName);

  if (at === -1) {
    return { appName };
  }

  const tag = value.slice(at + 1);
  assertTag(tag);
  return { appName, tag };
}

export function formatAppSpec(appName: string, tag?: string): string {
  return tag === undefined ? appName : `${appName}@${tag}`;
}

/**
 * Expand a leading ~ and make the path absolute against cwd
 */
export function expandPath(input: string, homeDir: string, cwd: string): string {
  let expanded = input;
  if (input === '~') {
    expanded = homeDir;
  } else if (input.startsWith('~/')) {
    expanded = join(homeDir, input.slice(2));
  }
  return isAbsolute(expanded) ? resolve(expanded) : resolve(cwd, expanded);
}
