/**
 * Rendering helpers for CLI output
 *
 * Pure functions: colors come from the Painter, plain text by default.
 */

import * as path from 'path';
import { SwitchError } from '@binswap/registry';
import type { ApplicationSummary, ListRow } from '@binswap/registry';

export interface Painter {
  app(text: string): string;
  tag(text: string): string;
  marker(text: string): string;
  path(text: string): string;
  command(text: string): string;
  muted(text: string): string;
}

const identity = (text: string): string => text;

export const plainPainter: Painter = {
  app: identity,
  tag: identity,
  marker: identity,
  path: identity,
  command: identity,
  muted: identity,
};

export interface ListFormatOptions {
  /** Tags only, without targets or descriptions */
  short?: boolean;
  /** Summaries used for the per-application header */
  applications?: ApplicationSummary[];
}

export function formatApplicationHeader(summary: ApplicationSummary, paint: Painter = plainPainter): string {
  const count = summary.tagCount === 1 ? '1 tag' : `${summary.tagCount} tags`;
  return `${paint.app(summary.name)} ${paint.muted(`(${count})`)}`;
}

function formatRow(row: ListRow, short: boolean, paint: Painter): string[] {
  const marker = row.isActive ? paint.marker('*') : ' ';
  let line = `  ${marker} ${paint.tag(row.tag)}`;
  if (short) return [line];

  line += ` - ${row.kind === 'path' ? paint.path(row.summary) : paint.command(row.summary)}`;
  const lines = [line];
  if (row.description) {
    lines.push(`      ${paint.muted(row.description)}`);
  }
  return lines;
}

/**
 * Rows grouped under one header per application, groups separated by a blank line.
 * Expects rows ordered by application, as `list` returns them.
 */
export function formatListRows(
  rows: ListRow[],
  options: ListFormatOptions = {},
  paint: Painter = plainPainter
): string[] {
  const lines: string[] = [];
  let currentApp: string | undefined;

  for (const row of rows) {
    if (row.appName !== currentApp) {
      if (currentApp !== undefined) lines.push('');
      currentApp = row.appName;
      const summary = options.applications?.find((app) => app.name === row.appName);
      lines.push(summary ? formatApplicationHeader(summary, paint) : paint.app(row.appName));
    }
    lines.push(...formatRow(row, options.short ?? false, paint));
  }

  return lines;
}

/**
 * Parse repeated KEY=VALUE options. The value may contain '='; later keys win.
 */
export function parseEnvPairs(pairs: string[] = []): Record<string, string> {
  const env: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new SwitchError('InvalidName', `Expected KEY=VALUE, got "${pair}"`, { pair });
    }
    env[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return env;
}

/**
 * Whether `binDir` is one of the directories in a PATH value
 */
export function binDirOnPath(binDir: string, pathValue: string): boolean {
  const target = path.resolve(binDir);
  return pathValue
    .split(path.delimiter)
    .filter((dir) => dir !== '')
    .some((dir) => path.resolve(dir) === target);
}
