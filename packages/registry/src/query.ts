/**
 * Read-only projections over a Registry
 */

import { summarizeEntry } from './entries.js';
import { getApplication, requireApplication } from './registry.js';
import { sortTags } from './tags.js';
import type { ApplicationSummary, ListOptions, ListRow, Registry } from './types.js';

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Rows ordered by application name, then naturally by tag. Without `all`,
 * only active tags are listed.
 */
export function list(registry: Registry, options: ListOptions = {}): ListRow[] {
  let appNames: string[];
  if (options.app !== undefined) {
    requireApplication(registry, options.app);
    appNames = [options.app];
  } else {
    appNames = Object.keys(registry.applications).sort(compareNames);
  }

  const rows: ListRow[] = [];
  for (const appName of appNames) {
    const app = requireApplication(registry, appName);
    for (const tag of sortTags(Object.keys(app.entries))) {
      const isActive = tag === app.activeTag;
      if (!options.all && !isActive) continue;

      const entry = app.entries[tag];
      const row: ListRow = {
        appName,
        tag,
        kind: entry.kind,
        summary: summarizeEntry(entry),
        isActive,
      };
      if (entry.description !== undefined) row.description = entry.description;
      rows.push(row);
    }
  }
  return rows;
}

export function listApplications(registry: Registry): ApplicationSummary[] {
  return Object.keys(registry.applications)
    .sort(compareNames)
    .map((name) => {
      const app = registry.applications[name];
      const summary: ApplicationSummary = { name, tagCount: Object.keys(app.entries).length };
      if (app.activeTag !== undefined) summary.activeTag = app.activeTag;
      return summary;
    });
}

export function getActiveTag(registry: Registry, appName: string): string | undefined {
  return getApplication(registry, appName)?.activeTag;
}
