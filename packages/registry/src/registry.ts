/**
 * Lookups and immutable updates over a Registry value
 */

import { SwitchError } from './errors.js';
import type { Application, Entry, Registry } from './types.js';

export function getApplication(registry: Registry, appName: string): Application | undefined {
  return Object.hasOwn(registry.applications, appName) ? registry.applications[appName] : undefined;
}

export function requireApplication(registry: Registry, appName: string): Application {
  const app = getApplication(registry, appName);
  if (!app) {
    throw new SwitchError('UnknownApplication', `Application ${appName} isn't tracked`, { appName });
  }
  return app;
}

export function getEntry(app: Application, tag: string): Entry | undefined {
  return Object.hasOwn(app.entries, tag) ? app.entries[tag] : undefined;
}

export function findEntry(registry: Registry, appName: string, tag: string): Entry | undefined {
  const app = getApplication(registry, appName);
  return app ? getEntry(app, tag) : undefined;
}

export function requireEntry(app: Application, appName: string, tag: string): Entry {
  const entry = getEntry(app, tag);
  if (!entry) {
    throw new SwitchError('UnknownTag', `Tag ${tag} doesn't exist in application ${appName}`, {
      appName,
      tag,
    });
  }
  return entry;
}

/**
 * Replace (or add) one application; an application without entries is dropped
 */
export function withApplication(registry: Registry, appName: string, app: Application): Registry {
  if (Object.keys(app.entries).length === 0) {
    return withoutApplication(registry, appName);
  }
  return { applications: { ...registry.applications, [appName]: app } };
}

export function withoutApplication(registry: Registry, appName: string): Registry {
  const applications = { ...registry.applications };
  delete applications[appName];
  return { applications };
}

export function withEntry(app: Application, tag: string, entry: Entry): Application {
  return { ...app, entries: { ...app.entries, [tag]: entry } };
}

export function withoutEntry(app: Application, tag: string): Application {
  const entries = { ...app.entries };
  delete entries[tag];
  return { ...app, entries };
}

export function withActiveTag(app: Application, activeTag: string | undefined): Application {
  const next: Application = { entries: app.entries };
  if (activeTag !== undefined) next.activeTag = activeTag;
  return next;
}
