/**
 * Tag derivation and ordering
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { SwitchError, describeCause } from './errors.js';
import { findEntry } from './registry.js';
import type { Registry } from './types.js';

const TAG_LENGTH = 8;

/**
 * SHA-256 hex digest of a file's contents
 */
export async function fingerprintFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new SwitchError(
      'SourceNotFound',
      `Cannot read ${filePath}: ${describeCause(err)}`,
      { path: filePath },
      { cause: err }
    );
  }
  return hash.digest('hex');
}

export function tagForFingerprint(fingerprint: string): string {
  return fingerprint.slice(0, TAG_LENGTH);
}

export interface DerivedTag {
  tag: string;
  fingerprint: string;
}

/**
 * Derive a tag from file contents when the user gave none.
 *
 * Re-tracking the same file yields the same tag. A derived tag that already
 * names a different source in the application is rejected.
 */
export async function deriveTag(
  registry: Registry,
  appName: string,
  sourcePath: string
): Promise<DerivedTag> {
  const fingerprint = await fingerprintFile(sourcePath);
  const tag = tagForFingerprint(fingerprint);

  const existing = findEntry(registry, appName, tag);
  if (existing && (existing.kind !== 'path' || existing.sourcePath !== sourcePath)) {
    const other = existing.kind === 'path' ? existing.sourcePath : existing.commandLine;
    throw new SwitchError(
      'AmbiguousTag',
      `Derived tag "${tag}" of ${appName} already tracks ${other}; pass an explicit tag`,
      { appName, tag, sourcePath, existing: other }
    );
  }

  return { tag, fingerprint };
}

const collator = new Intl.Collator('en', { numeric: true });

/**
 * Natural ordering: "2.7" < "3.8" < "10.0"
 */
export function compareTags(a: string, b: string): number {
  const natural = collator.compare(a, b);
  if (natural !== 0) return natural;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortTags(tags: Iterable<string>): string[] {
  return [...tags].sort(compareTags);
}
