/**
 * Registry repository - loads and persists the registry document
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { writeFileAtomic } from '../atomic.js';
import { SwitchError, describeCause, errnoCode } from '../errors.js';
import { describeIssue, fromDocument, registryDocumentSchema, toDocument } from '../schema.js';
import type { Registry } from '../types.js';

export interface RegistryRepository {
  /** Empty registry when nothing has been saved yet */
  load(): Promise<Registry>;
  save(registry: Registry): Promise<void>;
}

export function emptyRegistry(): Registry {
  return { applications: {} };
}

/**
 * Serialize a registry to its on-disk JSON form
 */
export function serializeRegistry(registry: Registry): string {
  return JSON.stringify(toDocument(registry), null, 2) + '\n';
}

/**
 * Parse and validate a registry document
 *
 * @param source - file name used in error messages
 */
export function parseRegistry(content: string, source: string): Registry {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SwitchError(
      'CorruptRegistry',
      `Registry ${source} is not valid JSON: ${describeCause(err)}`,
      { path: source },
      { cause: err }
    );
  }

  const result = registryDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new SwitchError(
      'CorruptRegistry',
      `Registry ${source} is invalid: ${describeIssue(result.error)}`,
      { path: source, issues: result.error.issues }
    );
  }

  return fromDocument(result.data);
}

/**
 * JSON file store. Writes go through a temporary file and a rename; there is
 * no lock, so concurrent writers race and the last save wins.
 */
export class FileRegistryRepository implements RegistryRepository {
  constructor(readonly filePath: string) {}

  async load(): Promise<Registry> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return emptyRegistry();
      }
      throw new SwitchError(
        'CorruptRegistry',
        `Cannot read registry ${this.filePath}: ${describeCause(err)}`,
        { path: this.filePath },
        { cause: err }
      );
    }

    return parseRegistry(content, this.filePath);
  }

  async save(registry: Registry): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, serializeRegistry(registry));
  }
}
