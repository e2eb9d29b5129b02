/**
 * In-memory registry repository
 *
 * Keeps the serialized document, so every load returns an independent copy and
 * the same validation as the file store applies.
 */

import { emptyRegistry, parseRegistry, serializeRegistry } from './registry.repository.js';
import type { RegistryRepository } from './registry.repository.js';
import type { Registry } from '../types.js';

export class InMemoryRegistryRepository implements RegistryRepository {
  private content: string | null;
  saveCount = 0;

  constructor(initial?: Registry) {
    this.content = initial ? serializeRegistry(initial) : null;
  }

  async load(): Promise<Registry> {
    if (this.content === null) {
      return emptyRegistry();
    }
    return parseRegistry(this.content, 'memory');
  }

  async save(registry: Registry): Promise<void> {
    this.content = serializeRegistry(registry);
    this.saveCount += 1;
  }

  /** Raw stored document, or null before the first save */
  snapshot(): string | null {
    return this.content;
  }
}
