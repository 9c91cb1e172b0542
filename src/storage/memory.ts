/**
 * In-Memory Configuration Store
 *
 * Reference implementation for testing. Keys keep insertion order,
 * which stands in for the order git reports them in a config file.
 */

import { NotFoundError } from '../errors.js';
import type { ConfigEntry, ConfigStore } from './interface.js';

export class InMemoryConfigStore implements ConfigStore {
  readonly id = 'memory';
  private entries: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async unset(key: string): Promise<void> {
    if (!this.entries.delete(key)) {
      throw new NotFoundError('key', key);
    }
  }

  async list(prefix: string): Promise<ConfigEntry[]> {
    const result: ConfigEntry[] = [];
    for (const [key, value] of this.entries) {
      if (key.startsWith(prefix)) {
        result.push({ key, value });
      }
    }
    return result;
  }

  async removeSection(name: string): Promise<void> {
    const prefix = `${name}.`;
    const keys = [...this.entries.keys()].filter(
      (key) => key.startsWith(prefix) && !key.slice(prefix.length).includes('.'),
    );
    if (keys.length === 0) {
      throw new NotFoundError('section', name);
    }
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  /**
   * Snapshot of every stored entry (for tests).
   */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}
