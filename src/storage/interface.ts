/**
 * Configuration Store Interface
 *
 * A flat, dotted-key view of the global git configuration. Every
 * identity and the active pointer live here; nothing is cached
 * between calls.
 */

/** A single key/value pair as the store reports it */
export interface ConfigEntry {
  key: string;
  value: string;
}

export interface ConfigStore {
  /** Store identifier (e.g., 'git', 'memory') */
  readonly id: string;

  /** Read a value; undefined when the key is absent */
  get(key: string): Promise<string | undefined>;

  /** Write a value, replacing any previous one */
  set(key: string, value: string): Promise<void>;

  /** Delete a key; throws NotFoundError('key') when it does not exist */
  unset(key: string): Promise<void>;

  /** Entries whose key starts with prefix, in the store's own order */
  list(prefix: string): Promise<ConfigEntry[]>;

  /** Delete every key of a section; throws NotFoundError('section') when it is empty */
  removeSection(name: string): Promise<void>;
}
