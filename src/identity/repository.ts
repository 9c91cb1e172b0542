/**
 * Identity Repository
 *
 * CRUD over identities stored in a ConfigStore. The store is the only
 * source of truth: re-adding an id merges into the existing section.
 */

import type { ZodError } from 'zod';
import { NotFoundError, ValidationError } from '../errors.js';
import type { ConfigStore } from '../storage/interface.js';
import {
  IDENTITY_FIELDS,
  IdentityIdSchema,
  IdentityPatchSchema,
  NAMESPACE,
  RESERVED_ID,
  identityKey,
  parseIdentityKey,
  sectionName,
  sshCommandForKey,
} from './schema.js';
import type { Identity, IdentityField, IdentityPatch } from './schema.js';

/** One stored field of an identity, as listed */
export interface IdentityEntry {
  field: string;
  value: string;
}

/** An identity's fields grouped under its id */
export interface IdentityGroup {
  id: string;
  entries: IdentityEntry[];
}

export type RemovalResult =
  | { id: string; removed: true }
  | { id: string; removed: false; error: Error };

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

export class IdentityRepository {
  constructor(private readonly store: ConfigStore) {}

  /**
   * Entries that belong to exactly this id (not to `<id>.<more>`).
   */
  private async entriesFor(id: string): Promise<IdentityEntry[]> {
    const entries = await this.store.list(`${sectionName(id)}.`);
    const result: IdentityEntry[] = [];
    for (const { key, value } of entries) {
      const parsed = parseIdentityKey(key);
      if (parsed && parsed.id === id) {
        result.push({ field: parsed.field, value });
      }
    }
    return result;
  }

  async exists(id: string): Promise<boolean> {
    const entries = await this.entriesFor(id);
    return entries.length > 0;
  }

  /**
   * Create an identity or merge fields into an existing one.
   *
   * Every check runs before the first write. Only supplied fields are
   * written; a key path also writes the ssh command derived from it.
   */
  async upsert(id: string, patch: IdentityPatch): Promise<Identity> {
    const idResult = IdentityIdSchema.safeParse(id);
    if (!idResult.success) {
      throw new ValidationError(describeIssues(idResult.error));
    }

    const patchResult = IdentityPatchSchema.safeParse(patch);
    if (!patchResult.success) {
      throw new ValidationError(describeIssues(patchResult.error));
    }
    const fields = patchResult.data;

    if (!(await this.exists(id))) {
      const missing: string[] = [];
      if (fields.name === undefined) missing.push('name');
      if (fields.email === undefined) missing.push('email');
      if (fields.keyPath === undefined && fields.sshCommand === undefined) {
        missing.push('key or ssh command');
      }
      if (missing.length > 0) {
        throw new ValidationError(`incomplete new identity "${id}": missing ${missing.join(', ')}`);
      }
    }

    const writes: Array<[IdentityField, string]> = [];
    if (fields.name !== undefined) writes.push(['name', fields.name]);
    if (fields.email !== undefined) writes.push(['email', fields.email]);
    if (fields.keyPath !== undefined) {
      writes.push(['sshKey', fields.keyPath]);
      writes.push(['sshCommand', sshCommandForKey(fields.keyPath)]);
    }
    if (fields.sshCommand !== undefined) writes.push(['sshCommand', fields.sshCommand]);

    for (const [field, value] of writes) {
      await this.store.set(identityKey(id, field), value);
    }

    const identity = await this.get(id);
    if (!identity) {
      throw new NotFoundError('identity', id);
    }
    return identity;
  }

  /**
   * Read an identity; undefined when none of its fields are stored.
   */
  async get(id: string): Promise<Identity | undefined> {
    const identity: Identity = { id };
    let found = false;

    for (const field of IDENTITY_FIELDS) {
      const value = await this.store.get(identityKey(id, field));
      if (value !== undefined) {
        identity[field] = value;
        found = true;
      }
    }

    return found ? identity : undefined;
  }

  /**
   * Remove one identity, or every identity when id is "all".
   *
   * A batch removal attempts every id and reports each outcome; only a
   * single-id removal throws.
   */
  async remove(id: string): Promise<RemovalResult[]> {
    if (id === RESERVED_ID) {
      return this.removeAll();
    }
    await this.removeOne(id);
    return [{ id, removed: true }];
  }

  private async removeOne(id: string): Promise<void> {
    try {
      await this.store.removeSection(sectionName(id));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError('identity', id);
      }
      throw err;
    }
  }

  private async removeAll(): Promise<RemovalResult[]> {
    const groups = await this.list();
    const results: RemovalResult[] = [];

    for (const { id } of groups) {
      try {
        await this.removeOne(id);
        results.push({ id, removed: true });
      } catch (err) {
        results.push({ id, removed: false, error: err instanceof Error ? err : new Error(String(err)) });
      }
    }

    return results;
  }

  /**
   * Every identity with its stored fields, in store order.
   */
  async list(): Promise<IdentityGroup[]> {
    const entries = await this.store.list(`${NAMESPACE}.`);
    const groups = new Map<string, IdentityGroup>();

    for (const { key, value } of entries) {
      const parsed = parseIdentityKey(key);
      if (!parsed) continue;

      let group = groups.get(parsed.id);
      if (!group) {
        group = { id: parsed.id, entries: [] };
        groups.set(parsed.id, group);
      }
      group.entries.push({ field: parsed.field, value });
    }

    return [...groups.values()];
  }
}
