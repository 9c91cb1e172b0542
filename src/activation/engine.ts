/**
 * Activation Engine
 *
 * Applies a stored identity to the live global configuration (`use`)
 * and verifies the live configuration against the active identity
 * (`status`). Findings are reported as events while the operation runs;
 * the command layer decides how to render them.
 */

import type { AgentCheck, AgentChecker } from '../agent/checker.js';
import { DriftError, NotFoundError } from '../errors.js';
import type { Discrepancy, DriftField } from '../errors.js';
import type { IdentityGroup, IdentityRepository } from '../identity/repository.js';
import type { Identity } from '../identity/schema.js';
import type { ConfigEntry, ConfigStore } from '../storage/interface.js';

/** Top-level key naming the active identity */
export const ACTIVE_KEY = 'user.activeidm';

/** Live configuration key for each field an identity applies */
export const LIVE_KEYS: Record<DriftField, string> = {
  name: 'user.name',
  email: 'user.email',
  sshCommand: 'core.sshCommand',
};

const DRIFT_FIELDS: DriftField[] = ['name', 'email', 'sshCommand'];

// ─── Events ──────────────────────────────────────────────────

export type ActivationEvent =
  | { type: 'applied'; key: string; value: string }
  | { type: 'listing'; group: IdentityGroup }
  | { type: 'agent'; check: AgentCheck }
  | { type: 'drift'; discrepancy: Discrepancy };

export type ActivationEventHandler = (event: ActivationEvent) => void;

// ─── Results ─────────────────────────────────────────────────

export interface UseResult {
  id: string;
  /** Live keys written, in order (the active pointer last) */
  applied: ConfigEntry[];
  agent: AgentCheck;
}

export type StatusReport =
  | { active: false }
  | { active: true; id: string; identity: Identity | undefined; agent: AgentCheck };

// ─── Engine ──────────────────────────────────────────────────

export class ActivationEngine {
  private eventHandlers: ActivationEventHandler[] = [];

  constructor(
    private readonly store: ConfigStore,
    private readonly repository: IdentityRepository,
    private readonly agent: AgentChecker,
  ) {}

  /**
   * Subscribe to activation events.
   */
  on(handler: ActivationEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index >= 0) this.eventHandlers.splice(index, 1);
    };
  }

  /**
   * Make `id` the active identity.
   *
   * Non-empty stored fields overwrite the live ones; empty fields leave
   * the live value alone. The agent check runs last and is advisory.
   */
  async use(id: string): Promise<UseResult> {
    if (!(await this.repository.exists(id))) {
      throw new NotFoundError('identity', id);
    }

    const identity = await this.repository.get(id);
    const applied: ConfigEntry[] = [];

    for (const field of DRIFT_FIELDS) {
      const value = identity?.[field];
      if (value) {
        await this.store.set(LIVE_KEYS[field], value);
        applied.push({ key: LIVE_KEYS[field], value });
        this.emit({ type: 'applied', key: LIVE_KEYS[field], value });
      }
    }

    await this.store.set(ACTIVE_KEY, id);
    applied.push({ key: ACTIVE_KEY, value: id });
    this.emit({ type: 'applied', key: ACTIVE_KEY, value: id });

    const agent = await this.agent.checkLoaded(identity?.sshKey);
    this.emit({ type: 'agent', check: agent });

    return { id, applied, agent };
  }

  /**
   * Compare the live configuration with the active identity.
   *
   * Every discrepancy is emitted before the single DriftError is thrown.
   * An active pointer whose identity no longer exists compares as an
   * identity with every field empty.
   */
  async status(): Promise<StatusReport> {
    const activeId = (await this.store.get(ACTIVE_KEY)) ?? '';
    if (activeId === '') {
      return { active: false };
    }

    const identity = await this.repository.get(activeId);
    const live: Record<DriftField, string> = {
      name: (await this.store.get(LIVE_KEYS.name)) ?? '',
      email: (await this.store.get(LIVE_KEYS.email)) ?? '',
      sshCommand: (await this.store.get(LIVE_KEYS.sshCommand)) ?? '',
    };

    const groups = await this.repository.list();
    const group = groups.find((g) => g.id === activeId) ?? { id: activeId, entries: [] };
    this.emit({ type: 'listing', group });

    const agent = await this.agent.checkLoaded(identity?.sshKey);
    this.emit({ type: 'agent', check: agent });

    const discrepancies: Discrepancy[] = [];
    for (const field of DRIFT_FIELDS) {
      const expected = identity?.[field] ?? '';
      if (expected !== live[field]) {
        const discrepancy: Discrepancy = {
          field,
          key: LIVE_KEYS[field],
          expected,
          actual: live[field],
        };
        discrepancies.push(discrepancy);
        this.emit({ type: 'drift', discrepancy });
      }
    }

    if (discrepancies.length > 0) {
      throw new DriftError(activeId, discrepancies);
    }

    return { active: true, id: activeId, identity, agent };
  }

  /**
   * Clear the active pointer. Returns false when nothing was active;
   * any other store failure propagates.
   */
  async deactivate(): Promise<boolean> {
    try {
      await this.store.unset(ACTIVE_KEY);
      return true;
    } catch (err) {
      if (err instanceof NotFoundError) {
        return false;
      }
      throw err;
    }
  }

  private emit(event: ActivationEvent): void {
    for (const handler of this.eventHandlers) {
      handler(event);
    }
  }
}
