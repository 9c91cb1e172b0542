/**
 * Command context
 *
 * Wires the store, repository, agent checker and engine together from
 * the tool configuration. Tests build their own context around an
 * in-memory store.
 */

import { ActivationEngine } from '../activation/engine.js';
import { AgentChecker, SshAddAgent } from '../agent/checker.js';
import { describeGitVersion, warning } from '../cli/output.js';
import { loadConfig } from '../config.js';
import type { IdmConfig } from '../config.js';
import { IdentityRepository } from '../identity/repository.js';
import type { ConfigStore } from '../storage/interface.js';
import { resolveStore } from '../storage/resolve.js';
import { checkGitVersion } from '../storage/version.js';
import type { GitVersionSource } from '../storage/version.js';

export interface CommandContext {
  config: IdmConfig;
  store: ConfigStore;
  repository: IdentityRepository;
  engine: ActivationEngine;
  /** Where to ask for the git version; absent for stores that aren't git */
  git?: GitVersionSource;
}

export async function createContext(configPath?: string): Promise<CommandContext> {
  const config = await loadConfig(configPath);
  const store = resolveStore(config);
  const agent = new AgentChecker(config.agent.enabled ? new SshAddAgent(config.agent.binary) : undefined);
  const repository = new IdentityRepository(store);
  const engine = new ActivationEngine(store, repository, agent);
  return { config, store, repository, engine, git: store };
}

/**
 * Warn when git is too old to honour core.sshCommand.
 */
export async function warnIfGitTooOld(ctx: CommandContext): Promise<void> {
  if (!ctx.git) {
    return;
  }
  const check = await checkGitVersion(ctx.git, ctx.config.git.minVersion);
  const message = describeGitVersion(check);
  if (message) {
    warning(message);
  }
}
