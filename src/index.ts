/**
 * git-idm — multiple git identities, one global switch
 *
 * Public API for programmatic usage.
 */

// Errors
export { DriftError, IOError, NotFoundError, ValidationError } from './errors.js';
export type { Discrepancy, DriftField, NotFoundKind } from './errors.js';

// Configuration
export {
  CONFIG_FILE,
  GLOBAL_IDM_DIR,
  IdmConfigSchema,
  defaultConfig,
  globalConfigPath,
  loadConfig,
} from './config.js';
export type { IdmConfig } from './config.js';

// Storage
export {
  GitConfigStore,
  InMemoryConfigStore,
  MIN_GIT_VERSION,
  checkGitVersion,
  compareVersions,
  parseGitVersion,
  resolveStore,
} from './storage/index.js';
export type { ConfigEntry, ConfigStore, GitVersionCheck, GitVersionSource } from './storage/index.js';

// Identities
export {
  IdentityRepository,
  NAMESPACE,
  RESERVED_ID,
  resolveAuthMethod,
  sshCommandForKey,
} from './identity/index.js';
export type {
  AuthMethod,
  Identity,
  IdentityGroup,
  IdentityPatch,
  RemovalResult,
} from './identity/index.js';

// SSH agent
export { AgentChecker, SshAddAgent } from './agent/index.js';
export type { AgentCheck, KeyAgent } from './agent/index.js';

// Activation
export { ActivationEngine, ACTIVE_KEY, LIVE_KEYS } from './activation/index.js';
export type { ActivationEvent, StatusReport, UseResult } from './activation/index.js';
