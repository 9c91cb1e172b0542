/**
 * Storage module re-exports
 */

export { GitConfigStore, parseNullSeparatedEntries } from './git.js';
export { InMemoryConfigStore } from './memory.js';
export { resolveStore } from './resolve.js';
export {
  MIN_GIT_VERSION,
  checkGitVersion,
  compareVersions,
  formatVersion,
  parseGitVersion,
} from './version.js';
export type { GitVersionCheck, GitVersionSource, VersionTuple } from './version.js';
export type { ConfigEntry, ConfigStore } from './interface.js';
