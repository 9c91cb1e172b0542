/**
 * Store Resolver
 *
 * Creates the configuration store from the tool configuration.
 */

import type { IdmConfig } from '../config.js';
import { GitConfigStore } from './git.js';

export function resolveStore(config: IdmConfig): GitConfigStore {
  return new GitConfigStore({ binary: config.git.binary });
}
