/**
 * Identity Module
 *
 * Identity schema, key layout and the repository over a ConfigStore.
 */

export {
  NAMESPACE,
  RESERVED_ID,
  IDENTITY_FIELDS,
  IdentityIdSchema,
  IdentityPatchSchema,
  canonicalField,
  identityKey,
  isIdentityField,
  parseIdentityKey,
  resolveAuthMethod,
  sectionName,
  shellQuote,
  sshCommandForKey,
} from './schema.js';
export type { AuthMethod, Identity, IdentityField, IdentityPatch } from './schema.js';

export { IdentityRepository } from './repository.js';
export type { IdentityEntry, IdentityGroup, RemovalResult } from './repository.js';
