/**
 * Identity Schema
 *
 * An identity is a flat section of the global git configuration:
 *
 *   [gitidm "work"]
 *       name = Jane Doe
 *       email = jane@work.example
 *       sshKey = /home/jane/.ssh/id_work
 *       sshCommand = ssh -i /home/jane/.ssh/id_work -o IdentitiesOnly=yes -F /dev/null
 */

import { z } from 'zod';

/** Section holding every identity */
export const NAMESPACE = 'gitidm';

/** Id that addresses every identity at once; cannot name one */
export const RESERVED_ID = 'all';

/** Stored fields, in the order they are written and displayed */
export const IDENTITY_FIELDS = ['name', 'email', 'sshKey', 'sshCommand'] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

/**
 * A stored identity. Any field may be missing; a field that was never
 * supplied is absent rather than empty.
 */
export interface Identity {
  id: string;
  name?: string;
  email?: string;
  /** Private key path (key-file identities only) */
  sshKey?: string;
  /** Command git runs for SSH, derived from sshKey or supplied directly */
  sshCommand?: string;
}

/**
 * How an identity authenticates over SSH.
 */
export type AuthMethod =
  | { kind: 'keyFile'; path: string; command: string }
  | { kind: 'customCommand'; command: string };

export const IdentityIdSchema = z
  .string()
  .min(1, 'identity id must not be empty')
  .regex(/^\S+$/, 'identity id must not contain whitespace')
  .refine((id) => id !== RESERVED_ID, { message: `"${RESERVED_ID}" is a reserved identity id` });

const nonEmpty = (field: string) => z.string().min(1, `${field} must not be empty`);

/**
 * Fields supplied to a single create/update call.
 *
 * `keyPath` and `sshCommand` are the two auth methods; a call may carry
 * at most one of them.
 */
export const IdentityPatchSchema = z
  .object({
    name: nonEmpty('name').optional(),
    email: nonEmpty('email').optional(),
    keyPath: nonEmpty('key path').optional(),
    sshCommand: nonEmpty('ssh command').optional(),
  })
  .strict()
  .refine((patch) => patch.keyPath === undefined || patch.sshCommand === undefined, {
    message: 'conflicting auth method: give either a key file or an ssh command, not both',
  });

export type IdentityPatch = z.infer<typeof IdentityPatchSchema>;

const SHELL_SAFE = /^[\w@%+=:,./~-]+$/;

/**
 * Quote a word for the POSIX shell git runs core.sshCommand through.
 */
export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * SSH command that uses exactly one private key and ignores ~/.ssh/config.
 */
export function sshCommandForKey(path: string): string {
  return `ssh -i ${shellQuote(path)} -o IdentitiesOnly=yes -F /dev/null`;
}

/**
 * Work out which auth method a stored identity carries.
 */
export function resolveAuthMethod(identity: Identity): AuthMethod | undefined {
  if (identity.sshKey) {
    return {
      kind: 'keyFile',
      path: identity.sshKey,
      command: identity.sshCommand ?? sshCommandForKey(identity.sshKey),
    };
  }
  if (identity.sshCommand) {
    return { kind: 'customCommand', command: identity.sshCommand };
  }
  return undefined;
}

const FIELD_BY_LOWERCASE = new Map<string, IdentityField>(
  IDENTITY_FIELDS.map((field) => [field.toLowerCase(), field]),
);

/**
 * Map a variable name back to its canonical spelling.
 *
 * git reports variable names lower-cased (`sshkey`); unknown names pass through.
 */
export function canonicalField(name: string): string {
  return FIELD_BY_LOWERCASE.get(name.toLowerCase()) ?? name;
}

export function isIdentityField(name: string): name is IdentityField {
  return (IDENTITY_FIELDS as readonly string[]).includes(name);
}

/** `gitidm.<id>` */
export function sectionName(id: string): string {
  return `${NAMESPACE}.${id}`;
}

/** `gitidm.<id>.<field>` */
export function identityKey(id: string, field: IdentityField): string {
  return `${sectionName(id)}.${field}`;
}

/**
 * Split `gitidm.<id>.<field>` into its id and canonical field name.
 *
 * The id may itself contain dots; the field is whatever follows the last one.
 */
export function parseIdentityKey(key: string): { id: string; field: string } | undefined {
  const prefix = `${NAMESPACE}.`;
  if (!key.toLowerCase().startsWith(prefix)) {
    return undefined;
  }
  const lastDot = key.lastIndexOf('.');
  if (lastDot <= prefix.length) {
    return undefined;
  }
  return {
    id: key.slice(prefix.length, lastDot),
    field: canonicalField(key.slice(lastDot + 1)),
  };
}
