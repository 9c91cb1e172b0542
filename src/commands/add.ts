/**
 * git-idm add — Create an identity or update fields of an existing one
 */

import { access, constants, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { IOError, ValidationError } from '../errors.js';
import { success } from '../cli/output.js';
import { IdentityIdSchema } from '../identity/schema.js';
import { createContext } from './context.js';
import type { CommandContext } from './context.js';

export interface AddOptions {
  name?: string;
  email?: string;
  key?: string;
  sshCommand?: string;
}

/**
 * Absolute path of a regular key file that is readable right now.
 */
export async function readableKeyPath(path: string): Promise<string> {
  if (path === '') {
    throw new ValidationError('key path must not be empty');
  }

  const absolute = resolve(path);
  let isFile: boolean;
  try {
    isFile = (await stat(absolute)).isFile();
    await access(absolute, constants.R_OK);
  } catch (err) {
    throw new IOError(`cannot read key file ${path}`, { cause: err });
  }
  if (!isFile) {
    throw new IOError(`key file ${path} is not a regular file`);
  }
  return absolute;
}

export async function addCommand(id: string, options: AddOptions, ctx?: CommandContext): Promise<void> {
  // Reserved and malformed ids fail before any flag is looked at
  const idResult = IdentityIdSchema.safeParse(id);
  if (!idResult.success) {
    throw new ValidationError(idResult.error.issues.map((issue) => issue.message).join('; '));
  }

  if (options.key !== undefined && options.sshCommand !== undefined) {
    throw new ValidationError('conflicting auth method: --key and --ssh-command cannot be used together');
  }

  const keyPath = options.key !== undefined ? await readableKeyPath(options.key) : undefined;

  const context = ctx ?? (await createContext());
  const existed = await context.repository.exists(id);

  await context.repository.upsert(id, {
    name: options.name,
    email: options.email,
    keyPath,
    sshCommand: options.sshCommand,
  });

  success(`${existed ? 'Updated' : 'Added'} identity ${id}`);
}
