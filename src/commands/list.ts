/**
 * git-idm list — List stored identities
 */

import chalk from 'chalk';
import { info, printGroup } from '../cli/output.js';
import type { IdentityGroup } from '../identity/repository.js';
import { isIdentityField, resolveAuthMethod } from '../identity/schema.js';
import type { AuthMethod, Identity } from '../identity/schema.js';
import { createContext } from './context.js';
import type { CommandContext } from './context.js';

export interface ListOptions {
  json?: boolean;
}

function toIdentity(group: IdentityGroup): Identity {
  const identity: Identity = { id: group.id };
  for (const { field, value } of group.entries) {
    if (isIdentityField(field)) {
      identity[field] = value;
    }
  }
  return identity;
}

export async function listCommand(options: ListOptions, ctx?: CommandContext): Promise<void> {
  const context = ctx ?? (await createContext());
  const groups = await context.repository.list();

  if (options.json) {
    const output: Array<Identity & { auth: AuthMethod | null }> = groups.map((group) => {
      const identity = toIdentity(group);
      return { ...identity, auth: resolveAuthMethod(identity) ?? null };
    });
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  if (groups.length === 0) {
    info('No identities yet. Add one with:');
    console.log();
    console.log(`    ${chalk.cyan('git-idm add <id> --name <name> --email <email> --key <path>')}`);
    return;
  }

  groups.forEach((group, index) => {
    if (index > 0) console.log();
    printGroup(group);
  });
}
