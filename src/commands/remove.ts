/**
 * git-idm remove — Remove one identity, or all of them
 */

import { createSpinner, error, info, success } from '../cli/output.js';
import { IOError } from '../errors.js';
import type { RemovalResult } from '../identity/repository.js';
import { RESERVED_ID } from '../identity/schema.js';
import { createContext } from './context.js';
import type { CommandContext } from './context.js';

/**
 * Print one line per removal; throw when any of them failed.
 */
export function reportRemovals(results: RemovalResult[]): void {
  let failed = 0;
  for (const result of results) {
    if (result.removed) {
      success(`Removed identity ${result.id}`);
    } else {
      failed++;
      error(`could not remove identity ${result.id}: ${result.error.message}`);
    }
  }

  if (failed > 0) {
    throw new IOError(`${failed} of ${results.length} identities could not be removed`);
  }
}

export async function removeCommand(id: string, ctx?: CommandContext): Promise<void> {
  const context = ctx ?? (await createContext());

  if (id !== RESERVED_ID) {
    reportRemovals(await context.repository.remove(id));
    return;
  }

  const spinner = createSpinner('Removing all identities...');
  let results: RemovalResult[];
  try {
    results = await context.repository.remove(RESERVED_ID);
  } finally {
    spinner.stop();
  }

  if (results.length === 0) {
    info('No identities to remove');
    return;
  }
  reportRemovals(results);
}
