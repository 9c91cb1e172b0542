/**
 * git-idm uninstall — Remove every identity and clear the active pointer
 *
 * The executable itself is left for the user to delete.
 */

import { createSpinner, error, info, success } from '../cli/output.js';
import type { RemovalResult } from '../identity/repository.js';
import { RESERVED_ID } from '../identity/schema.js';
import { createContext } from './context.js';
import type { CommandContext } from './context.js';
import { reportRemovals } from './remove.js';

export interface UninstallOptions {
  /** Path shown in the final instruction (defaults to the running script) */
  executable?: string;
}

export async function uninstallCommand(options: UninstallOptions = {}, ctx?: CommandContext): Promise<void> {
  const context = ctx ?? (await createContext());

  const spinner = createSpinner('Removing all identities...');
  let results: RemovalResult[];
  try {
    results = await context.repository.remove(RESERVED_ID);
  } finally {
    spinner.stop();
  }

  let removalError: unknown;
  try {
    reportRemovals(results);
  } catch (err) {
    removalError = err;
  }

  let cleared: boolean;
  try {
    cleared = await context.engine.deactivate();
  } catch (err) {
    if (removalError instanceof Error) {
      error(removalError.message);
    }
    throw err;
  }
  if (cleared) {
    success('Cleared active identity');
  }

  if (removalError !== undefined) {
    throw removalError;
  }

  const executable = options.executable ?? process.argv[1] ?? 'git-idm';
  info(`To finish uninstalling, delete the git-idm executable: ${executable}`);
}
