/**
 * Command runner
 *
 * Commands throw; this turns a thrown error into `ERROR:` output and a
 * nonzero exit code.
 */

import { reportError } from './output.js';

export async function runCommand(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    process.exitCode = reportError(err);
  }
}
