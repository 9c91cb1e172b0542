/**
 * git-idm active — Show the active identity and check for drift
 *
 * Exits nonzero when the live configuration no longer matches the
 * active identity; every mismatch is reported first.
 */

import { info, renderActivationEvent, success } from '../cli/output.js';
import { createContext, warnIfGitTooOld } from './context.js';
import type { CommandContext } from './context.js';

export async function activeCommand(ctx?: CommandContext): Promise<void> {
  const context = ctx ?? (await createContext());
  await warnIfGitTooOld(context);

  const unsubscribe = context.engine.on(renderActivationEvent);
  try {
    const report = await context.engine.status();
    if (!report.active) {
      info('No identity active');
      return;
    }
    success(`Identity ${report.id} matches the live configuration`);
  } finally {
    unsubscribe();
  }
}
