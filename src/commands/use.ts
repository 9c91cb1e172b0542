/**
 * git-idm use — Apply an identity to the global git configuration
 */

import { renderActivationEvent, success } from '../cli/output.js';
import { createContext, warnIfGitTooOld } from './context.js';
import type { CommandContext } from './context.js';

export async function useCommand(id: string, ctx?: CommandContext): Promise<void> {
  const context = ctx ?? (await createContext());
  await warnIfGitTooOld(context);

  const unsubscribe = context.engine.on(renderActivationEvent);
  try {
    await context.engine.use(id);
  } finally {
    unsubscribe();
  }

  success(`Now using identity ${id}`);
}
