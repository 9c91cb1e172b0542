/**
 * Command re-exports
 */

export { activeCommand } from './active.js';
export { addCommand } from './add.js';
export { listCommand } from './list.js';
export { removeCommand } from './remove.js';
export { useCommand } from './use.js';
export { uninstallCommand } from './uninstall.js';
export { packageVersion, versionCommand } from './version.js';
export { createContext } from './context.js';
export type { CommandContext } from './context.js';
