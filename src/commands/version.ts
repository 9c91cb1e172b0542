/**
 * git-idm version
 */

import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

/**
 * Version from package.json (two levels up from both src/commands and dist/commands).
 */
export function packageVersion(): string {
  const pkg: unknown = require('../../package.json');
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function versionCommand(): void {
  console.log(`git-idm ${packageVersion()}`);
}
