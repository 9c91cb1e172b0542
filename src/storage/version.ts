/**
 * Git version check
 *
 * `core.sshCommand` arrived in git 2.10.0. Older versions silently
 * ignore it, so switching identities would not switch SSH keys.
 */

export const MIN_GIT_VERSION = '2.10.0';

export type VersionTuple = [number, number, number];

export interface GitVersionSource {
  version(): Promise<string>;
}

export type GitVersionCheck =
  | { status: 'ok'; version: string }
  | { status: 'too-old'; version: string; minimum: string }
  | { status: 'unknown'; output: string; minimum: string };

/**
 * Extract the numeric version from `git --version` output.
 *
 * Handles vendor suffixes such as "(Apple Git-146)" and ".windows.1".
 */
export function parseGitVersion(output: string): VersionTuple | undefined {
  const match = /(\d+)\.(\d+)(?:\.(\d+))?/.exec(output);
  if (!match) {
    return undefined;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3] ?? '0')];
}

/**
 * Compare two version tuples; negative when a < b.
 */
export function compareVersions(a: VersionTuple, b: VersionTuple): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

export function formatVersion(version: VersionTuple): string {
  return version.join('.');
}

export async function checkGitVersion(
  source: GitVersionSource,
  minimum: string = MIN_GIT_VERSION,
): Promise<GitVersionCheck> {
  const output = await source.version();
  const actual = parseGitVersion(output);
  const required = parseGitVersion(minimum);

  if (!actual || !required) {
    return { status: 'unknown', output, minimum };
  }

  const version = formatVersion(actual);
  if (compareVersions(actual, required) < 0) {
    return { status: 'too-old', version, minimum };
  }
  return { status: 'ok', version };
}
