/**
 * SSH Agent Checker
 *
 * Advisory only: tells the user when an identity's key is not loaded in
 * ssh-agent. Never throws and never fails the calling command.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/**
 * Source of the agent's loaded-key listing.
 */
export interface KeyAgent {
  /** Raw listing, one key per line (fingerprint and comment/path) */
  listKeys(): Promise<string>;
}

export type AgentCheck =
  | { status: 'skipped' }
  | { status: 'loaded'; keyPath: string }
  | { status: 'missing'; keyPath: string; remedy: string; reason?: string };

/**
 * `ssh-add -l`. Exits 1 when the agent holds no keys and 2 when no
 * agent is reachable; both reject.
 */
export class SshAddAgent implements KeyAgent {
  constructor(private readonly binary: string = 'ssh-add') {}

  async listKeys(): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, ['-l']);
    return stdout;
  }
}

export class AgentChecker {
  /**
   * @param agent - Key agent to query; without one every check is skipped
   */
  constructor(private readonly agent?: KeyAgent) {}

  async checkLoaded(keyPath?: string): Promise<AgentCheck> {
    if (!keyPath || !this.agent) {
      return { status: 'skipped' };
    }

    const remedy = `ssh-add ${keyPath}`;

    let listing: string;
    try {
      listing = await this.agent.listKeys();
    } catch (err) {
      return { status: 'missing', keyPath, remedy, reason: describeAgentFailure(err) };
    }

    if (listing.includes(keyPath)) {
      return { status: 'loaded', keyPath };
    }
    return { status: 'missing', keyPath, remedy };
  }
}

function describeAgentFailure(err: unknown): string {
  if (err instanceof Error) {
    const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
    const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout.trim() : '';
    return stderr || stdout || err.message;
  }
  return String(err);
}
