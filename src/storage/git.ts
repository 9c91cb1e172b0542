/**
 * Git Configuration Store
 *
 * Default store. Reads and writes the user's global git configuration
 * by running `git config --global`. Each call is one git process.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { IOError, NotFoundError } from '../errors.js';
import type { ConfigEntry, ConfigStore } from './interface.js';

const execFileAsync = promisify(execFile);

/** `git config --get` / `--get-regexp`: nothing matched */
const EXIT_NO_MATCH = 1;

/** `git config --unset`: the key does not exist */
const EXIT_NO_SUCH_KEY = 5;

/**
 * What we could recover from a failed git process.
 */
interface GitFailure {
  exitCode?: number;
  stderr: string;
  message: string;
}

function describeFailure(err: unknown): GitFailure {
  if (!(err instanceof Error)) {
    return { stderr: '', message: String(err) };
  }
  const exitCode = 'code' in err && typeof err.code === 'number' ? err.code : undefined;
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
  return { exitCode, stderr, message: err.message };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse `git config --null --get-regexp` output.
 *
 * Entries are NUL-terminated; key and value are separated by a newline.
 * A key without a value (bare boolean) has no newline.
 */
export function parseNullSeparatedEntries(stdout: string): ConfigEntry[] {
  const entries: ConfigEntry[] = [];
  for (const chunk of stdout.split('\0')) {
    if (chunk.length === 0) continue;
    const newline = chunk.indexOf('\n');
    if (newline < 0) {
      entries.push({ key: chunk, value: '' });
    } else {
      entries.push({ key: chunk.slice(0, newline), value: chunk.slice(newline + 1) });
    }
  }
  return entries;
}

export class GitConfigStore implements ConfigStore {
  readonly id = 'git';
  private readonly binary: string;

  constructor(options?: { binary?: string }) {
    this.binary = options?.binary ?? 'git';
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, args);
    return stdout;
  }

  private fail(action: string, failure: GitFailure): IOError {
    const detail = failure.stderr || failure.message;
    return new IOError(`git config failed to ${action}: ${detail}`);
  }

  async get(key: string): Promise<string | undefined> {
    try {
      const stdout = await this.run(['config', '--global', '--get', key]);
      return stdout.replace(/\n$/, '');
    } catch (err) {
      const failure = describeFailure(err);
      if (failure.exitCode === EXIT_NO_MATCH) {
        return undefined;
      }
      throw this.fail(`read ${key}`, failure);
    }
  }

  async set(key: string, value: string): Promise<void> {
    try {
      await this.run(['config', '--global', key, value]);
    } catch (err) {
      throw this.fail(`write ${key}`, describeFailure(err));
    }
  }

  async unset(key: string): Promise<void> {
    try {
      await this.run(['config', '--global', '--unset', key]);
    } catch (err) {
      const failure = describeFailure(err);
      if (failure.exitCode === EXIT_NO_SUCH_KEY) {
        throw new NotFoundError('key', key);
      }
      throw this.fail(`unset ${key}`, failure);
    }
  }

  async list(prefix: string): Promise<ConfigEntry[]> {
    try {
      const stdout = await this.run([
        'config',
        '--global',
        '--null',
        '--get-regexp',
        `^${escapeRegExp(prefix)}`,
      ]);
      return parseNullSeparatedEntries(stdout);
    } catch (err) {
      const failure = describeFailure(err);
      if (failure.exitCode === EXIT_NO_MATCH) {
        return [];
      }
      throw this.fail(`list ${prefix}`, failure);
    }
  }

  async removeSection(name: string): Promise<void> {
    try {
      await this.run(['config', '--global', '--remove-section', name]);
    } catch (err) {
      const failure = describeFailure(err);
      if (/no such section/i.test(failure.stderr)) {
        throw new NotFoundError('section', name);
      }
      throw this.fail(`remove section ${name}`, failure);
    }
  }

  /**
   * Raw `git --version` output, e.g. "git version 2.39.2".
   */
  async version(): Promise<string> {
    try {
      const stdout = await this.run(['--version']);
      return stdout.trim();
    } catch (err) {
      throw new IOError(`could not run ${this.binary}: ${describeFailure(err).message}`, { cause: err });
    }
  }
}
