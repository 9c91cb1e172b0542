/**
 * Terminal Output
 *
 * Results go to stdout. Diagnostics go to stderr, prefixed `ERROR:` for
 * failures and `WARNING:` for advisory conditions that never change the
 * exit code.
 */

import ora from 'ora';
import type { Ora } from 'ora';
import chalk from 'chalk';
import type { ActivationEvent } from '../activation/engine.js';
import type { AgentCheck } from '../agent/checker.js';
import type { Discrepancy } from '../errors.js';
import type { IdentityGroup } from '../identity/repository.js';
import type { GitVersionCheck } from '../storage/version.js';

/** Width of the field label column in identity listings */
const LABEL_WIDTH = 13;

// ─── Convenience Functions ───────────────────────────────────

/**
 * Create a simple spinner (renders on stderr)
 */
export function createSpinner(text: string): Ora {
  return ora({ text }).start();
}

/**
 * Show a success message with checkmark
 */
export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message);
}

/**
 * Show an informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + message);
}

/**
 * Show an advisory warning
 */
export function warning(message: string): void {
  console.error(chalk.yellow('WARNING:') + ' ' + message);
}

/**
 * Show a fatal error
 */
export function error(message: string): void {
  console.error(chalk.red('ERROR:') + ' ' + message);
}

// ─── Formatting ──────────────────────────────────────────────

/**
 * An identity as a header line followed by its labelled fields.
 */
export function formatGroup(group: IdentityGroup): string[] {
  const lines = [chalk.bold.cyan(group.id)];
  for (const { field, value } of group.entries) {
    lines.push(`  ${chalk.dim(`${field}:`.padEnd(LABEL_WIDTH))}${value}`);
  }
  return lines;
}

export function printGroup(group: IdentityGroup): void {
  for (const line of formatGroup(group)) {
    console.log(line);
  }
}

function quoted(value: string): string {
  return value === '' ? '(unset)' : `"${value}"`;
}

export function describeDiscrepancy(discrepancy: Discrepancy): string {
  return `${discrepancy.key} is ${quoted(discrepancy.actual)}, identity has ${quoted(discrepancy.expected)}`;
}

/**
 * Warning text for an agent check, or undefined when there is nothing to say.
 */
export function describeAgentCheck(check: AgentCheck): string | undefined {
  if (check.status !== 'missing') {
    return undefined;
  }
  const reason = check.reason ? ` (${check.reason})` : '';
  return `SSH key ${check.keyPath} is not loaded in ssh-agent${reason}; run \`${check.remedy}\``;
}

/**
 * Warning text for a git version check, or undefined when git is recent enough.
 */
export function describeGitVersion(check: GitVersionCheck): string | undefined {
  switch (check.status) {
    case 'ok':
      return undefined;
    case 'too-old':
      return `git ${check.version} is older than ${check.minimum}; core.sshCommand will be ignored`;
    case 'unknown':
      return `could not determine git version from "${check.output}" (need ${check.minimum} or newer)`;
  }
}

/**
 * Render engine events as they arrive.
 */
export function renderActivationEvent(event: ActivationEvent): void {
  switch (event.type) {
    case 'applied':
      console.log(`  ${chalk.dim(event.key)} ${event.value}`);
      break;
    case 'listing':
      printGroup(event.group);
      break;
    case 'agent': {
      const message = describeAgentCheck(event.check);
      if (message) warning(message);
      break;
    }
    case 'drift':
      warning(describeDiscrepancy(event.discrepancy));
      break;
  }
}

/**
 * Report a failed command and return its exit code.
 */
export function reportError(err: unknown): number {
  error(err instanceof Error ? err.message : String(err));
  return 1;
}
