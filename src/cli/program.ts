/**
 * git-idm command-line program
 */

import { Command, Option } from 'commander';
import type { CommanderError } from 'commander';
import {
  activeCommand,
  addCommand,
  listCommand,
  packageVersion,
  removeCommand,
  uninstallCommand,
  useCommand,
  versionCommand,
} from '../commands/index.js';
import type { AddOptions } from '../commands/add.js';
import type { ListOptions } from '../commands/list.js';
import type { CommandContext } from '../commands/context.js';
import { runCommand } from './run.js';

/**
 * Help output counts as a usage error: `-h` and `help` exit 1.
 */
function exitWith(err: CommanderError): never {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed') {
    process.exit(1);
  }
  process.exit(err.exitCode);
}

/**
 * Build the git-idm program. Commands run against `ctx` when given,
 * otherwise against a context created from the global configuration.
 */
export function createProgram(ctx?: CommandContext): Command {
  const program = new Command();

  program
    .name('git-idm')
    .description('Keep several git identities and switch the global one.')
    .version(packageVersion(), '-v, --version', 'Print the version')
    .exitOverride(exitWith);

  // ─── git-idm active ──────────────────────────────────────────

  program
    .command('active')
    .description('Show the active identity and check the live configuration against it')
    .action(() => runCommand(() => activeCommand(ctx)));

  // ─── git-idm add ─────────────────────────────────────────────

  program
    .command('add <id>')
    .description('Add an identity, or update fields of an existing one')
    .option('--name <name>', 'Author name (user.name)')
    .option('--email <email>', 'Author email (user.email)')
    .addOption(
      new Option('--key <path>', 'Private key file; sets core.sshCommand to use only this key').conflicts('sshCommand'),
    )
    .addOption(new Option('--ssh-command <command>', 'Custom core.sshCommand').conflicts('key'))
    .action((id: string, options: AddOptions) => runCommand(() => addCommand(id, options, ctx)));

  // ─── git-idm list ────────────────────────────────────────────

  program
    .command('list')
    .alias('ls')
    .description('List all identities')
    .option('--json', 'Output as JSON')
    .action((options: ListOptions) => runCommand(() => listCommand(options, ctx)));

  // ─── git-idm remove ──────────────────────────────────────────

  program
    .command('remove <id>')
    .alias('rm')
    .description('Remove an identity, or every identity with "all"')
    .action((id: string) => runCommand(() => removeCommand(id, ctx)));

  // ─── git-idm use ─────────────────────────────────────────────

  program
    .command('use <id>')
    .description('Apply an identity to the global git configuration')
    .action((id: string) => runCommand(() => useCommand(id, ctx)));

  // ─── git-idm uninstall ───────────────────────────────────────

  program
    .command('uninstall')
    .description('Remove all identities and clear the active identity')
    .action(() => runCommand(() => uninstallCommand({}, ctx)));

  // ─── git-idm version ─────────────────────────────────────────

  program
    .command('version')
    .description('Print the version')
    .action(() => versionCommand());

  return program;
}
