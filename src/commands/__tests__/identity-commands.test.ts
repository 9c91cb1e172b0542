/**
 * Command Tests
 *
 * Commands run against an in-memory store; output is captured from the
 * console with colours disabled.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { activeCommand } from '../active.js';
import { addCommand } from '../add.js';
import { listCommand } from '../list.js';
import { removeCommand } from '../remove.js';
import { uninstallCommand } from '../uninstall.js';
import { useCommand } from '../use.js';
import { versionCommand } from '../version.js';
import type { CommandContext } from '../context.js';
import { runCommand } from '../../cli/run.js';
import { ActivationEngine } from '../../activation/engine.js';
import { AgentChecker } from '../../agent/checker.js';
import { defaultConfig } from '../../config.js';
import { DriftError, IOError, NotFoundError, ValidationError } from '../../errors.js';
import { IdentityRepository } from '../../identity/repository.js';
import { InMemoryConfigStore } from '../../storage/memory.js';

// Mock ora
vi.mock('ora', () => {
  const mockSpinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return {
    default: vi.fn(() => mockSpinner),
  };
});

function makeContext(initial: Record<string, string> = {}): { ctx: CommandContext; store: InMemoryConfigStore } {
  const store = new InMemoryConfigStore(initial);
  const repository = new IdentityRepository(store);
  const engine = new ActivationEngine(store, repository, new AgentChecker({ listKeys: async () => '' }));
  return { store, ctx: { config: defaultConfig(), store, repository, engine } };
}

const WORK = { name: 'Jane Doe', email: 'jane@work.example', sshCommand: 'ssh -i /keys/work' };

describe('commands', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = () => logSpy.mock.calls.map((args) => args.join(' '));
  const errored = () => errorSpy.mock.calls.map((args) => args.join(' '));

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    vi.clearAllMocks();
  });

  describe('add', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'git-idm-add-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('creates an identity from a readable key file', async () => {
      const keyPath = join(dir, 'id_work');
      await writeFile(keyPath, 'placeholder key');
      const { ctx, store } = makeContext();

      await addCommand('work', { name: 'Jane Doe', email: 'jane@work.example', key: keyPath }, ctx);

      expect(store.toRecord()).toEqual({
        'gitidm.work.name': 'Jane Doe',
        'gitidm.work.email': 'jane@work.example',
        'gitidm.work.sshKey': keyPath,
        'gitidm.work.sshCommand': `ssh -i ${keyPath} -o IdentitiesOnly=yes -F /dev/null`,
      });
      expect(logged()).toEqual(['✓ Added identity work']);
    });

    it('fails before writing when the key file is unreadable', async () => {
      const { ctx, store } = makeContext();
      const missing = join(dir, 'missing');

      await expect(
        addCommand('work', { name: 'Jane Doe', email: 'jane@work.example', key: missing }, ctx),
      ).rejects.toThrow(new IOError(`cannot read key file ${missing}`));
      expect(store.toRecord()).toEqual({});
    });

    it('rejects the reserved id before looking at the key file', async () => {
      const { ctx, store } = makeContext();

      await expect(
        addCommand('all', { name: 'Jane Doe', email: 'jane@work.example', key: join(dir, 'missing') }, ctx),
      ).rejects.toThrow(new ValidationError('"all" is a reserved identity id'));
      expect(store.toRecord()).toEqual({});
    });

    it('rejects an empty key path', async () => {
      const { ctx, store } = makeContext();

      await expect(
        addCommand('work', { name: 'Jane Doe', email: 'jane@work.example', key: '' }, ctx),
      ).rejects.toThrow(new ValidationError('key path must not be empty'));
      expect(store.toRecord()).toEqual({});
    });

    it('rejects a key path that is a directory', async () => {
      const { ctx, store } = makeContext();

      await expect(
        addCommand('work', { name: 'Jane Doe', email: 'jane@work.example', key: dir }, ctx),
      ).rejects.toThrow(new IOError(`key file ${dir} is not a regular file`));
      expect(store.toRecord()).toEqual({});
    });

    it('rejects --key together with --ssh-command', async () => {
      const { ctx, store } = makeContext();

      await expect(
        addCommand('work', { ...WORK, key: join(dir, 'id_work') }, ctx),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(store.toRecord()).toEqual({});
    });

    it('updates an existing identity', async () => {
      const { ctx, store } = makeContext();
      await addCommand('work', WORK, ctx);

      await addCommand('work', { email: 'jane@new.example' }, ctx);

      expect(await store.get('gitidm.work.email')).toBe('jane@new.example');
      expect(await store.get('gitidm.work.name')).toBe('Jane Doe');
      expect(logged()).toEqual(['✓ Added identity work', '✓ Updated identity work']);
    });
  });

  describe('list', () => {
    it('prints each identity under a header', async () => {
      const { ctx } = makeContext();
      await ctx.repository.upsert('work', WORK);
      await ctx.repository.upsert('home', { name: 'Jane', email: 'jane@home.example', sshCommand: 'ssh' });

      await listCommand({}, ctx);

      expect(logged()).toEqual([
        'work',
        '  name:        Jane Doe',
        '  email:       jane@work.example',
        '  sshCommand:  ssh -i /keys/work',
        '',
        'home',
        '  name:        Jane',
        '  email:       jane@home.example',
        '  sshCommand:  ssh',
      ]);
    });

    it('prints JSON with the resolved auth method', async () => {
      const { ctx } = makeContext();
      await ctx.repository.upsert('work', WORK);

      await listCommand({ json: true }, ctx);

      expect(JSON.parse(logged()[0] ?? '')).toEqual([
        {
          id: 'work',
          name: 'Jane Doe',
          email: 'jane@work.example',
          sshCommand: 'ssh -i /keys/work',
          auth: { kind: 'customCommand', command: 'ssh -i /keys/work' },
        },
      ]);
    });

    it('explains how to add the first identity', async () => {
      const { ctx } = makeContext();

      await listCommand({}, ctx);

      expect(logged()[0]).toBe('ℹ No identities yet. Add one with:');
    });
  });

  describe('use', () => {
    it('applies the identity and reports what changed', async () => {
      const { ctx, store } = makeContext();
      await ctx.repository.upsert('work', WORK);

      await useCommand('work', ctx);

      expect(await store.get('user.activeidm')).toBe('work');
      expect(logged()).toEqual([
        '  user.name Jane Doe',
        '  user.email jane@work.example',
        '  core.sshCommand ssh -i /keys/work',
        '  user.activeidm work',
        '✓ Now using identity work',
      ]);
      expect(errored()).toEqual([]);
    });

    it('warns when git is too old for core.sshCommand', async () => {
      const { ctx } = makeContext();
      await ctx.repository.upsert('work', WORK);
      ctx.git = { version: async () => 'git version 2.9.0' };

      await useCommand('work', ctx);

      expect(errored()).toEqual(['WARNING: git 2.9.0 is older than 2.10.0; core.sshCommand will be ignored']);
    });

    it('fails for an unknown identity', async () => {
      const { ctx } = makeContext();
      await expect(useCommand('nope', ctx)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('active', () => {
    it('reports that no identity is active', async () => {
      const { ctx } = makeContext();

      await activeCommand(ctx);

      expect(logged()).toEqual(['ℹ No identity active']);
    });

    it('lists the active identity when it matches', async () => {
      const { ctx } = makeContext();
      await ctx.repository.upsert('work', WORK);
      await ctx.engine.use('work');

      await activeCommand(ctx);

      expect(logged()).toEqual([
        'work',
        '  name:        Jane Doe',
        '  email:       jane@work.example',
        '  sshCommand:  ssh -i /keys/work',
        '✓ Identity work matches the live configuration',
      ]);
    });

    it('warns about every drifted field and fails', async () => {
      const { ctx, store } = makeContext();
      await ctx.repository.upsert('work', WORK);
      await ctx.engine.use('work');
      await store.set('user.email', 'other@example.com');

      await expect(activeCommand(ctx)).rejects.toBeInstanceOf(DriftError);
      expect(errored()).toEqual(['WARNING: user.email is "other@example.com", identity has "jane@work.example"']);
    });
  });

  describe('remove', () => {
    it('removes one identity', async () => {
      const { ctx, store } = makeContext();
      await ctx.repository.upsert('work', WORK);

      await removeCommand('work', ctx);

      expect(store.toRecord()).toEqual({});
      expect(logged()).toEqual(['✓ Removed identity work']);
    });

    it('fails for an unknown identity', async () => {
      const { ctx } = makeContext();
      await expect(removeCommand('nope', ctx)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports each identity of "all" and fails when one could not be removed', async () => {
      const { ctx, store } = makeContext();
      for (const id of ['a', 'b', 'c']) {
        await ctx.repository.upsert(id, { name: id, email: `${id}@example.com`, sshCommand: 'ssh' });
      }
      const removeSection = store.removeSection.bind(store);
      vi.spyOn(store, 'removeSection').mockImplementation(async (name: string) => {
        if (name === 'gitidm.b') throw new IOError('could not lock config file');
        return removeSection(name);
      });

      await expect(removeCommand('all', ctx)).rejects.toThrow(
        new IOError('1 of 3 identities could not be removed'),
      );
      expect(logged()).toEqual(['✓ Removed identity a', '✓ Removed identity c']);
      expect(errored()).toEqual(['ERROR: could not remove identity b: could not lock config file']);
    });

    it('says so when there is nothing to remove', async () => {
      const { ctx } = makeContext();

      await removeCommand('all', ctx);

      expect(logged()).toEqual(['ℹ No identities to remove']);
    });
  });

  describe('uninstall', () => {
    it('removes identities, clears the active pointer and points at the executable', async () => {
      const { ctx, store } = makeContext({ 'user.name': 'Jane Doe' });
      await ctx.repository.upsert('work', WORK);
      await ctx.repository.upsert('home', { name: 'Jane', email: 'jane@home.example', sshCommand: 'ssh' });
      await store.set('user.activeidm', 'work');

      await uninstallCommand({ executable: '/usr/local/bin/git-idm' }, ctx);

      expect(store.toRecord()).toEqual({ 'user.name': 'Jane Doe' });
      expect(logged()).toEqual([
        '✓ Removed identity work',
        '✓ Removed identity home',
        '✓ Cleared active identity',
        'ℹ To finish uninstalling, delete the git-idm executable: /usr/local/bin/git-idm',
      ]);
    });

    it('reports a removal failure even when clearing the active pointer fails', async () => {
      const { ctx, store } = makeContext();
      await ctx.repository.upsert('work', WORK);
      await ctx.repository.upsert('home', { name: 'Jane', email: 'jane@home.example', sshCommand: 'ssh' });
      await store.set('user.activeidm', 'work');
      const removeSection = store.removeSection.bind(store);
      vi.spyOn(store, 'removeSection').mockImplementation(async (name: string) => {
        if (name === 'gitidm.home') throw new IOError('could not lock config file');
        return removeSection(name);
      });
      vi.spyOn(store, 'unset').mockRejectedValue(new IOError('git config failed to unset user.activeidm: locked'));

      await expect(uninstallCommand({ executable: '/usr/local/bin/git-idm' }, ctx)).rejects.toThrow(
        new IOError('git config failed to unset user.activeidm: locked'),
      );
      expect(logged()).toEqual(['✓ Removed identity work']);
      expect(errored()).toEqual([
        'ERROR: could not remove identity home: could not lock config file',
        'ERROR: 1 of 2 identities could not be removed',
      ]);
    });

    it('does not mind when nothing is active', async () => {
      const { ctx } = makeContext();

      await uninstallCommand({ executable: '/usr/local/bin/git-idm' }, ctx);

      expect(logged()).toEqual(['ℹ To finish uninstalling, delete the git-idm executable: /usr/local/bin/git-idm']);
    });
  });

  it('prints the package version', () => {
    versionCommand();
    expect(logged()).toEqual(['git-idm 0.1.0']);
  });

  describe('runCommand', () => {
    afterEach(() => {
      process.exitCode = undefined;
    });

    it('prints ERROR: and sets exit code 1 on failure', async () => {
      await runCommand(async () => {
        throw new NotFoundError('identity', 'nope');
      });

      expect(process.exitCode).toBe(1);
      expect(errored()).toEqual(['ERROR: identity "nope" does not exist']);
    });

    it('leaves the exit code alone on success', async () => {
      await runCommand(async () => {});
      expect(process.exitCode).toBeUndefined();
    });
  });
});
