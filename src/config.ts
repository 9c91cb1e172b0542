/**
 * git-idm Configuration
 *
 * Optional tool settings at ~/.git-idm/config.json. Identities are not
 * stored here; they live in the global git configuration.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { MIN_GIT_VERSION } from './storage/version.js';

/** Global git-idm home directory */
export const GLOBAL_IDM_DIR = join(homedir(), '.git-idm');

/** Config filename */
export const CONFIG_FILE = 'config.json';

export const IdmConfigSchema = z.object({
  git: z
    .object({
      /** git executable */
      binary: z.string().min(1).default('git'),
      /** Versions below this get a warning */
      minVersion: z.string().min(1).default(MIN_GIT_VERSION),
    })
    .default({}),
  agent: z
    .object({
      /** Check that an identity's key is loaded in ssh-agent */
      enabled: z.boolean().default(true),
      /** ssh-add executable */
      binary: z.string().min(1).default('ssh-add'),
    })
    .default({}),
});

export type IdmConfig = z.infer<typeof IdmConfigSchema>;

/**
 * Default configuration (no config file present).
 */
export function defaultConfig(): IdmConfig {
  return IdmConfigSchema.parse({});
}

/**
 * Resolve the path to the global config file.
 */
export function globalConfigPath(): string {
  return join(GLOBAL_IDM_DIR, CONFIG_FILE);
}

/**
 * Load the config file, falling back to defaults when it doesn't exist.
 */
export async function loadConfig(configPath: string = globalConfigPath()): Promise<IdmConfig> {
  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  const raw = await readFile(configPath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(
      `Invalid config ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = IdmConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid config ${configPath}: ${issues}`);
  }
  return result.data;
}
