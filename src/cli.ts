#!/usr/bin/env node

/**
 * git-idm CLI
 *
 * Keep several git identities and switch the global one.
 *
 * Usage:
 *   git-idm add <id> [--name N] [--email E] [--key PATH | --ssh-command CMD]
 *   git-idm use <id>                  Apply an identity globally
 *   git-idm active                    Show the active identity, check for drift
 *   git-idm list                      List identities
 *   git-idm remove <id|all>           Remove identities
 *   git-idm uninstall                 Remove everything git-idm stored
 */

import { createProgram } from './cli/program.js';

await createProgram().parseAsync();
