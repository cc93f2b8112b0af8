#!/usr/bin/env node
/**
 * sops-vault-import CLI
 *
 * Imports a SOPS-encrypted YAML file into Vault KV v2, one secret per
 * flattened key, and optionally points the counterpart YAML file at them.
 */

import { Command } from 'commander';
import { registerImportCommand } from './commands/import.js';
import { error } from './utils/ui.js';
import { errorMessage } from './core/errors.js';

const program = new Command();

program
    .name('sops-vault-import')
    .description('Import SOPS-encrypted YAML secrets into Vault KV v2')
    .version('1.0.0');

registerImportCommand(program);

program.parseAsync().catch((err: unknown) => {
    error(errorMessage(err));
});
