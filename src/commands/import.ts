import { resolve } from 'node:path';
import { Command } from 'commander';
import { colors, success, error, info, warn } from '../utils/ui.js';
import { runImport, type ImportDependencies, type ImportResult } from '../core/importer.js';
import { DEFAULT_MOUNT } from '../config.js';
import { errorMessage } from '../core/errors.js';

interface ImportCommandOptions {
    vaultAddr?: string;
    vaultToken?: string;
    namespace?: string;
    mount: string;
    dryRun?: boolean;
    appendName?: boolean;
    name?: string;
    updateCounterpart?: boolean;
    sopsBin?: string;
    sopsConfig?: string;
}

export function registerImportCommand(program: Command, deps: ImportDependencies = {}) {
    /**
     * Import Command
     * Writes every key of a SOPS file to Vault KV v2
     */
    program
        .command('import', { isDefault: true })
        .description('Import secrets from a SOPS-encrypted YAML file to Vault KV v2')
        .argument('<sops-file>', 'Path to SOPS-encrypted YAML file')
        .argument('<vault-path>', 'Destination path in Vault (under the mount)')
        .option('--vault-addr <url>', 'Vault server address (env: VAULT_ADDR)')
        .option('--vault-token <token>', 'Vault token (env: VAULT_TOKEN)')
        .option('--namespace <ns>', 'Vault namespace (env: VAULT_NAMESPACE)')
        .option('--mount <path>', 'Vault KV v2 mount path', DEFAULT_MOUNT)
        .option('--dry-run', 'Print secrets without writing to Vault')
        .option('--append-name', 'Append cleaned filename to vault path')
        .option('--name <name>', 'Override the derived name (use with --append-name)')
        .option('--update-counterpart', 'Update counterpart YAML file with vault references')
        .option('--sops-bin <path>', 'sops executable (env: SOPS_BIN)')
        .option('--sops-config <path>', 'Path to .sops.yaml config')
        .action(async (sopsFile: string, vaultPath: string, options: ImportCommandOptions) => {
            try {
                const result = await runImport({
                    sopsFile,
                    vaultPath,
                    dryRun: options.dryRun,
                    appendName: options.appendName,
                    name: options.name,
                    updateCounterpart: options.updateCounterpart,
                    vault: {
                        vaultAddr: options.vaultAddr,
                        vaultToken: options.vaultToken,
                        namespace: options.namespace,
                        mount: options.mount,
                    },
                    sops: { bin: options.sopsBin, configPath: options.sopsConfig },
                }, deps);

                report(result);
            } catch (err) {
                error(errorMessage(err));
            }
        });
}

function report(result: ImportResult): void {
    if (result.dryRun) {
        for (const line of result.preview) {
            console.log(line);
        }
        return;
    }

    success(`Successfully wrote ${result.written} secrets to ${result.storageRoot}/*`);

    const counterpart = result.counterpart;
    if (!counterpart) {
        return;
    }

    const displayPath = resolve(counterpart.path);
    switch (counterpart.status) {
        case 'updated': {
            success(`Updated ${displayPath} with ${result.keys.length} vault references`);
            const skipped = counterpart.result.keys.filter((entry) => entry.outcome === 'skipped');
            for (const entry of skipped) {
                warn(`${colors.bold(entry.key)} not updated: an existing non-mapping value is in the way`);
            }
            break;
        }
        case 'missing':
            info(`Counterpart file ${displayPath} does not exist, skipping`);
            break;
        case 'failed':
            warn(`failed to update counterpart file: ${counterpart.error.message}`);
            break;
    }
}
