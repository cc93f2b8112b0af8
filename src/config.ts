/**
 * Import Configuration
 *
 * Resolves Vault and sops settings with the precedence flag > environment.
 * The environment is passed in explicitly so nothing below the CLI reads
 * process.env on its own.
 */

import { ConfigurationError } from './core/errors.js';
import type { VaultConfig } from './vault/client.js';

/** Default KV v2 mount */
export const DEFAULT_MOUNT = 'secret';

/** Environment variables consulted when a flag is absent */
export const ENV_VARS = {
    address: 'VAULT_ADDR',
    token: 'VAULT_TOKEN',
    namespace: 'VAULT_NAMESPACE',
    sopsBin: 'SOPS_BIN',
} as const;

/**
 * Connection flags as given on the command line
 */
export interface VaultFlags {
    vaultAddr?: string;
    vaultToken?: string;
    namespace?: string;
    mount?: string;
}

/**
 * Returns the flag value when set, otherwise the environment variable
 */
export function resolveConfig(
    flagValue: string | undefined,
    envVar: string,
    env: NodeJS.ProcessEnv
): string {
    if (flagValue) {
        return flagValue;
    }
    return env[envVar] ?? '';
}

/**
 * Resolves the Vault connection settings
 *
 * Address and token are only required when something will be written;
 * a dry run resolves whatever is available and never fails.
 *
 * @throws ConfigurationError when address or token is missing outside dry-run
 */
export function resolveVaultSettings(
    flags: VaultFlags,
    env: NodeJS.ProcessEnv,
    dryRun = false
): VaultConfig {
    const address = resolveConfig(flags.vaultAddr, ENV_VARS.address, env);
    const token = resolveConfig(flags.vaultToken, ENV_VARS.token, env);
    const namespace = resolveConfig(flags.namespace, ENV_VARS.namespace, env);

    if (!dryRun) {
        if (!address) {
            throw new ConfigurationError(`Vault address required (--vault-addr or ${ENV_VARS.address})`);
        }
        if (!token) {
            throw new ConfigurationError(`Vault token required (--vault-token or ${ENV_VARS.token})`);
        }
    }

    return {
        address,
        token,
        mountPath: flags.mount || DEFAULT_MOUNT,
        namespace: namespace || undefined,
    };
}
