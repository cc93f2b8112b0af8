/**
 * Vault KV v2 Client
 *
 * Writes secrets through Vault's HTTP API. Each flattened key becomes its
 * own secret with the value stored under the "value" field:
 *
 *   POST {addr}/v1/{mount}/data/{path}
 *   { "data": { "value": "..." } }
 *
 * Writes are independent; there is no multi-key transaction.
 */

import { StoreWriteError, errorMessage } from '../core/errors.js';
import { isMapping } from '../core/flatten.js';

/** Field every secret value is stored under */
export const VALUE_FIELD = 'value';

/**
 * Vault connection settings
 */
export interface VaultConfig {
    /** Server address, e.g. https://vault.example.com:8200 */
    address: string;
    /** Token sent as X-Vault-Token */
    token: string;
    /** KV v2 mount path */
    mountPath: string;
    /** Enterprise namespace sent as X-Vault-Namespace */
    namespace?: string;
}

/**
 * Anything that can store a secret value at a path under the mount
 */
export interface SecretStore {
    writeSecret(path: string, value: unknown): Promise<void>;
}

/**
 * Converts a secret value to the string stored in Vault
 *
 * Strings are kept verbatim, null becomes an empty string, and sequences
 * or mappings are stored as JSON.
 */
export function stringifySecretValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/**
 * Creates a KV v2 client
 */
export function createVaultClient(config: VaultConfig): SecretStore {
    const baseUrl = config.address.replace(/\/+$/, '');

    function headers(): Record<string, string> {
        const result: Record<string, string> = {
            'Content-Type': 'application/json',
            'X-Vault-Token': config.token,
        };
        if (config.namespace) {
            result['X-Vault-Namespace'] = config.namespace;
        }
        return result;
    }

    return {
        /**
         * Writes one secret; fails with StoreWriteError on any non-2xx reply
         */
        async writeSecret(path: string, value: unknown): Promise<void> {
            const url = `${baseUrl}/v1/${encodePath(config.mountPath)}/data/${encodePath(path)}`;
            const body = { data: { [VALUE_FIELD]: stringifySecretValue(value) } };

            let response: Response;
            try {
                response = await fetch(url, {
                    method: 'POST',
                    headers: headers(),
                    body: JSON.stringify(body),
                });
            } catch (err) {
                throw new StoreWriteError(path, errorMessage(err));
            }

            if (!response.ok) {
                throw new StoreWriteError(path, await describeFailure(response));
            }
        },
    };
}

/**
 * Escapes each segment of a Vault path; "/" still separates segments
 */
export function encodePath(path: string): string {
    return path.split('/').map(encodeURIComponent).join('/');
}

async function describeFailure(response: Response): Promise<string> {
    const fallback = `Vault responded with status ${response.status}`;
    let payload: unknown;
    try {
        payload = await response.json();
    } catch {
        return fallback;
    }
    if (isMapping(payload) && Array.isArray(payload.errors) && payload.errors.length > 0) {
        return payload.errors.map(String).join('; ');
    }
    return fallback;
}
