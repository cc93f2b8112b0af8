/**
 * Secret Import Pipeline
 *
 * decrypt → parse → flatten → write each key to Vault → rewrite counterpart
 *
 * Keys are written one by one in sorted order. The first failed write stops
 * the run; secrets already written stay in Vault. A counterpart failure after
 * successful writes is reported back as a warning instead of being thrown.
 */

import { access } from 'node:fs/promises';
import { resolveConfig, resolveVaultSettings, ENV_VARS, type VaultFlags } from '../config.js';
import { createVaultClient, type SecretStore, type VaultConfig } from '../vault/client.js';
import { decryptSopsFile, parseSecretDocument, type SopsOptions } from './sops.js';
import { flatten, sortedKeys, type FlatValueMap } from './flatten.js';
import { cleanFilename, counterpartFilename, updateCounterpartFile } from './counterpart.js';
import { renderCounterpartDryRun, renderDryRun } from './preview.js';
import { StoreWriteError, errorMessage } from './errors.js';
import type { PatchResult } from './patcher.js';

/**
 * Options for a single import run
 */
export interface ImportOptions {
    /** SOPS-encrypted YAML file */
    sopsFile: string;
    /** Destination path under the mount */
    vaultPath: string;
    /** Describe the run without writing anything */
    dryRun?: boolean;
    /** Append the cleaned filename (or `name`) to the vault path */
    appendName?: boolean;
    /** Overrides the derived name used by appendName */
    name?: string;
    /** Rewrite the counterpart file with vault references */
    updateCounterpart?: boolean;
    /** Vault connection flags */
    vault?: VaultFlags;
    /** sops executable and config overrides */
    sops?: { bin?: string; configPath?: string };
}

/**
 * Collaborators, replaceable for tests and library use
 */
export interface ImportDependencies {
    env?: NodeJS.ProcessEnv;
    decrypt?: (filePath: string, options: SopsOptions) => Promise<string>;
    createStore?: (config: VaultConfig) => SecretStore;
}

export type CounterpartStatus =
    | { status: 'updated'; path: string; result: PatchResult }
    | { status: 'missing'; path: string }
    | { status: 'failed'; path: string; error: Error };

export interface ImportResult {
    dryRun: boolean;
    /** Vault path after appending the name */
    vaultPath: string;
    /** `{mount}/{vaultPath}`, the root of every reference */
    storageRoot: string;
    /** Flattened keys in write order */
    keys: string[];
    /** Number of secrets written (0 in dry-run) */
    written: number;
    /** Dry-run description lines */
    preview: string[];
    counterpart?: CounterpartStatus;
}

/**
 * Computes the destination path, appending the file's clean name if asked
 */
export function resolveVaultPath(options: Pick<ImportOptions, 'sopsFile' | 'vaultPath' | 'appendName' | 'name'>): string {
    if (!options.appendName) {
        return options.vaultPath;
    }
    const name = options.name || cleanFilename(options.sopsFile);
    return `${options.vaultPath}/${name}`;
}

/**
 * Decrypts and flattens a SOPS file
 */
export async function loadSecrets(
    sopsFile: string,
    decrypt: (filePath: string, options: SopsOptions) => Promise<string>,
    sopsOptions: SopsOptions = {}
): Promise<FlatValueMap> {
    const cleartext = await decrypt(sopsFile, sopsOptions);
    return flatten(parseSecretDocument(cleartext));
}

/**
 * Writes every key under `{vaultPath}/{key}`, stopping at the first failure
 *
 * @returns Number of secrets written
 * @throws StoreWriteError
 */
export async function writeSecrets(
    store: SecretStore,
    vaultPath: string,
    data: FlatValueMap,
    keys: readonly string[] = sortedKeys(data)
): Promise<number> {
    let written = 0;
    for (const key of keys) {
        const secretPath = `${vaultPath}/${key}`;
        try {
            await store.writeSecret(secretPath, data[key]);
        } catch (err) {
            if (err instanceof StoreWriteError) throw err;
            throw new StoreWriteError(secretPath, errorMessage(err));
        }
        written++;
    }
    return written;
}

/**
 * Runs a full import
 *
 * @throws ConfigurationError, DecryptionError, MalformedDocumentError, StoreWriteError
 */
export async function runImport(
    options: ImportOptions,
    deps: ImportDependencies = {}
): Promise<ImportResult> {
    const env = deps.env ?? process.env;
    const dryRun = options.dryRun ?? false;
    const vaultPath = resolveVaultPath(options);

    const vaultConfig = resolveVaultSettings(options.vault ?? {}, env, dryRun);
    const storageRoot = `${vaultConfig.mountPath}/${vaultPath}`;

    const sopsOptions: SopsOptions = {
        bin: resolveConfig(options.sops?.bin, ENV_VARS.sopsBin, env) || undefined,
        configPath: options.sops?.configPath,
        env,
    };
    const data = await loadSecrets(options.sopsFile, deps.decrypt ?? decryptSopsFile, sopsOptions);
    const keys = sortedKeys(data);
    const counterpartPath = counterpartFilename(options.sopsFile);

    if (dryRun) {
        const preview = renderDryRun(vaultConfig.mountPath, vaultPath, data);
        if (options.updateCounterpart) {
            const exists = await fileExists(counterpartPath);
            preview.push(...renderCounterpartDryRun(counterpartPath, exists, storageRoot, keys));
        }
        return { dryRun, vaultPath, storageRoot, keys, written: 0, preview };
    }

    const store = (deps.createStore ?? createVaultClient)(vaultConfig);
    const written = await writeSecrets(store, vaultPath, data, keys);

    const result: ImportResult = { dryRun, vaultPath, storageRoot, keys, written, preview: [] };
    if (options.updateCounterpart) {
        result.counterpart = await applyCounterpart(counterpartPath, storageRoot, keys);
    }
    return result;
}

async function applyCounterpart(
    path: string,
    storageRoot: string,
    keys: readonly string[]
): Promise<CounterpartStatus> {
    try {
        const update = await updateCounterpartFile(path, storageRoot, keys);
        return update.updated
            ? { status: 'updated', path, result: update.result }
            : { status: 'missing', path };
    } catch (err) {
        return { status: 'failed', path, error: err instanceof Error ? err : new Error(String(err)) };
    }
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}
