/**
 * sops-vault-import
 *
 * Library entry point for importing SOPS secrets into Vault KV v2 and
 * rewriting counterpart YAML files with vault references.
 *
 * @example
 * ```typescript
 * import { runImport } from 'sops-vault-import';
 *
 * const result = await runImport({
 *     sopsFile: 'app-secrets.enc.yaml',
 *     vaultPath: 'proj',
 *     updateCounterpart: true,
 * });
 * ```
 *
 * @packageDocumentation
 */

export { flatten, sortedKeys, isMapping } from './core/flatten.js';
export type { FlatValueMap } from './core/flatten.js';
export { detectIndent, DEFAULT_INDENT } from './core/indent.js';
export { buildReference } from './core/reference.js';
export { patchDocument, keyText } from './core/patcher.js';
export type { PatchOutcome, PatchedKey, PatchResult } from './core/patcher.js';
export { cleanFilename, counterpartFilename, updateCounterpartFile } from './core/counterpart.js';
export type { CounterpartUpdate } from './core/counterpart.js';
export { decryptSopsFile, parseSecretDocument } from './core/sops.js';
export type { SopsOptions } from './core/sops.js';
export { describeValue, renderDryRun, renderCounterpartDryRun } from './core/preview.js';
export { runImport, loadSecrets, writeSecrets, resolveVaultPath } from './core/importer.js';
export type { ImportOptions, ImportDependencies, ImportResult, CounterpartStatus } from './core/importer.js';
export { createVaultClient, encodePath, stringifySecretValue } from './vault/client.js';
export type { VaultConfig, SecretStore } from './vault/client.js';
export { resolveConfig, resolveVaultSettings, DEFAULT_MOUNT } from './config.js';
export * from './core/errors.js';
