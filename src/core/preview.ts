/**
 * Dry-run preview lines. Values are described by kind and length only.
 */

import { buildReference } from './reference.js';
import { sortedKeys, type FlatValueMap } from './flatten.js';

/**
 * Describes a secret value without revealing it
 *
 * "s3cret" → "<string, 6 chars>", 42 → "<number>"
 */
export function describeValue(value: unknown): string {
    if (typeof value === 'string') {
        return `<string, ${Array.from(value).length} chars>`;
    }
    if (value === null) return '<null>';
    if (Array.isArray(value)) return '<array>';
    return `<${typeof value}>`;
}

/**
 * Lines describing the Vault writes a real run would perform
 */
export function renderDryRun(mount: string, vaultPath: string, data: FlatValueMap): string[] {
    const keys = sortedKeys(data);
    return [
        `[dry-run] Would write to Vault path: ${mount}/${vaultPath}`,
        `[dry-run] ${keys.length} secrets:`,
        ...keys.map((key) => `  ${key} = ${describeValue(data[key])}`),
    ];
}

/**
 * Lines describing the counterpart update a real run would perform
 */
export function renderCounterpartDryRun(
    counterpartPath: string,
    exists: boolean,
    storageRoot: string,
    keys: readonly string[]
): string[] {
    if (!exists) {
        return [`[dry-run] Counterpart file ${counterpartPath} does not exist, skipping`];
    }
    return [
        `[dry-run] Would update ${counterpartPath} with vault references:`,
        ...keys.map((key) => `  ${key}: ${buildReference(storageRoot, key)}`),
    ];
}
