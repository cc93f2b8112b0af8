/**
 * Secret Flattener
 *
 * Turns a nested secret document into a single-level map keyed by dotted path:
 *   { admin: { oauth2: { clientID: 'x' } } } → { 'admin.oauth2.clientID': 'x' }
 *
 * Only mappings are recursed into. Sequences and scalars are leaves.
 */

/**
 * Dotted key → leaf value
 */
export type FlatValueMap = Record<string, unknown>;

/**
 * Checks for a plain YAML mapping (not an array, not null)
 */
export function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flattens a nested mapping into dotted-path keys
 *
 * @param tree - Parsed secret document
 * @returns Map of dotted key to leaf value
 */
export function flatten(tree: Record<string, unknown>): FlatValueMap {
    const result: FlatValueMap = {};
    flattenInto(tree, '', result);
    return result;
}

function flattenInto(node: Record<string, unknown>, prefix: string, result: FlatValueMap): void {
    for (const [key, value] of Object.entries(node)) {
        const fullKey = prefix ? `${prefix}.${key}` : key;

        if (isMapping(value)) {
            flattenInto(value, fullKey, result);
        } else {
            setEntry(result, fullKey, value);
        }
    }
}

/**
 * Sets an own enumerable property, so a key such as `__proto__` is stored
 * like any other key instead of replacing the prototype
 */
export function setEntry(target: Record<string, unknown>, key: string, value: unknown): void {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Returns the keys of a flat map in sorted order
 */
export function sortedKeys(map: FlatValueMap): string[] {
    return Object.keys(map).sort();
}
