/**
 * Counterpart Document Patcher
 *
 * Replaces placeholder values in a parsed YAML mapping with vault references,
 * one dotted key at a time. A logical key such as `api.config.db.url` can live
 * in the document as nested mappings, as a single flat key containing dots, or
 * as any mix of the two, so every mapping level is resolved with three rules
 * in this order:
 *
 * 1. An entry whose key equals the remaining path joined by "." is replaced.
 * 2. An entry whose key equals the first remaining segment is descended into
 *    (or replaced, on the last segment). A non-mapping value there stops the
 *    update for that key and it is reported as skipped.
 * 3. Otherwise a new entry is appended: flat when any sibling key already
 *    contains a ".", nested mappings when none does.
 *
 * Updates are applied in order and later keys see earlier ones, so two new
 * keys under the same new parent share one mapping.
 */

import { isMap, isScalar, Pair, Scalar, YAMLMap } from 'yaml';
import { buildReference } from './reference.js';

export type PatchOutcome = 'updated' | 'added' | 'skipped';

export interface PatchedKey {
    key: string;
    outcome: PatchOutcome;
}

export interface PatchResult {
    keys: PatchedKey[];
}

type Mapping = YAMLMap<unknown, unknown>;
type Entry = Pair<unknown, unknown>;

/**
 * Points every dotted key at its vault location, mutating `root` in place
 *
 * @param root - Root mapping of the counterpart document
 * @param storageRoot - Mount and base path the secrets were written under
 * @param dottedKeys - Keys to update, applied in the given order
 */
export function patchDocument(
    root: Mapping,
    storageRoot: string,
    dottedKeys: readonly string[]
): PatchResult {
    const keys = dottedKeys.map((key) => ({
        key,
        outcome: upsertKey(root, key.split('.'), buildReference(storageRoot, key)),
    }));
    return { keys };
}

function upsertKey(map: Mapping, segments: string[], reference: string): PatchOutcome {
    const flatKey = segments.join('.');

    const exact = findEntry(map, flatKey);
    if (exact) {
        setReference(exact, reference);
        return 'updated';
    }

    const [head, ...rest] = segments;
    const entry = findEntry(map, head);
    if (entry) {
        if (rest.length === 0) {
            setReference(entry, reference);
            return 'updated';
        }
        if (isMap(entry.value)) {
            return upsertKey(entry.value, rest, reference);
        }
        return 'skipped';
    }

    if (hasFlatKeys(map)) {
        map.items.push(new Pair(new Scalar(flatKey), new Scalar(reference)));
    } else {
        map.items.push(nestedEntry(segments, reference));
    }
    return 'added';
}

/**
 * Source text of a mapping key; `1.0` stays "1.0" rather than "1"
 */
export function keyText(key: unknown): string {
    if (isScalar(key)) {
        return key.source ?? String(key.value);
    }
    return String(key);
}

function findEntry(map: Mapping, text: string): Entry | undefined {
    return map.items.find((item) => keyText(item.key) === text);
}

function hasFlatKeys(map: Mapping): boolean {
    return map.items.some((item) => keyText(item.key).includes('.'));
}

/**
 * Replaces an entry's value, keeping the quote style of a quoted scalar
 */
function setReference(entry: Entry, reference: string): void {
    const scalar = new Scalar(reference);
    const previous = entry.value;
    if (
        isScalar(previous) &&
        (previous.type === Scalar.QUOTE_DOUBLE || previous.type === Scalar.QUOTE_SINGLE)
    ) {
        scalar.type = previous.type;
    }
    entry.value = scalar;
}

function nestedEntry(segments: string[], reference: string): Entry {
    const [head, ...rest] = segments;
    if (rest.length === 0) {
        return new Pair(new Scalar(head), new Scalar(reference));
    }
    const child: Mapping = new YAMLMap();
    child.items.push(nestedEntry(rest, reference));
    return new Pair(new Scalar(head), child);
}
