/**
 * Counterpart File
 *
 * The counterpart is the plain YAML file that sits next to a SOPS file and
 * mirrors its shape with placeholder values:
 *
 *   app-secrets.enc.yaml  (encrypted, real values)
 *   app.yaml              (plain, placeholders → vault references)
 *
 * After an import the placeholders are rewritten in place, keeping the
 * file's key order and indentation.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { isAlias, isMap, isSeq, parseDocument, visit, type Document, type Node, type ScalarTag } from 'yaml';
import { detectIndent } from './indent.js';
import { keyText, patchDocument, type PatchResult } from './patcher.js';
import { CounterpartError, DocumentShapeError, errorMessage, isNotFound } from './errors.js';

/** Marker that ends the base name of a secrets file */
const SECRETS_MARKER = '-secrets';

/** Extension of the derived counterpart file */
const COUNTERPART_EXTENSION = '.yaml';

/**
 * Original text of a scalar, written back verbatim
 */
class SourceText {
    constructor(readonly text: string) {}
}

const sourceTextTag: ScalarTag = {
    tag: 'tag:sops-vault-import:source-text',
    default: true,
    identify: (value) => value instanceof SourceText,
    resolve: (value) => value,
    stringify: (item) => (item.value instanceof SourceText ? item.value.text : String(item.value)),
};

export type CounterpartUpdate =
    | { updated: false }
    | { updated: true; indent: number; result: PatchResult };

/**
 * Extracts a clean name from a SOPS filename
 *
 * Examples:
 * - app-secrets.enc.yaml → app
 * - myapp.sops.yaml → myapp
 * - /path/to/config-secrets.yaml → config
 * - plainfile → plainfile
 */
export function cleanFilename(path: string): string {
    const name = basename(path);

    const markerIndex = name.indexOf(SECRETS_MARKER);
    if (markerIndex !== -1) {
        return name.slice(0, markerIndex);
    }

    const dotIndex = name.indexOf('.');
    if (dotIndex !== -1) {
        return name.slice(0, dotIndex);
    }

    return name;
}

/**
 * Derives the counterpart path from a SOPS file path
 *
 * app-secrets.enc.yaml → app.yaml, in the same directory
 */
export function counterpartFilename(sopsPath: string): string {
    return join(dirname(sopsPath), cleanFilename(sopsPath) + COUNTERPART_EXTENSION);
}

/**
 * Rewrites the counterpart file so each key holds its vault reference
 *
 * A missing file is not an error: nothing is written and `updated` is false.
 *
 * @param path - Counterpart file path
 * @param storageRoot - Mount and base path, e.g. "secret/myapp"
 * @param keys - Dotted keys, already sorted
 * @throws CounterpartError when the file cannot be read, parsed or written
 * @throws DocumentShapeError when the root is not a mapping
 */
export async function updateCounterpartFile(
    path: string,
    storageRoot: string,
    keys: readonly string[]
): Promise<CounterpartUpdate> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch (err) {
        if (isNotFound(err)) {
            return { updated: false };
        }
        throw new CounterpartError(path, `reading file: ${errorMessage(err)}`);
    }

    const indent = detectIndent(content);

    const doc = parseDocument(content, {
        customTags: [sourceTextTag],
        uniqueKeys: (a, b) => keyText(a) === keyText(b),
    });
    if (doc.errors.length > 0) {
        throw new CounterpartError(path, `parsing YAML: ${doc.errors[0].message}`);
    }
    if (!isMap(doc.contents)) {
        throw new DocumentShapeError(path, describeNode(doc.contents));
    }

    const result = patchDocument(doc.contents, storageRoot, keys);
    keepNumberText(doc);

    let output: string;
    try {
        output = doc.toString({ indent, lineWidth: 0, flowCollectionPadding: false });
    } catch (err) {
        throw new CounterpartError(path, `serializing YAML: ${errorMessage(err)}`);
    }

    try {
        await writeFile(path, output, 'utf8');
    } catch (err) {
        throw new CounterpartError(path, `writing file: ${errorMessage(err)}`);
    }

    return { updated: true, indent, result };
}

/**
 * Numbers print from their parsed value (`010` → `10`);
 * pin each one to the text it was read from
 */
function keepNumberText(doc: Document.Parsed): void {
    visit(doc, {
        Scalar(_key, node) {
            if (typeof node.value === 'number' && node.source !== undefined) {
                node.value = new SourceText(node.source);
            }
        },
    });
}

function describeNode(node: Node | null): string {
    if (node === null) return 'empty document';
    if (isSeq(node)) return 'sequence';
    if (isAlias(node)) return 'alias';
    return 'scalar';
}
