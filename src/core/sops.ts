/**
 * SOPS Decryption
 *
 * Decrypts a SOPS-encrypted YAML file by running the sops binary and
 * capturing its cleartext output. Key material (age, PGP, KMS) is resolved
 * by sops itself from the inherited environment.
 */

import { spawn } from 'node:child_process';
import { isAlias, isMap, isNode, isScalar, isSeq, parseDocument, type Document, type YAMLMap } from 'yaml';
import { setEntry } from './flatten.js';
import { keyText } from './patcher.js';
import { DecryptionError, MalformedDocumentError, errorMessage } from './errors.js';

/** Default sops executable */
export const DEFAULT_SOPS_BIN = 'sops';

/**
 * Options for decryptSopsFile
 */
export interface SopsOptions {
    /** sops executable (defaults to "sops" on PATH) */
    bin?: string;
    /** Path to a .sops.yaml config */
    configPath?: string;
    /** Environment for the sops process */
    env?: NodeJS.ProcessEnv;
}

/**
 * Builds the sops command-line arguments for a YAML decrypt
 */
export function sopsDecryptArgs(filePath: string, configPath?: string): string[] {
    return [
        ...(configPath ? ['--config', configPath] : []),
        'decrypt',
        '--input-type',
        'yaml',
        '--output-type',
        'yaml',
        filePath,
    ];
}

/**
 * Decrypts a SOPS YAML file and returns its cleartext
 *
 * @throws DecryptionError when sops cannot be started or exits non-zero
 */
export function decryptSopsFile(filePath: string, options: SopsOptions = {}): Promise<string> {
    const bin = options.bin ?? DEFAULT_SOPS_BIN;
    const args = sopsDecryptArgs(filePath, options.configPath);

    return new Promise((resolve, reject) => {
        let settled = false;
        const finish = (err: Error | null, output = '') => {
            if (settled) return;
            settled = true;
            if (err) reject(err);
            else resolve(output);
        };

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];

        const child = spawn(bin, args, {
            env: options.env ?? process.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (err) => {
            finish(new DecryptionError(filePath, `failed to start "${bin}": ${errorMessage(err)}`));
        });

        child.on('close', (code: number | null) => {
            if (code === 0) {
                finish(null, Buffer.concat(stdout).toString('utf8'));
                return;
            }
            const detail = lastLine(Buffer.concat(stderr).toString('utf8'));
            finish(new DecryptionError(filePath, detail || `${bin} exited with code ${code ?? 'null'}`));
        });
    });
}

/**
 * Parses decrypted YAML, requiring a mapping at the root
 *
 * Keys keep their source text (`1.0` stays "1.0", `010` stays "010") so they
 * line up with the keys of the counterpart document. An empty document
 * yields an empty mapping.
 *
 * @throws MalformedDocumentError
 */
export function parseSecretDocument(content: string): Record<string, unknown> {
    const doc = parseDocument(content, { uniqueKeys: (a, b) => keyText(a) === keyText(b) });
    if (doc.errors.length > 0) {
        throw new MalformedDocumentError(`Error parsing YAML: ${doc.errors[0].message}`);
    }

    const root = resolveNode(doc.contents, doc);
    if (isMap(root)) {
        return toSecretTree(root, doc);
    }
    if (root === null || root === undefined || (isScalar(root) && root.value === null)) {
        return {};
    }
    throw new MalformedDocumentError(`Expected a YAML mapping at the root, got ${describeRoot(root)}`);
}

function describeRoot(node: unknown): string {
    if (isSeq(node)) return 'sequence';
    if (isScalar(node)) return typeof node.value;
    return 'unknown';
}

function toSecretTree(map: YAMLMap<unknown, unknown>, doc: Document.Parsed): Record<string, unknown> {
    const tree: Record<string, unknown> = {};
    for (const pair of map.items) {
        setEntry(tree, keyText(pair.key), toSecretValue(pair.value, doc));
    }
    return tree;
}

function toSecretValue(value: unknown, doc: Document.Parsed): unknown {
    const node = resolveNode(value, doc);
    if (isMap(node)) return toSecretTree(node, doc);
    if (isNode(node)) return node.toJS(doc);
    return node ?? null;
}

function resolveNode(value: unknown, doc: Document.Parsed): unknown {
    return isAlias(value) ? value.resolve(doc) : value;
}

function lastLine(text: string): string {
    const lines = text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
    return lines[lines.length - 1] ?? '';
}
