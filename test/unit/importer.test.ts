/**
 * Tests for the import pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runImport, resolveVaultPath, writeSecrets } from '../../src/core/importer.js';
import type { SecretStore, VaultConfig } from '../../src/vault/client.js';
import type { SopsOptions } from '../../src/core/sops.js';
import {
    ConfigurationError,
    DocumentShapeError,
    MalformedDocumentError,
    StoreWriteError,
} from '../../src/core/errors.js';

const CLEARTEXT = 'db:\n  password: hunter2\n  port: 5432\napi_key: abc\n';

const ENV = { VAULT_ADDR: 'http://vault.test:8200', VAULT_TOKEN: 'test-token' };

/**
 * In-memory stand-in for Vault
 */
class MemoryStore implements SecretStore {
    writes: Array<[string, unknown]> = [];

    constructor(private failOn?: string) {}

    async writeSecret(path: string, value: unknown): Promise<void> {
        if (path === this.failOn) {
            throw new Error('permission denied');
        }
        this.writes.push([path, value]);
    }
}

describe('Importer', () => {
    let workDir: string;
    let sopsFile: string;
    let store: MemoryStore;
    let createStore: Mock<(config: VaultConfig) => SecretStore>;
    let decrypt: Mock<(filePath: string, options: SopsOptions) => Promise<string>>;

    beforeEach(async () => {
        workDir = join(tmpdir(), 'sops-vault-import-' + Math.random().toString(36).slice(2));
        await mkdir(workDir, { recursive: true });
        sopsFile = join(workDir, 'app-secrets.enc.yaml');
        store = new MemoryStore();
        createStore = vi.fn((_config: VaultConfig): SecretStore => store);
        decrypt = vi.fn(async (_filePath: string, _options: SopsOptions) => CLEARTEXT);
    });

    afterEach(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    describe('resolveVaultPath', () => {
        it('should keep the path without appendName', () => {
            expect(resolveVaultPath({ sopsFile: 'app-secrets.enc.yaml', vaultPath: 'proj' })).toBe('proj');
        });

        it('should append the cleaned filename', () => {
            expect(resolveVaultPath({ sopsFile: 'app-secrets.enc.yaml', vaultPath: 'proj', appendName: true })).toBe(
                'proj/app'
            );
        });

        it('should prefer an explicit name', () => {
            expect(
                resolveVaultPath({ sopsFile: 'app-secrets.enc.yaml', vaultPath: 'proj', appendName: true, name: 'billing' })
            ).toBe('proj/billing');
        });
    });

    describe('writeSecrets', () => {
        it('should stop at the first failed write', async () => {
            const failing = new MemoryStore('proj/b');

            const promise = writeSecrets(failing, 'proj', { a: 1, b: 2, c: 3 });

            await expect(promise).rejects.toBeInstanceOf(StoreWriteError);
            await expect(promise).rejects.toThrow('Failed to write to Vault path proj/b: permission denied');
            expect(failing.writes).toEqual([['proj/a', 1]]);
        });
    });

    describe('runImport', () => {
        it('should write every flattened key in sorted order', async () => {
            const result = await runImport({ sopsFile, vaultPath: 'proj' }, { env: ENV, decrypt, createStore });

            expect(store.writes).toEqual([
                ['proj/api_key', 'abc'],
                ['proj/db.password', 'hunter2'],
                ['proj/db.port', 5432],
            ]);
            expect(result).toMatchObject({
                dryRun: false,
                vaultPath: 'proj',
                storageRoot: 'secret/proj',
                keys: ['api_key', 'db.password', 'db.port'],
                written: 3,
            });
            expect(result.counterpart).toBeUndefined();
            expect(createStore.mock.calls[0][0]).toEqual({
                address: 'http://vault.test:8200',
                token: 'test-token',
                mountPath: 'secret',
                namespace: undefined,
            });
        });

        it('should pass sops settings from the environment', async () => {
            await runImport(
                { sopsFile, vaultPath: 'proj', sops: { configPath: '.sops.yaml' } },
                { env: { ...ENV, SOPS_BIN: '/opt/bin/sops' }, decrypt, createStore }
            );

            expect(decrypt.mock.calls[0][0]).toBe(sopsFile);
            expect(decrypt.mock.calls[0][1]).toMatchObject({ bin: '/opt/bin/sops', configPath: '.sops.yaml' });
        });

        it('should fail on missing configuration before decrypting', async () => {
            await expect(runImport({ sopsFile, vaultPath: 'proj' }, { env: {}, decrypt, createStore })).rejects.toBeInstanceOf(
                ConfigurationError
            );
            expect(decrypt).not.toHaveBeenCalled();
            expect(createStore).not.toHaveBeenCalled();
        });

        it('should reject a document that is not a mapping', async () => {
            decrypt.mockResolvedValue('- a\n- b\n');

            await expect(runImport({ sopsFile, vaultPath: 'proj' }, { env: ENV, decrypt, createStore })).rejects.toBeInstanceOf(
                MalformedDocumentError
            );
            expect(createStore).not.toHaveBeenCalled();
        });

        it('should preview without credentials or writes in dry-run mode', async () => {
            const result = await runImport(
                { sopsFile, vaultPath: 'proj', dryRun: true, appendName: true, updateCounterpart: true },
                { env: {}, decrypt, createStore }
            );

            expect(createStore).not.toHaveBeenCalled();
            expect(result.written).toBe(0);
            expect(result.preview).toEqual([
                '[dry-run] Would write to Vault path: secret/proj/app',
                '[dry-run] 3 secrets:',
                '  api_key = <string, 3 chars>',
                '  db.password = <string, 7 chars>',
                '  db.port = <number>',
                `[dry-run] Counterpart file ${join(workDir, 'app.yaml')} does not exist, skipping`,
            ]);
        });

        it('should preview counterpart references when the file exists', async () => {
            await writeFile(join(workDir, 'app.yaml'), 'api_key: changeme\n');

            const result = await runImport(
                { sopsFile, vaultPath: 'proj', dryRun: true, updateCounterpart: true },
                { env: {}, decrypt, createStore }
            );

            expect(result.preview.slice(4)).toEqual([
                '  db.port = <number>',
                `[dry-run] Would update ${join(workDir, 'app.yaml')} with vault references:`,
                '  api_key: ref+vault://secret/proj/api_key#value',
                '  db.password: ref+vault://secret/proj/db.password#value',
                '  db.port: ref+vault://secret/proj/db.port#value',
            ]);
            expect(await readFile(join(workDir, 'app.yaml'), 'utf8')).toBe('api_key: changeme\n');
        });

        it('should rewrite the counterpart after writing', async () => {
            const counterpart = join(workDir, 'app.yaml');
            await writeFile(counterpart, 'db:\n  password: changeme\n  port: 5432\napi_key: changeme\n');

            const result = await runImport(
                { sopsFile, vaultPath: 'proj', updateCounterpart: true },
                { env: ENV, decrypt, createStore }
            );

            expect(result.counterpart?.status).toBe('updated');
            expect(await readFile(counterpart, 'utf8')).toBe(
                'db:\n' +
                '  password: ref+vault://secret/proj/db.password#value\n' +
                '  port: ref+vault://secret/proj/db.port#value\n' +
                'api_key: ref+vault://secret/proj/api_key#value\n'
            );
        });

        it('should keep numeric-looking keys as written', async () => {
            const counterpart = join(workDir, 'app.yaml');
            await writeFile(counterpart, 'api:\n  1.0: placeholder\n  010: placeholder\n');
            decrypt.mockResolvedValue('api:\n  1.0: s3cret\n  010: other\n');

            const result = await runImport(
                { sopsFile, vaultPath: 'proj', updateCounterpart: true },
                { env: ENV, decrypt, createStore }
            );

            expect(store.writes).toEqual([
                ['proj/api.010', 'other'],
                ['proj/api.1.0', 's3cret'],
            ]);
            expect(result.counterpart?.status).toBe('updated');
            expect(await readFile(counterpart, 'utf8')).toBe(
                'api:\n' +
                '  1.0: ref+vault://secret/proj/api.1.0#value\n' +
                '  010: ref+vault://secret/proj/api.010#value\n'
            );
        });

        it('should report a missing counterpart', async () => {
            const result = await runImport(
                { sopsFile, vaultPath: 'proj', updateCounterpart: true },
                { env: ENV, decrypt, createStore }
            );

            expect(result.counterpart).toEqual({ status: 'missing', path: join(workDir, 'app.yaml') });
        });

        it('should turn a counterpart failure into a warning', async () => {
            await writeFile(join(workDir, 'app.yaml'), '- a\n');

            const result = await runImport(
                { sopsFile, vaultPath: 'proj', updateCounterpart: true },
                { env: ENV, decrypt, createStore }
            );

            expect(result.written).toBe(3);
            expect(result.counterpart?.status).toBe('failed');
            if (result.counterpart?.status === 'failed') {
                expect(result.counterpart.error).toBeInstanceOf(DocumentShapeError);
            }
        });

        it('should leave the counterpart untouched when a write fails', async () => {
            const counterpart = join(workDir, 'app.yaml');
            await writeFile(counterpart, 'api_key: changeme\n');
            store = new MemoryStore('proj/db.password');

            await expect(
                runImport({ sopsFile, vaultPath: 'proj', updateCounterpart: true }, { env: ENV, decrypt, createStore })
            ).rejects.toThrow('Failed to write to Vault path proj/db.password: permission denied');

            expect(store.writes).toEqual([['proj/api_key', 'abc']]);
            expect(await readFile(counterpart, 'utf8')).toBe('api_key: changeme\n');
        });
    });
});
