/**
 * Import Errors
 *
 * Each failure kind of an import run has its own class so the CLI and
 * library callers can tell an aborted run (configuration, decryption,
 * malformed input, store write) from a counterpart warning.
 */

/**
 * Missing Vault address or token outside of dry-run mode
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * The sops binary failed or could not be started
 */
export class DecryptionError extends Error {
    constructor(public file: string, detail: string) {
        super(`Failed to decrypt ${file}: ${detail}`);
        this.name = 'DecryptionError';
    }
}

/**
 * Decrypted content is not a YAML mapping
 */
export class MalformedDocumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedDocumentError';
    }
}

/**
 * A single Vault write failed; remaining writes are not attempted
 */
export class StoreWriteError extends Error {
    constructor(public path: string, detail: string) {
        super(`Failed to write to Vault path ${path}: ${detail}`);
        this.name = 'StoreWriteError';
    }
}

/**
 * Reading, parsing or writing the counterpart file failed
 */
export class CounterpartError extends Error {
    constructor(public path: string, detail: string) {
        super(`${path}: ${detail}`);
        this.name = 'CounterpartError';
    }
}

/**
 * The counterpart document root is not a mapping
 */
export class DocumentShapeError extends Error {
    constructor(public path: string, public found: string) {
        super(`${path}: expected YAML mapping at root, got ${found}`);
        this.name = 'DocumentShapeError';
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Checks for a filesystem "no such file" error
 */
export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
