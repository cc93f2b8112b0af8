/**
 * Builds the vals-style reference for a secret stored in Vault
 *
 * @param storageRoot - Mount and base path, e.g. "secret/myapp"
 * @param dottedKey - Flattened key, e.g. "admin.oauth2.clientID"
 */
export function buildReference(storageRoot: string, dottedKey: string): string {
    return `ref+vault://${storageRoot}/${dottedKey}#value`;
}
