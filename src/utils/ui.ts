/**
 * Console output helpers shared by the CLI commands.
 */

import pc from 'picocolors';

export const colors = pc;

export function success(message: string): void {
    console.log(colors.green(`✔ ${message}`));
}

export function info(message: string): void {
    console.log(colors.cyan(message));
}

export function warn(message: string): void {
    console.error(colors.yellow(`Warning: ${message}`));
}

/**
 * Prints an error and exits with code 1
 */
export function error(message: string): never {
    console.error(colors.red(`Error: ${message}`));
    process.exit(1);
}
