/** Indent width used when the document has no indented line */
export const DEFAULT_INDENT = 2;

/**
 * Detects the indentation width of a YAML document
 *
 * The first line with leading whitespace followed by content decides.
 * Tabs count as one character each.
 */
export function detectIndent(content: string): number {
    for (const line of content.split('\n')) {
        const match = /^([ \t]+)\S/.exec(line);
        if (match) {
            return match[1].length;
        }
    }
    return DEFAULT_INDENT;
}
