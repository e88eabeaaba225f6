/**
 * Checks if a string is a valid absolute URL.
 */
export function isUrl(input: string): boolean {
    try {
        new URL(input);
        return true;
    } catch {
        return false;
    }
}

/**
 * Checks if a string is an absolute `http://` or `https://` URL.
 */
export function isHttpUrl(input: string): boolean {
    if (!input.startsWith('http://') && !input.startsWith('https://')) {
        return false;
    }
    return isUrl(input);
}

/** Matches a URI scheme prefix such as `https:` or `urn:`. */
const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

export function hasUriScheme(input: string): boolean {
    return SCHEME_PREFIX.test(input);
}

/**
 * Formats a list of names for an error message: `"a", "b" and "c"`.
 */
export function quoteList(values: readonly string[]): string {
    const quoted = values.map(value => `"${value}"`);
    if (quoted.length <= 1) return quoted.join('');
    return `${quoted.slice(0, -1).join(', ')} and ${quoted[quoted.length - 1]}`;
}
