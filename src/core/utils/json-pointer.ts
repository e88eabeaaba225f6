import type { PathSegment } from '../types/json.js';

/**
 * Escapes a single JSON Pointer reference token (RFC 6901).
 */
export function encodePointerSegment(segment: PathSegment): string {
    return String(segment).replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Unescapes a single JSON Pointer reference token (RFC 6901).
 * `~1` is replaced before `~0` so that `~01` decodes to `~1`.
 */
export function decodePointerSegment(segment: string): string {
    return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Renders a structural path as a URI fragment JSON Pointer.
 *
 * Example:
 * - `['paths', '/pets', 'get']` -> `#/paths/~1pets/get`
 * - `[]` -> `#`
 */
export function toPointer(path: readonly PathSegment[]): string {
    if (path.length === 0) return '#';
    return `#/${path.map(encodePointerSegment).join('/')}`;
}

/**
 * Escapes a segment for use inside a `$ref` fragment: the JSON Pointer
 * escape plus `%`, which fragment decoding would otherwise consume.
 */
export function encodeFragmentSegment(segment: PathSegment): string {
    return encodePointerSegment(segment).replace(/%/g, '%25');
}

/**
 * Splits a `#/a/b` fragment into decoded segments. The fragment is
 * percent-decoded before it is split (RFC 6901, section 6).
 * Returns `undefined` when the fragment is not a JSON Pointer.
 */
export function parsePointer(fragment: string): string[] | undefined {
    if (!fragment.startsWith('#')) return undefined;
    let pointer: string;
    try {
        pointer = decodeURIComponent(fragment.slice(1));
    } catch {
        return undefined;
    }
    if (pointer === '') return [];
    if (!pointer.startsWith('/')) return undefined;
    const raw = pointer.slice(1).split('/');
    // `~` must be followed by 0 or 1
    if (raw.some(segment => /~(?![01])/.test(segment))) return undefined;
    return raw.map(decodePointerSegment);
}
