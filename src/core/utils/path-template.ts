/**
 * Normalizes a path template to a generic signature for collision detection.
 *
 * Example:
 * - "/users/{id}/details" -> "/users/{}/details"
 * - "/users/{name}/details" -> "/users/{}/details"
 *
 * @param path The URL template path.
 * @returns A normalized signature string.
 */
export function getPathTemplateSignature(path: string): string {
    return path
        .split('/')
        .map(segment => {
            if (segment.startsWith('{') && segment.endsWith('}')) {
                return '{}';
            }
            return segment;
        })
        .join('/');
}
