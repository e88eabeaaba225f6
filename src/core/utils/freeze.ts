/**
 * Recursively freezes plain objects and arrays reachable from `value`.
 * Map instances cannot be frozen, so only their values are visited; the
 * model exposes them as `ReadonlyMap`.
 */
export function deepFreeze<T>(value: T): T {
    freezeValue(value);
    return value;
}

function freezeValue(value: unknown): void {
    if (typeof value !== 'object' || value === null) return;
    if (value instanceof Map) {
        for (const entry of value.values()) freezeValue(entry);
        return;
    }
    if (Object.isFrozen(value)) return;
    Object.freeze(value);
    for (const entry of Object.values(value)) {
        freezeValue(entry);
    }
}
