/**
 * Spreads `{ [key]: value }` only when the value is defined, so absent
 * fields stay absent instead of becoming `undefined` properties.
 */
export function optional<K extends string, V>(key: K, value: V | undefined): { [P in K]?: V } {
    if (value === undefined) return {};
    const result: { [P in K]?: V } = {};
    result[key] = value;
    return result;
}
