import { MalformedDocumentError } from '../errors.js';
import type { JsonObject, JsonValue, PathSegment, StructuralPath } from '../types/json.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * Converts a deserialized value into a JSON value, rejecting anything that
 * JSON cannot carry. YAML timestamps arrive as `Date` and are kept as ISO strings.
 */
export function toJsonValue(value: unknown, path: StructuralPath): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean' || typeof value === 'number') {
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (Array.isArray(value)) {
        return value.map((entry, index) => toJsonValue(entry, [...path, index]));
    }
    if (isPlainObject(value)) {
        const result: JsonObject = {};
        for (const [key, entry] of Object.entries(value)) {
            result[key] = toJsonValue(entry, [...path, key]);
        }
        return result;
    }
    throw new MalformedDocumentError(`Expected a JSON value, found ${describeType(value)}.`, path);
}

/**
 * Typed, path-aware access to one object of the deserialized input.
 * Every accessor throws `MalformedDocumentError` when a present field has
 * the wrong structural type; absent fields read as `undefined` (or an empty
 * collection).
 */
export class NodeReader {
    private constructor(
        public readonly value: Readonly<Record<string, unknown>>,
        public readonly path: StructuralPath,
    ) {}

    static from(value: unknown, path: StructuralPath, what: string): NodeReader {
        if (!isPlainObject(value)) {
            throw new MalformedDocumentError(`${what} must be an object, found ${describeType(value)}.`, path);
        }
        return new NodeReader(value, path);
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.value, key) && this.value[key] !== undefined;
    }

    at(...segments: PathSegment[]): StructuralPath {
        return [...this.path, ...segments];
    }

    raw(key: string): unknown {
        return this.has(key) ? this.value[key] : undefined;
    }

    optionalString(key: string): string | undefined {
        const value = this.raw(key);
        if (value === undefined) return undefined;
        if (typeof value !== 'string') {
            throw new MalformedDocumentError(`Field '${key}' must be a string, found ${describeType(value)}.`, this.at(key));
        }
        return value;
    }

    requiredString(key: string): string {
        const value = this.optionalString(key);
        if (value === undefined) {
            throw new MalformedDocumentError(`Missing required string field '${key}'.`, this.path);
        }
        return value;
    }

    optionalBoolean(key: string): boolean | undefined {
        const value = this.raw(key);
        if (value === undefined) return undefined;
        if (typeof value !== 'boolean') {
            throw new MalformedDocumentError(`Field '${key}' must be a boolean, found ${describeType(value)}.`, this.at(key));
        }
        return value;
    }

    optionalObject(key: string, what: string = `Field '${key}'`): NodeReader | undefined {
        const value = this.raw(key);
        return value === undefined ? undefined : NodeReader.from(value, this.at(key), what);
    }

    requiredObject(key: string, what: string = `Field '${key}'`): NodeReader {
        const reader = this.optionalObject(key, what);
        if (!reader) {
            throw new MalformedDocumentError(`Missing required object field '${key}'.`, this.path);
        }
        return reader;
    }

    optionalArray(key: string): readonly unknown[] | undefined {
        const value = this.raw(key);
        if (value === undefined) return undefined;
        if (!Array.isArray(value)) {
            throw new MalformedDocumentError(`Field '${key}' must be an array, found ${describeType(value)}.`, this.at(key));
        }
        return value;
    }

    stringList(key: string): readonly string[] | undefined {
        const values = this.optionalArray(key);
        if (values === undefined) return undefined;
        return values.map((value, index) => {
            if (typeof value !== 'string') {
                throw new MalformedDocumentError(
                    `Entries of '${key}' must be strings, found ${describeType(value)}.`,
                    this.at(key, index),
                );
            }
            return value;
        });
    }

    optionalJson(key: string): JsonValue | undefined {
        const value = this.raw(key);
        return value === undefined ? undefined : toJsonValue(value, this.at(key));
    }

    optionalJsonObject(key: string): JsonObject | undefined {
        const reader = this.optionalObject(key);
        return reader ? reader.json() : undefined;
    }

    /** Builds every entry of a map field; an absent field yields an empty map. */
    map<T>(key: string, build: (value: unknown, path: StructuralPath, name: string) => T): ReadonlyMap<string, T> {
        const reader = this.optionalObject(key);
        const result = new Map<string, T>();
        if (!reader) return result;
        for (const [name, value] of reader.entries()) {
            result.set(name, build(value, reader.at(name), name));
        }
        return result;
    }

    /**
     * Like `map`, for Paths and Responses objects whose `x-*` keys are
     * extensions rather than entries.
     */
    patterned<T>(key: string, build: (value: unknown, path: StructuralPath, name: string) => T): ReadonlyMap<string, T> {
        const reader = this.optionalObject(key);
        const result = new Map<string, T>();
        if (!reader) return result;
        for (const [name, value] of reader.entries()) {
            if (!name.startsWith('x-')) {
                result.set(name, build(value, reader.at(name), name));
            }
        }
        return result;
    }

    /** Builds every entry of a list field; an absent field yields an empty list. */
    list<T>(key: string, build: (value: unknown, path: StructuralPath, index: number) => T): readonly T[] {
        const values = this.optionalArray(key) ?? [];
        return values.map((value, index) => build(value, this.at(key, index), index));
    }

    /** Own entries in document order, skipping `undefined` values. */
    entries(): [string, unknown][] {
        return Object.entries(this.value).filter(([, value]) => value !== undefined);
    }

    /** Specification extensions (`x-*` keys). */
    extensions(): JsonObject {
        const result: JsonObject = {};
        for (const [key, value] of this.entries()) {
            if (key.startsWith('x-')) {
                result[key] = toJsonValue(value, this.at(key));
            }
        }
        return result;
    }

    /** Keys that are neither in `consumed` nor extensions, as JSON. */
    rest(consumed: ReadonlySet<string>): JsonObject {
        const result: JsonObject = {};
        for (const [key, value] of this.entries()) {
            if (!consumed.has(key) && !key.startsWith('x-')) {
                result[key] = toJsonValue(value, this.at(key));
            }
        }
        return result;
    }

    json(): JsonObject {
        const result: JsonObject = {};
        for (const [key, value] of this.entries()) {
            result[key] = toJsonValue(value, this.at(key));
        }
        return result;
    }
}
