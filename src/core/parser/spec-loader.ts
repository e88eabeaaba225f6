import * as fs from 'node:fs';
import * as path from 'node:path';

import yaml from 'js-yaml';

import { isPlainObject } from './reader.js';

/**
 * Reads a local JSON or YAML document into a plain value.
 * References are never followed; external ones are only reported.
 */
export class SpecLoader {
    public static load(inputPath: string): unknown {
        const filePath = path.resolve(process.cwd(), inputPath);
        const content = this.loadContent(filePath);
        const raw = this.parseContent(content, filePath);

        const external = SpecLoader.findExternalRefs(raw);
        if (external.length > 0) {
            console.warn(
                `[SpecLoader] ${external.length} external reference(s) will not be fetched: ${external.join(', ')}`,
            );
        }
        return raw;
    }

    /** Unique `$ref` values that point outside the document, in discovery order. */
    public static findExternalRefs(value: unknown): string[] {
        const refs = new Set<string>();

        function traverse(current: unknown) {
            if (Array.isArray(current)) {
                current.forEach(traverse);
                return;
            }
            if (!isPlainObject(current)) return;
            const ref = current.$ref;
            if (typeof ref === 'string' && !ref.startsWith('#')) refs.add(ref);
            Object.values(current).forEach(traverse);
        }

        traverse(value);
        return Array.from(refs);
    }

    private static loadContent(filePath: string): string {
        if (!fs.existsSync(filePath)) {
            throw new Error(`Input file not found at ${filePath}`);
        }
        try {
            return fs.readFileSync(filePath, 'utf8');
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new Error(`Failed to read content from "${filePath}": ${message}`);
        }
    }

    /** YAML timestamps stay strings under the core schema. */
    public static parseContent(content: string, filePath: string): unknown {
        try {
            const extension = path.extname(filePath).toLowerCase();
            if (['.yaml', '.yml'].includes(extension) || (!extension && !content.trim().startsWith('{'))) {
                return yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath });
            }
            return JSON.parse(content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to parse content from ${filePath}. Error: ${message}`);
        }
    }
}
