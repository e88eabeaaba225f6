import * as fs from 'node:fs';
import * as path from 'node:path';

import { isDialect } from './dialects/index.js';
import type { ValidationOption } from './options.js';
import { IGNORE_UNUSED, combineOptions, createOptions, isValidationOption } from './options.js';
import { SpecLoader } from './parser/spec-loader.js';
import { isPlainObject } from './parser/reader.js';
import type { ReportFormat, ValidatorConfig, ValidatorConfigFile } from './types/index.js';

/** Flags as commander hands them over; everything is optional. */
export interface CliFlags {
    dialect?: string;
    ignore?: string[];
    ignoreUnused?: boolean;
    format?: string;
}

function stringField(record: Record<string, unknown>, key: string, configPath: string): string | undefined {
    const value = record[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new Error(`Configuration field '${key}' in ${configPath} must be a string.`);
    }
    return value;
}

/**
 * Reads a JSON or YAML configuration file. A relative `input` is resolved
 * against the directory of the file.
 */
export function loadConfigFile(configPath: string): ValidatorConfigFile {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
    }
    const raw = SpecLoader.parseContent(fs.readFileSync(resolvedPath, 'utf-8'), resolvedPath);
    if (!isPlainObject(raw)) {
        throw new Error(`Configuration file ${resolvedPath} must contain an object.`);
    }

    const ignore = raw.ignore;
    if (ignore !== undefined && !(Array.isArray(ignore) && ignore.every(entry => typeof entry === 'string'))) {
        throw new Error(`Configuration field 'ignore' in ${resolvedPath} must be a list of strings.`);
    }

    const input = stringField(raw, 'input', resolvedPath);
    const dialect = stringField(raw, 'dialect', resolvedPath);
    const format = stringField(raw, 'format', resolvedPath);
    return {
        ...(input === undefined ? {} : { input: path.isAbsolute(input) ? input : path.resolve(path.dirname(resolvedPath), input) }),
        ...(dialect === undefined ? {} : { dialect }),
        ...(ignore === undefined ? {} : { ignore: ignore.filter((entry): entry is string => typeof entry === 'string') }),
        ...(format === undefined ? {} : { format }),
    };
}

function parseFlags(values: readonly string[]): ValidationOption[] {
    return values.map(value => {
        if (!isValidationOption(value)) {
            throw new Error(`Unknown validation option '${value}'.`);
        }
        return value;
    });
}

function parseFormat(value: string | undefined): ReportFormat {
    if (value === undefined || value === 'text' || value === 'json') return value ?? 'text';
    throw new Error(`Unknown report format '${value}'. Expected 'text' or 'json'.`);
}

/**
 * Merges command-line flags over a configuration file. Ignore flags from
 * both sources are combined; scalar values from the command line win.
 */
export function resolveConfig(input: string | undefined, flags: CliFlags, file: ValidatorConfigFile = {}): ValidatorConfig {
    const finalInput = input ?? file.input;
    if (!finalInput) {
        throw new Error('Input path is required. Provide it as an argument or in a config file.');
    }
    const dialect = flags.dialect ?? file.dialect;
    if (dialect !== undefined && !isDialect(dialect)) {
        throw new Error(`Unknown dialect '${dialect}'. Expected one of: 2.0, 3.0, 3.1.`);
    }
    const options = combineOptions(
        createOptions(...parseFlags(file.ignore ?? [])),
        createOptions(...parseFlags(flags.ignore ?? [])),
        flags.ignoreUnused ? IGNORE_UNUSED : [],
    );
    return {
        input: finalInput,
        ...(dialect === undefined ? {} : { dialect }),
        options,
        format: parseFormat(flags.format ?? file.format),
    };
}
