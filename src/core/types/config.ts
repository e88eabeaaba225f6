import type { OptionSet } from '../options.js';
import type { Dialect } from './document.js';

export type ReportFormat = 'text' | 'json';

/** The configuration object the CLI assembles from flags and an optional config file. */
export interface ValidatorConfig {
    /** The local file path of the specification (JSON or YAML). */
    input: string;
    /** Forces a dialect instead of detecting it from `swagger` / `openapi`. */
    dialect?: Dialect;
    /** Checks to disable. Empty means full strict validation. */
    options: OptionSet;
    /** How the report is printed. */
    format: ReportFormat;
}

/** The shape of a config file: everything optional, flags as strings. */
export interface ValidatorConfigFile {
    input?: string;
    dialect?: string;
    ignore?: string[];
    format?: string;
}
