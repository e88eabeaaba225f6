#!/usr/bin/env node
import { Command, Option } from 'commander';
import * as fs from 'fs';
import { loadConfigFile, resolveConfig } from './core/config.js';
import type { CliFlags } from './core/config.js';
import { MalformedDocumentError } from './core/errors.js';
import { isPlainObject } from './core/parser/reader.js';
import { formatReport } from './core/report.js';
import type { ValidatorConfigFile } from './core/types/index.js';
import { validateFromConfig } from './index.js';

const EXIT_VALID = 0;
const EXIT_ISSUES = 1;
const EXIT_UNREADABLE = 2;

function readVersion(): string {
    const packageJson: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    return isPlainObject(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}

interface ValidateCommandOptions extends CliFlags {
    config?: string;
}

function runValidation(input: string | undefined, options: ValidateCommandOptions): number {
    try {
        const file: ValidatorConfigFile = options.config ? loadConfigFile(options.config) : {};
        const config = resolveConfig(input, options, file);
        const { result } = validateFromConfig(config);
        const report = formatReport(result, config.format, config.input);
        if (result.valid) {
            console.log(report);
            return EXIT_VALID;
        }
        console.error(report);
        return EXIT_ISSUES;
    } catch (error) {
        const label = error instanceof MalformedDocumentError ? 'Malformed document' : 'Validation failed';
        console.error(`❌ ${label}:`, error instanceof Error ? error.message : String(error));
        return EXIT_UNREADABLE;
    }
}

const program = new Command();
program
    .name('oas-integrity')
    .description('Semantic validator for Swagger 2.0, OpenAPI 3.0 and OpenAPI 3.1 documents')
    .version(readVersion());

program
    .command('validate')
    .description('Validate a local JSON or YAML specification file')
    .argument('[input]', 'Path to the specification (overrides config)')
    .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
    .addOption(new Option('-d, --dialect <dialect>', 'Force a dialect instead of detecting it').choices(['2.0', '3.0', '3.1']))
    .option('-i, --ignore <flags...>', 'Validation checks to disable, e.g. ignore-unused-schemas')
    .option('--ignore-unused', 'Disable every unused-component and unused-tag check')
    .addOption(new Option('-f, --format <format>', 'Report format').choices(['text', 'json']))
    .action((input: string | undefined, options: ValidateCommandOptions) => {
        process.exitCode = runValidation(input, options);
    });

program.parse(process.argv);
