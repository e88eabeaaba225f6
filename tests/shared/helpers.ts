import { parseDocument } from '@src/core/parser.js';
import type { ValidationOption } from '@src/core/options.js';
import { createOptions } from '@src/core/options.js';
import type { ValidationIssue } from '@src/core/types/index.js';
import { validateDocument } from '@src/core/validator/index.js';

/** Parses `raw` and returns the issues of one run with the given flags set. */
export function issuesOf(raw: unknown, ...flags: ValidationOption[]): readonly ValidationIssue[] {
    return validateDocument(parseDocument(raw), createOptions(...flags)).issues;
}

/** `kind @ pointer` per issue, the compact form most assertions compare against. */
export function summaryOf(raw: unknown, ...flags: ValidationOption[]): string[] {
    return issuesOf(raw, ...flags).map(issue => `${issue.kind} @ ${issue.pointer}`);
}
