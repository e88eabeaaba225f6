import type { ReportFormat, ValidationResult } from './types/index.js';

/**
 * Renders a validation result for the command line.
 *
 * Text output is one summary line followed by one line per issue
 * (`pointer [Kind] message`); JSON output carries the issues verbatim.
 */
export function formatReport(result: ValidationResult, format: ReportFormat, input: string): string {
    if (format === 'json') {
        return JSON.stringify({ input, valid: result.valid, issues: result.issues }, null, 2);
    }
    if (result.valid) {
        return `✅ No issues found in ${input}.`;
    }
    const count = result.issues.length;
    const lines = result.issues.map(issue => `  - ${issue.pointer} [${issue.kind}] ${issue.message}`);
    return [`❌ ${count} issue${count === 1 ? '' : 's'} found in ${input}:`, ...lines].join('\n');
}
