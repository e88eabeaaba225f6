import { describe, expect, it } from 'vitest';
import { formatReport } from '@src/core/report.js';
import type { ValidationResult } from '@src/core/types/index.js';
import { emptySpec30, okResponse } from '../fixtures/common.js';
import { issuesOf } from '../shared/helpers.js';

const valid: ValidationResult = { valid: true, issues: [] };

function invalid(raw: unknown): ValidationResult {
    return { valid: false, issues: issuesOf(raw) };
}

const oneIssue = {
    ...emptySpec30,
    paths: { '/pets': { get: { tags: ['pets'], responses: { '200': okResponse } } } },
};

const twoIssues = {
    ...emptySpec30,
    info: { title: 'Test API', version: '' },
    paths: { '/pets': { get: { tags: ['pets'], responses: { '200': okResponse } } } },
};

describe('CLI: Report', () => {
    it('should confirm a valid document', () => {
        expect(formatReport(valid, 'text', 'api.yaml')).toBe('✅ No issues found in api.yaml.');
    });

    it('should list one line per issue', () => {
        expect(formatReport(invalid(oneIssue), 'text', 'api.yaml')).toBe(
            [
                '❌ 1 issue found in api.yaml:',
                "  - #/paths/~1pets/get/tags/0 [UndeclaredTagUsed] Tag 'pets' is not declared in the top-level tags list.",
            ].join('\n'),
        );
    });

    it('should pluralise the summary line', () => {
        const [summary, ...lines] = formatReport(invalid(twoIssues), 'text', 'api.yaml').split('\n');
        expect(summary).toBe('❌ 2 issues found in api.yaml:');
        expect(lines).toEqual([
            '  - #/info/version [EmptyRequiredField] info.version must not be empty.',
            "  - #/paths/~1pets/get/tags/0 [UndeclaredTagUsed] Tag 'pets' is not declared in the top-level tags list.",
        ]);
    });

    it('should write the issues verbatim as JSON', () => {
        const result = invalid(oneIssue);
        expect(JSON.parse(formatReport(result, 'json', 'api.yaml'))).toEqual({
            input: 'api.yaml',
            valid: false,
            issues: [
                {
                    kind: 'UndeclaredTagUsed',
                    path: ['paths', '/pets', 'get', 'tags', 0],
                    pointer: '#/paths/~1pets/get/tags/0',
                    tag: 'pets',
                    message: "Tag 'pets' is not declared in the top-level tags list.",
                },
            ],
        });
        expect(JSON.parse(formatReport(valid, 'json', 'api.yaml'))).toEqual({ input: 'api.yaml', valid: true, issues: [] });
    });
});
