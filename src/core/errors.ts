import type { StructuralPath, ValidationIssue } from './types/index.js';
import { toPointer } from './utils/json-pointer.js';

/**
 * Thrown while building the document model when the input is not a
 * structurally coherent document of the targeted dialect. Parsing stops at
 * the first such error.
 */
export class MalformedDocumentError extends Error {
    public readonly path: StructuralPath;
    public readonly pointer: string;

    constructor(message: string, path: StructuralPath = []) {
        const pointer = toPointer(path);
        super(path.length > 0 ? `${message} (at ${pointer})` : message);
        this.name = 'MalformedDocumentError';
        this.path = path;
        this.pointer = pointer;
    }
}

/**
 * A schema node declares facets of more than one shape, e.g. both `items`
 * and `properties`, or two composition keywords.
 */
export class ShapeConflictError extends MalformedDocumentError {
    constructor(message: string, path: StructuralPath = []) {
        super(message, path);
        this.name = 'ShapeConflictError';
    }
}

/**
 * Error thrown by `assertValid` when the document has validation issues.
 */
export class SpecValidationError extends Error {
    public readonly issues: readonly ValidationIssue[];

    constructor(issues: readonly ValidationIssue[]) {
        const lines = issues.map(issue => `- ${issue.pointer}: ${issue.message}`);
        super(`${issues.length} validation issue${issues.length === 1 ? '' : 's'} found:\n${lines.join('\n')}`);
        this.name = 'SpecValidationError';
        this.issues = issues;
    }
}
