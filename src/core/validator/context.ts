import type { AnyDialectAdapter } from '../dialects/index.js';
import { adapterFor } from '../dialects/index.js';
import type { OptionSet, ValidationOption } from '../options.js';
import { ReferenceResolver } from '../parser/reference-resolver.js';
import type { ComponentKind, IssueDraft, SpecDocument, StructuralPath, ValidationIssue } from '../types/index.js';
import { toPointer } from '../utils/index.js';

/**
 * Per-call state of one validation run. Nothing here outlives the call, so
 * concurrent runs with different options never share state.
 */
export class ValidationContext {
    readonly issues: ValidationIssue[] = [];
    readonly adapter: AnyDialectAdapter;
    readonly resolver: ReferenceResolver;
    /** operationId -> location of its first declaration. */
    readonly operationIds = new Map<string, StructuralPath>();
    /** JSON pointers of every operation, for `operationRef` links. */
    readonly operationPointers = new Set<string>();

    constructor(
        readonly document: SpecDocument,
        readonly options: OptionSet,
    ) {
        this.adapter = adapterFor(document);
        this.resolver = ReferenceResolver.forDocument(document);
    }

    /** A check is active unless its flag is set. */
    isActive(flag: ValidationOption): boolean {
        return !this.options.has(flag);
    }

    report(draft: IssueDraft): void {
        const issue: ValidationIssue =
            draft.kind === 'DuplicateIdentifier'
                ? { ...draft, pointer: toPointer(draft.path), firstPointer: toPointer(draft.firstPath) }
                : { ...draft, pointer: toPointer(draft.path) };
        this.issues.push(Object.freeze(issue));
    }

    /** Reports `draft` only while `flag` is not set. */
    reportUnless(flag: ValidationOption, draft: IssueDraft): void {
        if (this.isActive(flag)) this.report(draft);
    }

    /** Location of a component entry, e.g. `['components', 'schemas', 'Pet']`. */
    componentPath(kind: ComponentKind, name: string): StructuralPath {
        const location = this.adapter.componentLocations[kind] ?? ['components', kind];
        return [...location, name];
    }
}
