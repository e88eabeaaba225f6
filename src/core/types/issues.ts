import type { ComponentKind } from './document.js';
import type { StructuralPath } from './json.js';
import type { CompositionKeyword, SchemaShape, SchemaType } from './schema.js';

// ===================================================================================
// Validation Issues
// ===================================================================================

interface IssueBase {
    /** Structural location of the violation, e.g. `['paths', '/pets', 'get', 'responses', '200']`. */
    readonly path: StructuralPath;
    /** `path` rendered as a JSON Pointer fragment, e.g. `#/paths/~1pets/get/responses/200`. */
    readonly pointer: string;
    readonly message: string;
}

export interface UnresolvedReferenceIssue extends IssueBase {
    readonly kind: 'UnresolvedReference';
    readonly reference: string;
    /** True for a well-formed reference to another document, which is never fetched. */
    readonly external: boolean;
}

export interface CyclicReferenceIssue extends IssueBase {
    readonly kind: 'CyclicReference';
    readonly reference: string;
    /** Tokens followed until one repeated, the repeated token last. */
    readonly chain: readonly string[];
}

export interface MalformedReferenceIssue extends IssueBase {
    readonly kind: 'MalformedReference';
    readonly reference: string;
}

export type IdentifierScope = 'operationId' | 'parameter' | 'tag' | 'path';

export interface DuplicateIdentifierIssue extends IssueBase {
    readonly kind: 'DuplicateIdentifier';
    readonly scope: IdentifierScope;
    readonly identifier: string;
    /** Where the identifier was first declared. */
    readonly firstPath: StructuralPath;
    readonly firstPointer: string;
}

export interface UndeclaredTagUsedIssue extends IssueBase {
    readonly kind: 'UndeclaredTagUsed';
    readonly tag: string;
}

export interface UndeclaredSecuritySchemeUsedIssue extends IssueBase {
    readonly kind: 'UndeclaredSecuritySchemeUsed';
    readonly scheme: string;
}

export interface UndeclaredScopeIssue extends IssueBase {
    readonly kind: 'UndeclaredScope';
    readonly scheme: string;
    readonly scope: string;
}

export interface EmptyCompositionIssue extends IssueBase {
    readonly kind: 'EmptyComposition';
    readonly keyword: CompositionKeyword;
}

export interface MisplacedDiscriminatorIssue extends IssueBase {
    readonly kind: 'MisplacedDiscriminator';
    readonly shape: SchemaShape;
}

export interface DanglingRequiredPropertyIssue extends IssueBase {
    readonly kind: 'DanglingRequiredProperty';
    readonly property: string;
}

export interface UnusedComponentIssue extends IssueBase {
    readonly kind: 'UnusedComponent';
    readonly componentKind: ComponentKind;
    readonly name: string;
}

export interface UnusedTagIssue extends IssueBase {
    readonly kind: 'UnusedTag';
    readonly tag: string;
}

export interface InvalidComponentNameIssue extends IssueBase {
    readonly kind: 'InvalidComponentName';
    readonly componentKind: ComponentKind;
    readonly name: string;
}

export interface InvalidPathTemplateIssue extends IssueBase {
    readonly kind: 'InvalidPathTemplate';
    readonly template: string;
}

export interface EmptyRequiredFieldIssue extends IssueBase {
    readonly kind: 'EmptyRequiredField';
    readonly field: string;
}

export interface InvalidUrlIssue extends IssueBase {
    readonly kind: 'InvalidUrl';
    readonly value: string;
}

export interface InvalidEmailIssue extends IssueBase {
    readonly kind: 'InvalidEmail';
    readonly value: string;
}

export interface DuplicateSchemaTypeIssue extends IssueBase {
    readonly kind: 'DuplicateSchemaType';
    readonly type: SchemaType;
}

export interface OptionalPathParameterIssue extends IssueBase {
    readonly kind: 'OptionalPathParameter';
    readonly name: string;
}

export interface UndefinedServerVariableIssue extends IssueBase {
    readonly kind: 'UndefinedServerVariable';
    readonly variable: string;
}

export interface UnusedServerVariableIssue extends IssueBase {
    readonly kind: 'UnusedServerVariable';
    readonly variable: string;
}

export interface InvalidServerVariableDefaultIssue extends IssueBase {
    readonly kind: 'InvalidServerVariableDefault';
    readonly variable: string;
    readonly value: string;
    readonly allowed: readonly string[];
}

/** One detected violation. Issues are frozen once reported. */
export type ValidationIssue =
    | UnresolvedReferenceIssue
    | CyclicReferenceIssue
    | MalformedReferenceIssue
    | DuplicateIdentifierIssue
    | UndeclaredTagUsedIssue
    | UndeclaredSecuritySchemeUsedIssue
    | UndeclaredScopeIssue
    | EmptyCompositionIssue
    | MisplacedDiscriminatorIssue
    | DanglingRequiredPropertyIssue
    | UnusedComponentIssue
    | UnusedTagIssue
    | InvalidComponentNameIssue
    | InvalidPathTemplateIssue
    | EmptyRequiredFieldIssue
    | InvalidUrlIssue
    | InvalidEmailIssue
    | DuplicateSchemaTypeIssue
    | OptionalPathParameterIssue
    | UndefinedServerVariableIssue
    | UnusedServerVariableIssue
    | InvalidServerVariableDefaultIssue;

export type ValidationIssueKind = ValidationIssue['kind'];

/** An issue as handed to the reporter; the pointer is derived from the path. */
export type IssueDraft = ValidationIssue extends infer I
    ? I extends ValidationIssue
        ? Omit<I, 'pointer' | 'firstPointer'>
        : never
    : never;

export type ValidationResult =
    | { readonly valid: true; readonly issues: readonly [] }
    | { readonly valid: false; readonly issues: readonly ValidationIssue[] };
