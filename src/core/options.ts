import type { ComponentKind } from './types/document.js';

/**
 * Every recognised validation flag. Each one disables exactly one check;
 * a check whose flag is absent stays active.
 */
export const VALIDATION_OPTIONS = [
    'ignore-external-references',
    'ignore-missing-tags',
    'ignore-missing-security-schemes',
    'ignore-non-unique-operation-ids',
    'ignore-duplicate-parameters',
    'ignore-duplicate-tags',
    'ignore-ambiguous-paths',
    'ignore-invalid-component-names',
    'ignore-schema-errors',
    'ignore-invalid-urls',
    'ignore-unused-tags',
    'ignore-unused-schemas',
    'ignore-unused-responses',
    'ignore-unused-parameters',
    'ignore-unused-examples',
    'ignore-unused-request-bodies',
    'ignore-unused-headers',
    'ignore-unused-security-schemes',
    'ignore-unused-links',
    'ignore-unused-callbacks',
    'ignore-unused-path-items',
    'ignore-unused-server-variables',
    'ignore-empty-info-title',
    'ignore-empty-info-version',
    'ignore-empty-response-description',
    'ignore-empty-external-documentation-url',
] as const;

export type ValidationOption = (typeof VALIDATION_OPTIONS)[number];

/** An immutable combination of flags. The empty set is full strict validation. */
export type OptionSet = ReadonlySet<ValidationOption>;

/** The flag that silences `UnusedComponent` issues for each component kind. */
export const UNUSED_COMPONENT_OPTIONS: Readonly<Record<ComponentKind, ValidationOption>> = {
    schemas: 'ignore-unused-schemas',
    responses: 'ignore-unused-responses',
    parameters: 'ignore-unused-parameters',
    examples: 'ignore-unused-examples',
    requestBodies: 'ignore-unused-request-bodies',
    headers: 'ignore-unused-headers',
    securitySchemes: 'ignore-unused-security-schemes',
    links: 'ignore-unused-links',
    callbacks: 'ignore-unused-callbacks',
    pathItems: 'ignore-unused-path-items',
};

export function isValidationOption(value: string): value is ValidationOption {
    return VALIDATION_OPTIONS.some(option => option === value);
}

export function createOptions(...flags: ValidationOption[]): OptionSet {
    return Object.freeze(new Set(flags));
}

/** Set union. Commutative and idempotent. */
export function combineOptions(...sets: Iterable<ValidationOption>[]): OptionSet {
    const combined = new Set<ValidationOption>();
    for (const set of sets) {
        for (const flag of set) combined.add(flag);
    }
    return Object.freeze(combined);
}

export const STRICT: OptionSet = createOptions();

/** Silences every unused-component, unused-tag and unused-server-variable check. */
export const IGNORE_UNUSED: OptionSet = createOptions(
    'ignore-unused-tags',
    'ignore-unused-server-variables',
    ...Object.values(UNUSED_COMPONENT_OPTIONS),
);

/** Accepts empty strings in fields the specification requires. */
export const IGNORE_EMPTY_REQUIRED_FIELDS: OptionSet = createOptions(
    'ignore-empty-info-title',
    'ignore-empty-info-version',
    'ignore-empty-response-description',
    'ignore-empty-external-documentation-url',
);
