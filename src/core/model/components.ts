import type { ComponentKind, ComponentRegistry, ComponentTypes } from '../types/document.js';
import { COMPONENT_KINDS } from '../types/document.js';

/**
 * The named registry of reusable artifacts of one document, keyed per
 * component kind. Swagger 2.0 documents fill it from `definitions`,
 * `parameters`, `responses` and `securityDefinitions`.
 *
 * Names are unique within a kind because they are mapping keys in the source.
 */
export class ComponentsContainer {
    private constructor(private readonly registry: ComponentRegistry) {}

    static create(entries: Partial<ComponentRegistry> = {}): ComponentsContainer {
        return new ComponentsContainer({
            schemas: entries.schemas ?? new Map(),
            responses: entries.responses ?? new Map(),
            parameters: entries.parameters ?? new Map(),
            examples: entries.examples ?? new Map(),
            requestBodies: entries.requestBodies ?? new Map(),
            headers: entries.headers ?? new Map(),
            securitySchemes: entries.securitySchemes ?? new Map(),
            links: entries.links ?? new Map(),
            callbacks: entries.callbacks ?? new Map(),
            pathItems: entries.pathItems ?? new Map(),
        });
    }

    get<K extends ComponentKind>(kind: K, name: string): ComponentTypes[K] | undefined {
        return this.registry[kind].get(name);
    }

    has(kind: ComponentKind, name: string): boolean {
        return this.registry[kind].has(name);
    }

    /** Entries of one kind, in document order. */
    entries<K extends ComponentKind>(kind: K): [string, ComponentTypes[K]][] {
        return Array.from(this.registry[kind].entries());
    }

    names(kind: ComponentKind): string[] {
        return Array.from(this.registry[kind].keys());
    }

    /** Kinds holding at least one entry, in traversal order. */
    populatedKinds(): ComponentKind[] {
        return COMPONENT_KINDS.filter(kind => this.registry[kind].size > 0);
    }

    isEmpty(): boolean {
        return this.populatedKinds().length === 0;
    }
}
