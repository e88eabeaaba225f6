import type { SchemaNode, StructuralPath } from '../types/index.js';
import type { ValidationContext } from './context.js';
import type { InlineSchema, WalkVisitor } from './walker.js';

/**
 * Property names a node makes available: its own `properties`, plus, for a
 * composition, those of every inline or referenced member (`not` excluded).
 */
export function knownProperties(ctx: ValidationContext, node: SchemaNode, seen: Set<string> = new Set()): Set<string> {
    const names = new Set<string>();
    const collect = (current: SchemaNode): void => {
        if (current.shape === 'reference') {
            if (seen.has(current.$ref)) return;
            seen.add(current.$ref);
            const resolution = ctx.resolver.resolve('schemas', current.$ref);
            if (resolution.ok) collect(resolution.value);
            return;
        }
        if (current.shape !== 'object' && current.shape !== 'composition') return;
        for (const name of current.properties.keys()) names.add(name);
        if (current.shape === 'composition' && current.keyword !== 'not') {
            current.members.forEach(collect);
        }
    };
    collect(node);
    return names;
}

function checkRequired(ctx: ValidationContext, node: InlineSchema, path: StructuralPath): void {
    if (node.shape !== 'object' && node.shape !== 'composition') return;
    if (node.required.length === 0) return;
    const known = knownProperties(ctx, node);
    node.required.forEach((property, index) => {
        if (known.has(property)) return;
        ctx.report({
            kind: 'DanglingRequiredProperty',
            path: [...path, 'required', index],
            property,
            message: `Required property '${property}' is not defined in the schema's properties.`,
        });
    });
}

function checkTypes(ctx: ValidationContext, node: InlineSchema, path: StructuralPath): void {
    node.types.forEach((type, index) => {
        if (node.types.indexOf(type) === index) return;
        ctx.report({
            kind: 'DuplicateSchemaType',
            path: [...path, 'type', index],
            type,
            message: `Type '${type}' is listed more than once.`,
        });
    });
}

export function schemaVisitor(ctx: ValidationContext): WalkVisitor {
    return {
        schema(node, path) {
            if (!ctx.isActive('ignore-schema-errors')) return;

            if (node.shape === 'composition' && node.members.length === 0) {
                ctx.report({
                    kind: 'EmptyComposition',
                    path: [...path, node.keyword],
                    keyword: node.keyword,
                    message: `'${node.keyword}' must list at least one schema.`,
                });
            }
            if (node.discriminator && (node.shape === 'primitive' || node.shape === 'array')) {
                ctx.report({
                    kind: 'MisplacedDiscriminator',
                    path: [...path, 'discriminator'],
                    shape: node.shape,
                    message: `A discriminator is only allowed on object or composed schemas, found a ${node.shape} schema.`,
                });
            }
            checkTypes(ctx, node, path);
            checkRequired(ctx, node, path);
        },
    };
}
