import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type {
    ArgField,
    FieldSpec,
    Resource,
    ScalarField,
    TypedEntity,
    TypedMap,
    Union,
    UnionVariant,
} from '../types/index.js';
import { SCALAR_TYPES } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { scalar } from './entity.js';
import { SchemaError, SchemaRegistry, getRegistry } from './registry.js';

const ScalarTypeSchema = z.enum(SCALAR_TYPES);

const ScalarFieldSchema = z.union([
    ScalarTypeSchema,
    z.object({
        type: ScalarTypeSchema,
        nullable: z.boolean().default(false),
        array: z.boolean().default(false),
    }),
]);

const cardinality = {
    array: z.boolean().default(false),
    nullable: z.boolean().default(false),
};

const ArgSchema = z.object({
    type: ScalarTypeSchema,
    nullable: z.boolean().default(false),
    required: z.boolean().default(true),
});

const ReturnSchema = z.union([
    z.object({ entity: z.string() }).strict(),
    z.object({ scalar: ScalarFieldSchema }).strict(),
]);

const ComplexFieldSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('relationship'), target: z.string(), ...cardinality }),
    z.object({ kind: z.literal('nestedMap'), target: z.string(), ...cardinality }),
    z.object({ kind: z.literal('union'), target: z.string(), ...cardinality }),
    z.object({
        kind: z.literal('calculation'),
        returns: ReturnSchema,
        args: z.record(ArgSchema).optional(),
        ...cardinality,
    }),
]);

const recordShape = {
    primitives: z.record(ScalarFieldSchema).default({}),
    complex: z.record(ComplexFieldSchema).default({}),
};

const VariantSchema = z.union([
    z.object({ entity: z.string(), array: z.boolean().default(false) }).strict(),
    z.object({ scalar: ScalarFieldSchema, array: z.boolean().default(false) }).strict(),
]);

const EntitySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('resource'), ...recordShape }),
    z.object({ kind: z.literal('typedMap'), ...recordShape }),
    z.object({
        kind: z.literal('union'),
        tagField: z.string().optional(),
        variants: z.record(VariantSchema),
    }),
]);

/**
 * JSON schema document, as produced by a reflection collaborator that walks
 * the backend's resource definitions.
 */
export const SchemaDocumentSchema = z.object({
    entities: z.record(EntitySchema),
});

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;
type ScalarInput = z.infer<typeof ScalarFieldSchema>;

/**
 * Validate raw JSON against the schema document format.
 */
export function parseSchemaDocument(json: unknown): SchemaDocument {
    const result = SchemaDocumentSchema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new SchemaError(`Invalid schema document: ${issues}`);
    }
    return result.data;
}

function toScalar(input: ScalarInput): ScalarField {
    return typeof input === 'string' ? scalar(input) : scalar(input.type, input);
}

type Allocated =
    | { entity: Resource | TypedMap; complex: Map<string, FieldSpec> }
    | { entity: Union; variants: Map<string, UnionVariant> };

/**
 * Build the entity graph of a document. Entities are allocated first and
 * linked second, so references may form cycles.
 */
export function buildEntities(document: SchemaDocument): TypedEntity[] {
    const allocated = new Map<string, Allocated>();

    for (const [name, def] of Object.entries(document.entities)) {
        if (def.kind === 'union') {
            const variants = new Map<string, UnionVariant>();
            allocated.set(name, {
                entity: { kind: 'union', name, tagField: def.tagField, variants },
                variants,
            });
            continue;
        }

        const primitiveFields = new Map(
            Object.entries(def.primitives).map(([field, input]): [string, ScalarField] => [field, toScalar(input)])
        );
        const complex = new Map<string, FieldSpec>();
        const entity: Resource | TypedMap =
            def.kind === 'resource'
                ? { kind: 'resource', name, primitiveFields, complexFields: complex }
                : { kind: 'typedMap', name, primitiveFields, complexFields: complex };
        allocated.set(name, { entity, complex });
    }

    const lookup = (ref: string, from: string): TypedEntity => {
        const target = allocated.get(ref);
        if (!target) {
            throw new SchemaError(`${from} references unknown entity ${ref}`, from);
        }
        return target.entity;
    };

    const expectRecord = (ref: string, from: string): Resource | TypedMap => {
        const target = lookup(ref, from);
        if (target.kind === 'union') {
            throw new SchemaError(`${from} expects ${ref} to be a resource or typed map`, from);
        }
        return target;
    };

    for (const [name, def] of Object.entries(document.entities)) {
        const slot = allocated.get(name);
        if (!slot) continue;

        if (def.kind === 'union') {
            if (!('variants' in slot)) continue;
            for (const [tag, variant] of Object.entries(def.variants)) {
                const target =
                    'entity' in variant ? expectRecord(variant.entity, `${name}.${tag}`) : toScalar(variant.scalar);
                slot.variants.set(tag, { tag, target, array: variant.array });
            }
            continue;
        }

        if (!('complex' in slot)) continue;
        for (const [field, spec] of Object.entries(def.complex)) {
            const from = `${name}.${field}`;
            const { array, nullable } = spec;

            switch (spec.kind) {
                case 'relationship': {
                    const target = lookup(spec.target, from);
                    if (target.kind !== 'resource') {
                        throw new SchemaError(`${from} must target a resource, got ${target.kind}`, name);
                    }
                    slot.complex.set(field, { kind: 'relationship', target, array, nullable });
                    break;
                }
                case 'nestedMap': {
                    const target = lookup(spec.target, from);
                    if (target.kind !== 'typedMap') {
                        throw new SchemaError(`${from} must target a typed map, got ${target.kind}`, name);
                    }
                    slot.complex.set(field, { kind: 'nestedMap', target, array, nullable });
                    break;
                }
                case 'union': {
                    const target = lookup(spec.target, from);
                    if (target.kind !== 'union') {
                        throw new SchemaError(`${from} must target a union, got ${target.kind}`, name);
                    }
                    slot.complex.set(field, { kind: 'union', target, array, nullable });
                    break;
                }
                case 'calculation': {
                    const returnType =
                        'entity' in spec.returns ? lookup(spec.returns.entity, from) : toScalar(spec.returns.scalar);
                    const args = spec.args
                        ? new Map<string, ArgField>(Object.entries(spec.args))
                        : undefined;
                    slot.complex.set(field, { kind: 'calculation', returnType, args, array, nullable });
                    break;
                }
            }
        }
    }

    return [...allocated.values()].map((slot) => slot.entity);
}

/**
 * Read a schema document from disk, register every entity and freeze the
 * registry.
 */
export async function loadSchemaFile(
    path: string,
    registry: SchemaRegistry = getRegistry()
): Promise<SchemaRegistry> {
    const raw = await readFile(path, 'utf-8');

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new SchemaError(`Schema file ${path} is not valid JSON: ${String(error)}`);
    }

    const entities = buildEntities(parseSchemaDocument(json));
    for (const entity of entities) {
        registry.register(entity);
    }
    registry.freeze();

    getLogger('loader').info({ path, entities: entities.length }, 'Loaded schema');
    return registry;
}
