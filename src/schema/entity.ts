import type {
    ArgField,
    ArgSpec,
    CalculationField,
    FieldSpec,
    NestedMapField,
    RecordEntity,
    RelationshipField,
    Resource,
    ScalarField,
    ScalarType,
    TypedEntity,
    TypedMap,
    Union,
    UnionFieldSpec,
    UnionVariant,
} from '../types/index.js';

type FieldOptions = { array?: boolean; nullable?: boolean };
type PrimitiveInput = ScalarType | ScalarField;
type ComplexInput<E> = Record<string, FieldSpec> | ((self: E) => Record<string, FieldSpec>);

export function scalar(type: ScalarType, options: FieldOptions = {}): ScalarField {
    return {
        kind: 'scalar',
        type,
        nullable: options.nullable ?? false,
        array: options.array ?? false,
    };
}

function toPrimitiveMap(primitives: Record<string, PrimitiveInput>): Map<string, ScalarField> {
    return new Map(
        Object.entries(primitives).map(([name, field]) => [
            name,
            typeof field === 'string' ? scalar(field) : field,
        ])
    );
}

function buildRecord<E extends RecordEntity>(
    entity: E & { complexFields: Map<string, FieldSpec> },
    complex: ComplexInput<E>
): E {
    const fields = typeof complex === 'function' ? complex(entity) : complex;
    for (const [name, spec] of Object.entries(fields)) {
        entity.complexFields.set(name, spec);
    }
    return entity;
}

/**
 * Build a Resource. Pass `complex` as a function of the resource itself
 * to declare self-referential relationships.
 */
export function resource(
    name: string,
    primitives: Record<string, PrimitiveInput>,
    complex: ComplexInput<Resource> = {}
): Resource {
    return buildRecord<Resource>(
        {
            kind: 'resource',
            name,
            primitiveFields: toPrimitiveMap(primitives),
            complexFields: new Map(),
        },
        complex
    );
}

export function typedMap(
    name: string,
    primitives: Record<string, PrimitiveInput>,
    complex: ComplexInput<TypedMap> = {}
): TypedMap {
    return buildRecord<TypedMap>(
        {
            kind: 'typedMap',
            name,
            primitiveFields: toPrimitiveMap(primitives),
            complexFields: new Map(),
        },
        complex
    );
}

export function union(
    name: string,
    variants: Record<string, Resource | TypedMap | ScalarField | { target: Resource | TypedMap | ScalarField; array: boolean }>,
    options: { tagField?: string } = {}
): Union {
    const entries = Object.entries(variants).map(([tag, variant]): [string, UnionVariant] => {
        if ('target' in variant) {
            return [tag, { tag, target: variant.target, array: variant.array }];
        }
        return [tag, { tag, target: variant, array: false }];
    });

    return {
        kind: 'union',
        name,
        tagField: options.tagField,
        variants: new Map(entries),
    };
}

export function relationship(target: Resource, options: FieldOptions = {}): RelationshipField {
    return { kind: 'relationship', target, array: options.array ?? false, nullable: options.nullable ?? false };
}

export function nestedMap(target: TypedMap, options: FieldOptions = {}): NestedMapField {
    return { kind: 'nestedMap', target, array: options.array ?? false, nullable: options.nullable ?? false };
}

export function unionField(target: Union, options: FieldOptions = {}): UnionFieldSpec {
    return { kind: 'union', target, array: options.array ?? false, nullable: options.nullable ?? false };
}

export function calculation(
    returnType: TypedEntity | ScalarField | ScalarType,
    options: FieldOptions & { args?: Record<string, Partial<ArgField> & { type: ScalarType }> } = {}
): CalculationField {
    let args: ArgSpec | undefined;
    if (options.args) {
        args = new Map(
            Object.entries(options.args).map(([name, arg]): [string, ArgField] => [
                name,
                { type: arg.type, nullable: arg.nullable ?? false, required: arg.required ?? true },
            ])
        );
    }

    return {
        kind: 'calculation',
        returnType: typeof returnType === 'string' ? scalar(returnType) : returnType,
        args,
        array: options.array ?? false,
        nullable: options.nullable ?? false,
    };
}

export function isScalarField(value: TypedEntity | ScalarField): value is ScalarField {
    return value.kind === 'scalar';
}

export function isRecordEntity(entity: TypedEntity): entity is Resource | TypedMap {
    return entity.kind === 'resource' || entity.kind === 'typedMap';
}

/**
 * Names selectable as bare strings on an entity: primitive fields for
 * records; the tag field plus every variant tag for unions.
 */
export function primitiveFieldNames(entity: TypedEntity): ReadonlySet<string> {
    if (entity.kind === 'union') {
        const names = new Set(entity.variants.keys());
        if (entity.tagField !== undefined) names.add(entity.tagField);
        return names;
    }
    return new Set(entity.primitiveFields.keys());
}

export function hasComplexFields(entity: TypedEntity): boolean {
    return entity.kind === 'union' || entity.complexFields.size > 0;
}

/**
 * Entities directly referenced by an entity's fields or variants.
 */
export function referencedEntities(entity: TypedEntity): TypedEntity[] {
    if (entity.kind === 'union') {
        return [...entity.variants.values()]
            .map((variant) => variant.target)
            .filter((target): target is Resource | TypedMap => target.kind !== 'scalar');
    }

    const refs: TypedEntity[] = [];
    for (const spec of entity.complexFields.values()) {
        if (spec.kind === 'calculation') {
            if (!isScalarField(spec.returnType)) refs.push(spec.returnType);
        } else {
            refs.push(spec.target);
        }
    }
    return refs;
}
