import type {
    ArgSpec,
    ArgValues,
    CalculatedShape,
    FieldSpec,
    LiteralShape,
    ObjectShape,
    ScalarField,
    Shape,
} from '../types/index.js';

/**
 * Raised when projection meets input the validator would have rejected,
 * or when two contributions to the same key cannot be merged.
 */
export class ProjectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ProjectionError';
    }
}

export function objectShape(fields: Record<string, Shape>): ObjectShape {
    return { kind: 'object', fields };
}

export function arrayOf(element: Shape): Shape {
    return { kind: 'array', element };
}

export function nullable(inner: Shape): Shape {
    return inner.kind === 'nullable' ? inner : { kind: 'nullable', inner };
}

export function literal(values: readonly string[]): LiteralShape {
    return { kind: 'literal', values: [...values] };
}

/**
 * Shape of a declared primitive: the scalar, then array, then nullable.
 */
export function scalarShape(field: ScalarField): Shape {
    let shape: Shape = { kind: 'scalar', type: field.type };
    if (field.array) shape = arrayOf(shape);
    if (field.nullable) shape = nullable(shape);
    return shape;
}

/**
 * Apply a complex field's cardinality. Relationships and calculations
 * returning many values are never null; nested maps and unions may be.
 */
export function wrapField(shape: Shape, spec: FieldSpec): Shape {
    if (spec.array) {
        const many = arrayOf(shape);
        const nullableMany = spec.kind === 'nestedMap' || spec.kind === 'union';
        return spec.nullable && nullableMany ? nullable(many) : many;
    }
    return spec.nullable ? nullable(shape) : shape;
}

/**
 * Object shape of a calculation's declared arguments.
 */
export function argsShape(spec: ArgSpec): ObjectShape {
    const fields: Record<string, Shape> = {};
    for (const [name, arg] of spec) {
        fields[name] = scalarShape({ kind: 'scalar', type: arg.type, nullable: arg.nullable, array: false });
    }
    return objectShape(fields);
}

export function calculated(spec: ArgSpec, values: ArgValues, result: Shape): CalculatedShape {
    return { kind: 'calculated', args: argsShape(spec), values, result };
}

/**
 * Structural equality of two shapes; object key order is ignored.
 */
export function shapesEqual(a: Shape, b: Shape): boolean {
    switch (a.kind) {
        case 'scalar':
            return b.kind === 'scalar' && a.type === b.type;
        case 'literal':
            return (
                b.kind === 'literal' &&
                a.values.length === b.values.length &&
                a.values.every((value) => b.values.includes(value))
            );
        case 'array':
            return b.kind === 'array' && shapesEqual(a.element, b.element);
        case 'nullable':
            return b.kind === 'nullable' && shapesEqual(a.inner, b.inner);
        case 'object': {
            if (b.kind !== 'object') return false;
            const keys = Object.keys(a.fields);
            if (keys.length !== Object.keys(b.fields).length) return false;
            return keys.every((key) => {
                if (!Object.hasOwn(b.fields, key)) return false;
                const left = a.fields[key];
                const right = b.fields[key];
                return left !== undefined && right !== undefined && shapesEqual(left, right);
            });
        }
        case 'calculated':
            return (
                b.kind === 'calculated' &&
                shapesEqual(a.args, b.args) &&
                shapesEqual(a.result, b.result) &&
                JSON.stringify(a.values) === JSON.stringify(b.values)
            );
    }
}

function mergeAt(key: string, a: Shape, b: Shape): Shape {
    if (shapesEqual(a, b)) return a;

    if (a.kind === 'object' && b.kind === 'object') {
        return mergeShapes(a, b);
    }
    if (a.kind === 'array' && b.kind === 'array') {
        return arrayOf(mergeAt(key, a.element, b.element));
    }
    if (a.kind === 'nullable' && b.kind === 'nullable') {
        return nullable(mergeAt(key, a.inner, b.inner));
    }

    throw new ProjectionError(`Conflicting shapes for '${key}': ${a.kind} and ${b.kind}`);
}

/**
 * Key-wise union of two object shapes. Keys present on both sides are
 * merged recursively; contributions that cannot be reconciled throw.
 */
export function mergeShapes(a: ObjectShape, b: ObjectShape): ObjectShape {
    const fields: Record<string, Shape> = { ...a.fields };
    for (const [key, shape] of Object.entries(b.fields)) {
        const existing = Object.hasOwn(fields, key) ? fields[key] : undefined;
        fields[key] = existing === undefined ? shape : mergeAt(key, existing, shape);
    }
    return objectShape(fields);
}

export function mergeAll(shapes: readonly ObjectShape[]): ObjectShape {
    return shapes.reduce<ObjectShape>((acc, shape) => mergeShapes(acc, shape), objectShape({}));
}
