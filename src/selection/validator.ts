import type {
    ArgSpec,
    ArgValue,
    ArgValues,
    CalculationField,
    FieldSpec,
    RecordEntity,
    Resource,
    ScalarType,
    Selection,
    SelectionNode,
    SelectionPath,
    SelectionValue,
    TypedEntity,
    TypedMap,
    Union,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { hasComplexFields, isScalarField } from '../schema/entity.js';
import { getLogger } from '../utils/logger.js';
import { SelectionError, fail, ok, type Result } from './errors.js';

export interface ValidateOptions {
    /** Maximum nesting of selection lists, root list included */
    maxDepth?: number;
}

interface Context {
    maxDepth: number;
}

const CALCULATION_KEYS = new Set(['args', 'fields']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a client selection against an entity.
 *
 * Fails closed: the first invalid node short-circuits with a path-qualified
 * error. On success the returned selection is the typed, normalized input
 * (union shorthand objects become one-element lists).
 */
export function validate(
    entity: TypedEntity,
    input: unknown,
    options: ValidateOptions = {}
): Result<Selection> {
    const ctx: Context = { maxDepth: options.maxDepth ?? DEFAULT_CONFIG.maxDepth };

    try {
        return ok(selectionList(ctx, entity, input, [], 1));
    } catch (error) {
        if (error instanceof SelectionError) {
            getLogger('validator').debug({ entity: entity.name, error: error.toJSON() }, 'Selection rejected');
            return fail(error);
        }
        throw error;
    }
}

function expectList(ctx: Context, input: unknown, path: SelectionPath, depth: number): readonly unknown[] {
    if (depth > ctx.maxDepth) {
        throw new SelectionError('RecursionDepthExceeded', path, { detail: `limit is ${ctx.maxDepth}` });
    }
    if (!Array.isArray(input)) {
        throw new SelectionError('InvalidSelection', path, { detail: 'expected an array of fields' });
    }
    const items: readonly unknown[] = input;
    if (items.length === 0) {
        throw new SelectionError('EmptyFieldSelection', path);
    }
    checkForDuplicates(items, path);
    return items;
}

function describeElement(item: unknown): string {
    if (item === null) return 'null';
    if (Array.isArray(item)) return 'array';
    switch (typeof item) {
        case 'number':
        case 'boolean':
        case 'bigint':
            return String(item);
        default:
            return typeof item;
    }
}

function checkForDuplicates(items: readonly unknown[], path: SelectionPath): void {
    const seen = new Set<string>();
    for (const item of items) {
        let names: string[];
        if (typeof item === 'string') {
            names = [item];
        } else if (isPlainObject(item)) {
            names = Object.keys(item);
        } else {
            throw new SelectionError('InvalidSelection', path, {
                detail: `unsupported selection element ${describeElement(item)}`,
            });
        }

        for (const name of names) {
            if (seen.has(name)) {
                throw new SelectionError('DuplicateField', path, { name });
            }
            seen.add(name);
        }
    }
}

function selectionList(
    ctx: Context,
    entity: TypedEntity,
    input: unknown,
    path: SelectionPath,
    depth: number
): Selection {
    const items = expectList(ctx, input, path, depth);
    return entity.kind === 'union'
        ? unionList(ctx, entity, items, path, depth)
        : recordList(ctx, entity, items, path, depth);
}

function recordList(
    ctx: Context,
    entity: RecordEntity,
    items: readonly unknown[],
    path: SelectionPath,
    depth: number
): Selection {
    const nodes: SelectionNode[] = [];

    for (const item of items) {
        if (typeof item === 'string') {
            if (!entity.primitiveFields.has(item)) {
                throw bareComplexFieldError(entity.complexFields.get(item), item, path);
            }
            nodes.push(item);
            continue;
        }

        if (!isPlainObject(item) || Object.keys(item).length === 0) {
            throw new SelectionError('InvalidSelection', path, { detail: 'empty field object' });
        }

        const node: Record<string, SelectionValue> = {};
        for (const [key, value] of Object.entries(item)) {
            const spec = entity.complexFields.get(key);
            if (!spec) {
                throw new SelectionError(
                    entity.primitiveFields.has(key) ? 'InvalidFieldSelection' : 'UnknownComplexField',
                    path,
                    { name: key }
                );
            }
            node[key] = fieldValue(ctx, spec, value, [...path, key], depth);
        }
        nodes.push(node);
    }

    return nodes;
}

/**
 * Error for a bare string that is not a primitive. Scalar calculations name
 * the object form they are selected with.
 */
function bareComplexFieldError(spec: FieldSpec | undefined, name: string, path: SelectionPath): SelectionError {
    if (!spec) {
        return new SelectionError('UnknownPrimitiveField', path, { name });
    }
    if (spec.kind === 'calculation' && isScalarField(spec.returnType)) {
        const form = spec.args && spec.args.size > 0 ? `{ ${name}: { args: {...} } }` : `{ ${name}: {} }`;
        return new SelectionError('UnknownPrimitiveField', path, {
            name,
            detail: `calculation is selected as ${form}`,
        });
    }
    return new SelectionError('EmptyFieldSelection', path, { name });
}

function fieldValue(
    ctx: Context,
    spec: FieldSpec,
    value: unknown,
    path: SelectionPath,
    depth: number
): SelectionValue {
    switch (spec.kind) {
        case 'relationship':
            return selectionList(ctx, spec.target, value, path, depth + 1);
        case 'nestedMap':
            return hasComplexFields(spec.target)
                ? selectionList(ctx, spec.target, value, path, depth + 1)
                : flatList(ctx, spec.target, value, path, depth + 1);
        case 'union':
            // `{ variant: [...] }` is shorthand for `[{ variant: [...] }]`
            return selectionList(ctx, spec.target, isPlainObject(value) ? [value] : value, path, depth + 1);
        case 'calculation':
            return calculationValue(ctx, spec, value, path, depth);
    }
}

/**
 * A flat embedded record is a leaf: its selection names primitives only and
 * is never re-entered as a nested selection.
 */
function flatList(
    ctx: Context,
    target: Resource | TypedMap,
    value: unknown,
    path: SelectionPath,
    depth: number
): Selection {
    const items = expectList(ctx, value, path, depth);
    const names: string[] = [];

    for (const item of items) {
        if (typeof item !== 'string') {
            throw new SelectionError('InvalidFieldSelection', path);
        }
        if (!target.primitiveFields.has(item)) {
            throw new SelectionError('UnknownPrimitiveField', path, { name: item });
        }
        names.push(item);
    }

    return names;
}

function unionList(
    ctx: Context,
    target: Union,
    items: readonly unknown[],
    path: SelectionPath,
    depth: number
): Selection {
    const nodes: SelectionNode[] = [];

    for (const item of items) {
        if (typeof item === 'string') {
            if (item !== target.tagField) {
                const variant = target.variants.get(item);
                if (!variant) {
                    throw new SelectionError('InvalidUnionVariant', path, { tag: item });
                }
                if (!isScalarField(variant.target)) {
                    throw new SelectionError('EmptyFieldSelection', path, { name: item });
                }
            }
            nodes.push(item);
            continue;
        }

        if (!isPlainObject(item) || Object.keys(item).length === 0) {
            throw new SelectionError('InvalidSelection', path, { detail: 'empty union member object' });
        }

        const node: Record<string, SelectionValue> = {};
        for (const [tag, sub] of Object.entries(item)) {
            const variant = target.variants.get(tag);
            if (!variant) {
                throw new SelectionError('InvalidUnionVariant', path, { tag });
            }
            const member = variant.target;
            if (isScalarField(member)) {
                throw new SelectionError('InvalidFieldSelection', path, { name: tag });
            }
            const memberPath = [...path, tag];
            node[tag] = hasComplexFields(member)
                ? selectionList(ctx, member, sub, memberPath, depth + 1)
                : flatList(ctx, member, sub, memberPath, depth + 1);
        }
        nodes.push(node);
    }

    return nodes;
}

function calculationValue(
    ctx: Context,
    spec: CalculationField,
    value: unknown,
    path: SelectionPath,
    depth: number
): SelectionValue {
    const returnType = spec.returnType;

    // Arg-less calculations returning an entity also take a plain list
    if (Array.isArray(value) && !isScalarField(returnType) && (!spec.args || spec.args.size === 0)) {
        return selectionList(ctx, returnType, value, path, depth + 1);
    }

    if (!isPlainObject(value)) {
        throw new SelectionError('InvalidSelection', path, { detail: 'expected { args, fields }' });
    }
    for (const key of Object.keys(value)) {
        if (!CALCULATION_KEYS.has(key)) {
            throw new SelectionError('InvalidSelection', path, { detail: `unexpected key '${key}'` });
        }
    }

    const selection: { args?: ArgValues; fields?: Selection } = {};
    const args = value['args'];

    if (spec.args && spec.args.size > 0) {
        if (args === undefined) {
            if ([...spec.args.values()].some((arg) => arg.required)) {
                throw new SelectionError('MissingCalculationArgs', path);
            }
            selection.args = {};
        } else {
            selection.args = validateArgs(spec.args, args, path);
        }
    } else if (args !== undefined && (!isPlainObject(args) || Object.keys(args).length > 0)) {
        throw new SelectionError('InvalidCalculationArgs', path, { detail: 'calculation takes no arguments' });
    }

    const fields = value['fields'];
    if (isScalarField(returnType)) {
        if (fields !== undefined) {
            throw new SelectionError('InvalidFieldSelection', path);
        }
    } else {
        if (fields === undefined) {
            throw new SelectionError('EmptyFieldSelection', path);
        }
        selection.fields = selectionList(ctx, returnType, fields, path, depth + 1);
    }

    return selection;
}

function validateArgs(spec: ArgSpec, raw: unknown, path: SelectionPath): ArgValues {
    if (!isPlainObject(raw)) {
        throw new SelectionError('InvalidCalculationArgs', path, { detail: 'args must be an object' });
    }

    for (const key of Object.keys(raw)) {
        if (!spec.has(key)) {
            throw new SelectionError('InvalidCalculationArgs', path, { detail: `unknown argument '${key}'` });
        }
    }

    const args: Record<string, ArgValue> = {};
    for (const [name, arg] of spec) {
        const supplied = Object.hasOwn(raw, name) ? raw[name] : undefined;
        if (supplied === undefined) {
            if (arg.required) {
                throw new SelectionError('InvalidCalculationArgs', path, {
                    detail: `missing required argument '${name}'`,
                });
            }
            continue;
        }

        const converted = toArgValue(supplied);
        if (converted === undefined) {
            throw new SelectionError('InvalidCalculationArgs', path, {
                detail: `argument '${name}' is not a JSON value`,
            });
        }
        if (converted === null) {
            if (!arg.nullable) {
                throw new SelectionError('InvalidCalculationArgs', path, {
                    detail: `argument '${name}' cannot be null`,
                });
            }
        } else if (!matchesScalar(arg.type, converted)) {
            throw new SelectionError('InvalidCalculationArgs', path, {
                detail: `argument '${name}' must be of type ${arg.type}`,
            });
        }
        args[name] = converted;
    }

    return args;
}

function toArgValue(value: unknown): ArgValue | undefined {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (Array.isArray(value)) {
        const items: ArgValue[] = [];
        for (const item of value) {
            const converted = toArgValue(item);
            if (converted === undefined) return undefined;
            items.push(converted);
        }
        return items;
    }
    if (isPlainObject(value)) {
        const entries: Record<string, ArgValue> = {};
        for (const [key, item] of Object.entries(value)) {
            const converted = toArgValue(item);
            if (converted === undefined) return undefined;
            entries[key] = converted;
        }
        return entries;
    }
    return undefined;
}

function matchesScalar(type: ScalarType, value: ArgValue): boolean {
    switch (type) {
        case 'string':
            return typeof value === 'string';
        case 'number':
            return typeof value === 'number';
        case 'boolean':
            return typeof value === 'boolean';
        case 'datetime':
            return typeof value === 'string' && !Number.isNaN(Date.parse(value));
        case 'json':
        case 'unknown':
            return true;
    }
}
