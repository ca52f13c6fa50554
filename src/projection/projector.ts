import type {
    CalculationField,
    CalculationSelection,
    ObjectShape,
    RecordEntity,
    Selection,
    SelectionNode,
    SelectionValue,
    Shape,
    TypedEntity,
    Union,
} from '../types/index.js';
import { isScalarField } from '../schema/entity.js';
import { validate, type ValidateOptions } from '../selection/validator.js';
import {
    ProjectionError,
    arrayOf,
    calculated,
    literal,
    mergeAll,
    nullable,
    objectShape,
    scalarShape,
    wrapField,
} from './shape.js';

function isSelectionList(value: SelectionValue): value is Selection {
    return Array.isArray(value);
}

function isCalculationSelection(value: SelectionValue): value is CalculationSelection {
    return !isSelectionList(value) && Object.keys(value).every((key) => key === 'args' || key === 'fields');
}

/**
 * Project a validated selection against an entity.
 *
 * Recursion follows the selection tree, never the schema graph, so cyclic
 * schemas terminate at the depth the client asked for.
 */
export function project(entity: TypedEntity, selection: Selection): ObjectShape {
    if (selection.length === 0) {
        throw new ProjectionError(`Empty selection for ${entity.name}`);
    }
    return entity.kind === 'union' ? projectUnion(entity, selection) : projectRecord(entity, selection);
}

/**
 * Validate then project. Throws the SelectionError of an invalid selection.
 */
export function describeProjection(
    entity: TypedEntity,
    input: unknown,
    options: ValidateOptions = {}
): ObjectShape {
    const result = validate(entity, input, options);
    if (!result.ok) {
        throw result.error;
    }
    return project(entity, result.value);
}

function primitive(entity: RecordEntity, name: string): Shape {
    const field = entity.primitiveFields.get(name);
    if (!field) {
        throw new ProjectionError(`Unknown primitive '${name}' on ${entity.name}`);
    }
    return scalarShape(field);
}

function projectRecord(entity: RecordEntity, selection: Selection): ObjectShape {
    // Base case: only primitives selected, nothing to recurse into
    if (selection.every((node): node is string => typeof node === 'string')) {
        const fields: Record<string, Shape> = {};
        for (const name of selection) {
            fields[name] = primitive(entity, name);
        }
        return objectShape(fields);
    }

    return mergeAll(selection.map((node) => projectRecordNode(entity, node)));
}

function projectRecordNode(entity: RecordEntity, node: SelectionNode): ObjectShape {
    if (typeof node === 'string') {
        return objectShape({ [node]: primitive(entity, node) });
    }

    const fields: Record<string, Shape> = {};
    for (const [key, value] of Object.entries(node)) {
        const spec = entity.complexFields.get(key);
        if (!spec) {
            throw new ProjectionError(`Unknown complex field '${key}' on ${entity.name}`);
        }

        switch (spec.kind) {
            case 'relationship':
            case 'nestedMap':
            case 'union':
                fields[key] = wrapField(project(spec.target, expectList(key, value)), spec);
                break;
            case 'calculation':
                fields[key] = projectCalculation(key, spec, value);
                break;
        }
    }
    return objectShape(fields);
}

function expectList(key: string, value: SelectionValue): Selection {
    if (!isSelectionList(value)) {
        throw new ProjectionError(`Expected a field list for '${key}'`);
    }
    return value;
}

function projectCalculation(key: string, spec: CalculationField, value: SelectionValue): Shape {
    const returnType = spec.returnType;

    if (isSelectionList(value)) {
        if (isScalarField(returnType)) {
            throw new ProjectionError(`Calculation '${key}' returns a scalar and takes no fields`);
        }
        return wrapField(project(returnType, value), spec);
    }

    if (!isCalculationSelection(value)) {
        throw new ProjectionError(`Expected { args, fields } for calculation '${key}'`);
    }

    let result: Shape;
    if (isScalarField(returnType)) {
        result = scalarShape(returnType);
    } else {
        if (!value.fields) {
            throw new ProjectionError(`Calculation '${key}' requires fields`);
        }
        result = project(returnType, value.fields);
    }
    result = wrapField(result, spec);

    if (spec.args && spec.args.size > 0) {
        return calculated(spec.args, value.args ?? {}, result);
    }
    return result;
}

/**
 * Tag field picks give the literal union of all tags; variant picks give
 * `variant | null` since only one variant is populated per value.
 * Unselected variants are absent.
 */
function projectUnion(union: Union, selection: Selection): ObjectShape {
    const contributions: ObjectShape[] = [];

    for (const node of selection) {
        if (typeof node === 'string') {
            contributions.push(objectShape({ [node]: projectUnionName(union, node) }));
            continue;
        }

        const fields: Record<string, Shape> = {};
        for (const [tag, sub] of Object.entries(node)) {
            const variant = union.variants.get(tag);
            if (!variant) {
                throw new ProjectionError(`Unknown variant '${tag}' on ${union.name}`);
            }
            if (isScalarField(variant.target)) {
                throw new ProjectionError(`Variant '${tag}' on ${union.name} takes no fields`);
            }
            const member = project(variant.target, expectList(tag, sub));
            fields[tag] = nullable(variant.array ? arrayOf(member) : member);
        }
        contributions.push(objectShape(fields));
    }

    return mergeAll(contributions);
}

function projectUnionName(union: Union, name: string): Shape {
    if (name === union.tagField) {
        return literal([...union.variants.keys()]);
    }

    const variant = union.variants.get(name);
    if (!variant || !isScalarField(variant.target)) {
        throw new ProjectionError(`'${name}' is not a tag or scalar variant of ${union.name}`);
    }
    const member = scalarShape(variant.target);
    return nullable(variant.array ? arrayOf(member) : member);
}
