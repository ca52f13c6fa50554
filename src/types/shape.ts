import type { ScalarType } from './entity.js';
import type { ArgValues } from './selection.js';

/**
 * Output shape descriptor produced by projecting a selection.
 * Consumed by the type emitter and, as a contract, by runtime extractors.
 */
export type Shape =
    | ScalarShape
    | LiteralShape
    | ObjectShape
    | ArrayShape
    | NullableShape
    | CalculatedShape;

export interface ScalarShape {
    kind: 'scalar';
    type: ScalarType;
}

/** Union of string literals, e.g. a union's tag values */
export interface LiteralShape {
    kind: 'literal';
    values: readonly string[];
}

export interface ObjectShape {
    kind: 'object';
    fields: Readonly<Record<string, Shape>>;
}

export interface ArrayShape {
    kind: 'array';
    element: Shape;
}

export interface NullableShape {
    kind: 'nullable';
    inner: Shape;
}

/**
 * Value of a calculation selected with arguments.
 * The data itself has the `result` shape; `args` and `values` record the
 * arguments it was computed from.
 */
export interface CalculatedShape {
    kind: 'calculated';
    args: ObjectShape;
    values: ArgValues;
    result: Shape;
}

export type ShapeKind = Shape['kind'];
