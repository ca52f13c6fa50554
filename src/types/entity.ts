/**
 * Scalar value types a primitive field, calculation argument or scalar
 * calculation can declare.
 */
export const SCALAR_TYPES = ['string', 'number', 'boolean', 'datetime', 'json', 'unknown'] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];

/**
 * Declared type of a primitive field (or of a scalar calculation / union member).
 */
export interface ScalarField {
    kind: 'scalar';
    type: ScalarType;
    nullable: boolean;
    array: boolean;
}

/**
 * A record type with primitive and complex fields.
 * `resource` is relational; `typedMap` is an embedded structured value.
 */
export interface RecordEntity {
    kind: 'resource' | 'typedMap';
    name: string;
    primitiveFields: ReadonlyMap<string, ScalarField>;
    complexFields: ReadonlyMap<string, FieldSpec>;
}

export interface Resource extends RecordEntity {
    kind: 'resource';
}

export interface TypedMap extends RecordEntity {
    kind: 'typedMap';
}

/**
 * One branch of a union. Only one variant is populated per value.
 */
export interface UnionVariant {
    tag: string;
    target: Resource | TypedMap | ScalarField;
    array: boolean;
}

export interface Union {
    kind: 'union';
    name: string;
    /** Discriminant field exposing the populated variant's tag, e.g. `type` */
    tagField?: string;
    variants: ReadonlyMap<string, UnionVariant>;
}

export type TypedEntity = Resource | TypedMap | Union;

/**
 * Declared calculation argument.
 */
export interface ArgField {
    type: ScalarType;
    nullable: boolean;
    required: boolean;
}

export type ArgSpec = ReadonlyMap<string, ArgField>;

export interface RelationshipField {
    kind: 'relationship';
    target: Resource;
    array: boolean;
    nullable: boolean;
}

export interface CalculationField {
    kind: 'calculation';
    returnType: TypedEntity | ScalarField;
    args?: ArgSpec;
    array: boolean;
    nullable: boolean;
}

export interface NestedMapField {
    kind: 'nestedMap';
    target: TypedMap;
    array: boolean;
    nullable: boolean;
}

export interface UnionFieldSpec {
    kind: 'union';
    target: Union;
    array: boolean;
    nullable: boolean;
}

export type FieldSpec = RelationshipField | CalculationField | NestedMapField | UnionFieldSpec;

export type FieldKind = FieldSpec['kind'];
