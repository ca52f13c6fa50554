/**
 * Barrel export for all shared types.
 */
export { SCALAR_TYPES } from './entity.js';
export type {
    ScalarType,
    ScalarField,
    RecordEntity,
    Resource,
    TypedMap,
    Union,
    UnionVariant,
    TypedEntity,
    ArgField,
    ArgSpec,
    RelationshipField,
    CalculationField,
    NestedMapField,
    UnionFieldSpec,
    FieldSpec,
    FieldKind,
} from './entity.js';
export type {
    ArgValue,
    ArgValues,
    CalculationSelection,
    ComplexSelection,
    SelectionValue,
    SelectionNode,
    Selection,
    SelectionPath,
} from './selection.js';
export type {
    Shape,
    ShapeKind,
    ScalarShape,
    LiteralShape,
    ObjectShape,
    ArrayShape,
    NullableShape,
    CalculatedShape,
} from './shape.js';
export { DEFAULT_CONFIG } from './config.js';
export type { ShapekitConfig, LogLevel, PaginationSupport, DescribeFormat } from './config.js';
