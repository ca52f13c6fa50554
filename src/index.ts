/**
 * shapekit: selection validation and result-shape projection over a
 * typed entity schema.
 */
export * from './types/index.js';
export {
    scalar,
    resource,
    typedMap,
    union,
    relationship,
    nestedMap,
    unionField,
    calculation,
    primitiveFieldNames,
    hasComplexFields,
} from './schema/entity.js';
export {
    SchemaError,
    SchemaRegistry,
    getRegistry,
    resetRegistry,
    register,
    resolve,
} from './schema/registry.js';
export { parseSchemaDocument, buildEntities, loadSchemaFile } from './schema/loader.js';
export type { SchemaDocument } from './schema/loader.js';
export { SelectionError, formatPath } from './selection/errors.js';
export type { SelectionErrorKind, SelectionErrorJson, Result } from './selection/errors.js';
export { validate } from './selection/validator.js';
export type { ValidateOptions } from './selection/validator.js';
export { project, describeProjection } from './projection/projector.js';
export { ProjectionError, mergeShapes, shapesEqual } from './projection/shape.js';
export { resolvePageShape, classifyPageParam, createPageEnvelopes } from './projection/pagination.js';
export type { EnvelopeBuilder, PageFlavor, PageClassification } from './projection/pagination.js';
export { renderShape, emitTypeAlias } from './emit/typescript.js';
export { initLogger, getLogger } from './utils/logger.js';
export type { LogComponent } from './utils/logger.js';
export { resolveConfig } from './utils/config.js';
