import type { ObjectShape, Shape } from '../types/index.js';
import { SelectionError, fail, ok, type Result } from '../selection/errors.js';
import { literal, nullable, objectShape } from './shape.js';

/**
 * Wraps a base collection shape in a paginated result envelope.
 */
export type EnvelopeBuilder = (baseShape: Shape) => Shape;

export type PageFlavor = 'offset' | 'keyset';

/**
 * Structural classification of a page parameter.
 * `ambiguous` when both flavors' distinguishing keys are present,
 * `none` when neither is.
 */
export type PageClassification = PageFlavor | 'ambiguous' | 'none';

const OFFSET_KEYS = ['offset', 'count'] as const;
const KEYSET_KEYS = ['after', 'before'] as const;
const PAGE_PATH = ['page'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a page parameter by the keys it carries. `limit` belongs to the
 * offset descriptor; on its own it selects offset paging.
 */
export function classifyPageParam(pageParam: unknown): PageClassification {
    if (!isPlainObject(pageParam)) return 'none';

    const has = (key: string): boolean => pageParam[key] !== undefined;
    const offset = OFFSET_KEYS.some(has);
    const keyset = KEYSET_KEYS.some(has);

    if (offset && keyset) return 'ambiguous';
    if (keyset) return 'keyset';
    if (offset || has('limit')) return 'offset';
    return 'none';
}

/**
 * Resolve the result shape of a read action from its page parameter.
 *
 * The flavors the action supports are the envelopes supplied. Without a
 * page parameter the bare collection is returned; with a single supported
 * flavor its envelope applies unconditionally; with both, the parameter's
 * keys decide, and a parameter matching neither or both is rejected.
 */
export function resolvePageShape(
    pageParam: unknown,
    baseShape: Shape,
    offsetEnvelope?: EnvelopeBuilder,
    keysetEnvelope?: EnvelopeBuilder
): Result<Shape> {
    if (pageParam === undefined || pageParam === null) {
        return ok(baseShape);
    }

    if (offsetEnvelope && !keysetEnvelope) return ok(offsetEnvelope(baseShape));
    if (keysetEnvelope && !offsetEnvelope) return ok(keysetEnvelope(baseShape));

    if (!offsetEnvelope || !keysetEnvelope) {
        return fail(
            new SelectionError('AmbiguousOrInvalidPagination', PAGE_PATH, {
                detail: 'action does not support pagination',
            })
        );
    }

    const flavor = classifyPageParam(pageParam);
    switch (flavor) {
        case 'offset':
            return ok(offsetEnvelope(baseShape));
        case 'keyset':
            return ok(keysetEnvelope(baseShape));
        case 'ambiguous':
            return fail(
                new SelectionError('AmbiguousOrInvalidPagination', PAGE_PATH, {
                    detail: 'both offset and keyset parameters given',
                })
            );
        case 'none':
            return fail(
                new SelectionError('AmbiguousOrInvalidPagination', PAGE_PATH, {
                    detail: 'expected offset (limit/offset/count) or keyset (after/before) parameters',
                })
            );
    }
}

/**
 * Default paginated result envelopes. In mixed mode (an action supporting
 * both flavors) each envelope also carries `count` and a `type` discriminant.
 */
export function createPageEnvelopes(options: { mixed?: boolean } = {}): {
    offset: EnvelopeBuilder;
    keyset: EnvelopeBuilder;
} {
    const mixed = options.mixed ?? false;
    const number: Shape = { kind: 'scalar', type: 'number' };
    const cursor: Shape = nullable({ kind: 'scalar', type: 'string' });

    const envelope = (flavor: PageFlavor, fields: Record<string, Shape>): ObjectShape =>
        objectShape(
            mixed
                ? { ...fields, count: nullable(number), type: literal([flavor]) }
                : fields
        );

    return {
        offset: (baseShape) =>
            envelope('offset', {
                results: baseShape,
                hasMore: { kind: 'scalar', type: 'boolean' },
                limit: number,
                offset: number,
            }),
        keyset: (baseShape) =>
            envelope('keyset', {
                results: baseShape,
                hasMore: { kind: 'scalar', type: 'boolean' },
                limit: number,
                after: cursor,
                before: cursor,
                previousPage: { kind: 'scalar', type: 'string' },
                nextPage: { kind: 'scalar', type: 'string' },
            }),
    };
}
