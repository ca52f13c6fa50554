import { describe, it, expect } from 'vitest';
import { classifyPageParam, createPageEnvelopes, resolvePageShape } from '../projection/pagination.js';
import { arrayOf, literal, nullable, objectShape } from '../projection/shape.js';
import type { ScalarType, Shape } from '../types/index.js';

const s = (type: ScalarType): Shape => ({ kind: 'scalar', type });
const base = arrayOf(objectShape({ id: s('string') }));

describe('Pagination Shapes', () => {
    const { offset, keyset } = createPageEnvelopes();

    describe('classifyPageParam', () => {
        it('should classify by distinguishing keys', () => {
            expect(classifyPageParam({ limit: 10, offset: 20 })).toBe('offset');
            expect(classifyPageParam({ count: true })).toBe('offset');
            expect(classifyPageParam({ limit: 10, after: 'cursor-1' })).toBe('keyset');
            expect(classifyPageParam({ before: 'cursor-1' })).toBe('keyset');
            expect(classifyPageParam({ offset: 0, after: 'cursor-1' })).toBe('ambiguous');
        });

        it('should treat a lone limit as offset paging', () => {
            expect(classifyPageParam({ limit: 10 })).toBe('offset');
        });

        it('should classify anything without known keys as none', () => {
            expect(classifyPageParam({ size: 10 })).toBe('none');
            expect(classifyPageParam({ limit: undefined })).toBe('none');
            expect(classifyPageParam('page-2')).toBe('none');
            expect(classifyPageParam([])).toBe('none');
        });
    });

    describe('resolvePageShape', () => {
        it('should return the bare collection without a page parameter', () => {
            expect(resolvePageShape(undefined, base, offset, keyset)).toEqual({ ok: true, value: base });
            expect(resolvePageShape(null, base, offset, keyset)).toEqual({ ok: true, value: base });
        });

        it('should apply the only supported flavor unconditionally', () => {
            expect(resolvePageShape({ after: 'cursor-1' }, base, offset)).toEqual({ ok: true, value: offset(base) });
            expect(resolvePageShape({ offset: 5 }, base, undefined, keyset)).toEqual({
                ok: true,
                value: keyset(base),
            });
        });

        it('should pick the flavor from the parameter when both are supported', () => {
            expect(resolvePageShape({ limit: 10 }, base, offset, keyset)).toEqual({ ok: true, value: offset(base) });
            expect(resolvePageShape({ after: 'cursor-1' }, base, offset, keyset)).toEqual({
                ok: true,
                value: keyset(base),
            });
        });

        it('should reject a parameter carrying both flavors', () => {
            const result = resolvePageShape({ offset: 0, after: 'cursor-1' }, base, offset, keyset);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('AmbiguousOrInvalidPagination');
                expect(result.error.path).toEqual(['page']);
                expect(result.error.message).toBe(
                    'Invalid pagination parameter format: both offset and keyset parameters given'
                );
            }
        });

        it('should reject an empty parameter when both flavors are supported', () => {
            const result = resolvePageShape({}, base, offset, keyset);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('AmbiguousOrInvalidPagination');
                expect(result.error.path).toEqual(['page']);
            }
        });

        it('should reject a parameter matching neither flavor', () => {
            const result = resolvePageShape({ size: 10 }, base, offset, keyset);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.message).toBe(
                    'Invalid pagination parameter format: expected offset (limit/offset/count) or keyset (after/before) parameters'
                );
            }
        });

        it('should reject paging an action that supports none', () => {
            const result = resolvePageShape({ limit: 10 }, base);
            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.toJSON()).toEqual({
                    type: 'ambiguous_or_invalid_pagination',
                    message: 'Invalid pagination parameter format: action does not support pagination',
                    path: ['page'],
                });
            }
        });
    });

    describe('createPageEnvelopes', () => {
        it('should build the offset envelope', () => {
            expect(offset(base)).toEqual(
                objectShape({
                    results: base,
                    hasMore: s('boolean'),
                    limit: s('number'),
                    offset: s('number'),
                })
            );
        });

        it('should build the keyset envelope', () => {
            expect(keyset(base)).toEqual(
                objectShape({
                    results: base,
                    hasMore: s('boolean'),
                    limit: s('number'),
                    after: nullable(s('string')),
                    before: nullable(s('string')),
                    previousPage: s('string'),
                    nextPage: s('string'),
                })
            );
        });

        it('should add a count and a discriminant in mixed mode', () => {
            const mixed = createPageEnvelopes({ mixed: true });
            expect(mixed.offset(base)).toEqual(
                objectShape({
                    results: base,
                    hasMore: s('boolean'),
                    limit: s('number'),
                    offset: s('number'),
                    count: nullable(s('number')),
                    type: literal(['offset']),
                })
            );

            const page = mixed.keyset(base);
            expect(page.kind === 'object' && page.fields['type']).toEqual(literal(['keyset']));
        });
    });
});
