import { describe, it, expect } from 'vitest';
import { validate } from '../selection/validator.js';
import { SelectionError, formatPath, type Result } from '../selection/errors.js';
import type { Selection } from '../types/index.js';
import { calculation, relationship, resource } from '../schema/entity.js';
import { Content, Todo, User } from './fixtures.js';

const Team = resource('Team', { id: 'string' });
const Car = resource(
    'Car',
    { id: 'string', constructor: 'string' },
    {
        team: relationship(Team),
        label: calculation('string', { args: { toString: { type: 'string', required: false } } }),
    }
);

function errorOf(result: Result<Selection>): SelectionError {
    if (result.ok) {
        throw new Error('Expected selection to be rejected');
    }
    return result.error;
}

function managerChain(levels: number): unknown[] {
    return levels === 1 ? ['id'] : ['id', { manager: managerChain(levels - 1) }];
}

describe('Selection Validator', () => {
    describe('records', () => {
        it('should accept primitives and nested relationships', () => {
            const input = ['id', 'title', { author: ['name', { manager: ['email'] }] }];
            const result = validate(Todo, input);
            expect(result).toEqual({ ok: true, value: input });
        });

        it('should reject unknown primitive fields', () => {
            const error = errorOf(validate(Todo, ['id', 'nope']));
            expect(error.kind).toBe('UnknownPrimitiveField');
            expect(error.path).toEqual([]);
            expect(error.fieldName).toBe('nope');
            expect(error.message).toBe("Unknown field 'nope'");
        });

        it('should serialize errors for clients', () => {
            expect(errorOf(validate(Todo, ['nope'])).toJSON()).toEqual({
                type: 'unknown_primitive_field',
                message: "Unknown field 'nope'",
                path: [],
                name: 'nope',
            });
        });

        it('should require a field list for complex fields named as strings', () => {
            const error = errorOf(validate(Todo, ['author']));
            expect(error.kind).toBe('EmptyFieldSelection');
            expect(error.message).toBe("Field 'author' requires a field selection");
        });

        it('should reject unknown complex fields', () => {
            const error = errorOf(validate(Todo, [{ nope: ['id'] }]));
            expect(error.kind).toBe('UnknownComplexField');
            expect(error.message).toBe("Unknown complex field 'nope'");
        });

        it('should reject nested selection on a primitive', () => {
            const error = errorOf(validate(Todo, [{ title: ['length'] }]));
            expect(error.kind).toBe('InvalidFieldSelection');
            expect(error.message).toBe("Field 'title' does not support nested field selection");
        });

        it('should qualify errors with the path of the offending node', () => {
            const error = errorOf(validate(Todo, ['id', { author: ['id', { manager: ['nickname'] }] }]));
            expect(error.kind).toBe('UnknownPrimitiveField');
            expect(error.path).toEqual(['author', 'manager']);
            expect(error.message).toBe("Unknown field 'author.manager.nickname'");
        });

        it('should reject an empty root selection', () => {
            const error = errorOf(validate(Todo, []));
            expect(error.kind).toBe('EmptyFieldSelection');
            expect(error.message).toBe('Fields array cannot be empty');
        });

        it('should reject an empty nested selection', () => {
            const error = errorOf(validate(Todo, [{ author: [] }]));
            expect(error.kind).toBe('EmptyFieldSelection');
            expect(error.path).toEqual(['author']);
            expect(error.message).toBe("Field 'author' requires a field selection");
        });

        it('should reject input that is not a list', () => {
            const error = errorOf(validate(Todo, 'id'));
            expect(error.kind).toBe('InvalidSelection');
            expect(error.message).toBe("Invalid selection at '<root>': expected an array of fields");
        });

        it('should reject list elements that are neither names nor objects', () => {
            const error = errorOf(validate(Todo, ['id', 42]));
            expect(error.kind).toBe('InvalidSelection');
            expect(error.message).toBe("Invalid selection at '<root>': unsupported selection element 42");
        });

        it('should describe bigint elements without serializing them', () => {
            const error = errorOf(validate(Todo, ['id', 10n]));
            expect(error.kind).toBe('InvalidSelection');
            expect(error.message).toBe("Invalid selection at '<root>': unsupported selection element 10");
        });

        it('should reject cyclic array elements', () => {
            const cyclic: unknown[] = [];
            cyclic.push(cyclic);
            const error = errorOf(validate(Todo, ['id', cyclic]));
            expect(error.kind).toBe('InvalidSelection');
            expect(error.message).toBe("Invalid selection at '<root>': unsupported selection element array");
        });

        it('should point a bare scalar calculation name at its object form', () => {
            const plain = errorOf(validate(Todo, ['priorityScore']));
            expect(plain.kind).toBe('UnknownPrimitiveField');
            expect(plain.message).toBe("Unknown field 'priorityScore': calculation is selected as { priorityScore: {} }");

            const withArgs = errorOf(validate(Todo, ['localizedTitle']));
            expect(withArgs.message).toBe(
                "Unknown field 'localizedTitle': calculation is selected as { localizedTitle: { args: {...} } }"
            );
        });

        it('should accept fields named like Object.prototype members', () => {
            const input = ['constructor', { team: ['id'] }];
            expect(validate(Car, input)).toEqual({ ok: true, value: input });
        });

        it('should reject duplicate primitives', () => {
            const error = errorOf(validate(Todo, ['id', 'title', 'id']));
            expect(error.kind).toBe('DuplicateField');
            expect(error.message).toBe("Field 'id' was requested multiple times");
        });

        it('should reject a complex field requested in two objects', () => {
            const error = errorOf(validate(Todo, ['id', { author: ['id'] }, { author: ['name'] }]));
            expect(error.kind).toBe('DuplicateField');
            expect(error.fieldName).toBe('author');
        });
    });

    describe('depth limit', () => {
        it('should count the root list as depth one', () => {
            const error = errorOf(validate(Todo, ['id', { author: ['id', { manager: ['id'] }] }], { maxDepth: 2 }));
            expect(error.kind).toBe('RecursionDepthExceeded');
            expect(error.path).toEqual(['author', 'manager']);
            expect(error.message).toBe("Selection at 'author.manager' exceeds the maximum depth: limit is 2");
        });

        it('should allow cyclic selections up to the default limit', () => {
            expect(validate(User, managerChain(16)).ok).toBe(true);
            expect(errorOf(validate(User, managerChain(17))).kind).toBe('RecursionDepthExceeded');
        });
    });

    describe('nested maps', () => {
        it('should accept a primitive list on a flat nested map', () => {
            expect(validate(Todo, [{ addresses: ['street', 'city'] }]).ok).toBe(true);
        });

        it('should reject nested objects inside a flat nested map', () => {
            const error = errorOf(validate(Todo, [{ addresses: ['street', { geo: ['lat'] }] }]));
            expect(error.kind).toBe('InvalidFieldSelection');
            expect(error.message).toBe("Field 'addresses' does not support nested field selection");
        });

        it('should reject unknown fields on a flat nested map', () => {
            const error = errorOf(validate(Todo, [{ addresses: ['planet'] }]));
            expect(error.kind).toBe('UnknownPrimitiveField');
            expect(error.message).toBe("Unknown field 'addresses.planet'");
        });

        it('should recurse into nested maps with complex fields', () => {
            expect(validate(Todo, [{ metadata: ['category', { address: ['city'] }] }]).ok).toBe(true);
        });
    });

    describe('unions', () => {
        it('should accept the tag field and variant selections', () => {
            expect(validate(Todo, [{ content: ['type', { text: ['body'] }] }]).ok).toBe(true);
        });

        it('should normalize the single-member shorthand into a list', () => {
            expect(validate(Todo, [{ content: { text: ['body'] } }])).toEqual({
                ok: true,
                value: [{ content: [{ text: ['body'] }] }],
            });
        });

        it('should reject unknown variant names', () => {
            const error = errorOf(validate(Todo, [{ content: ['video'] }]));
            expect(error.toJSON()).toEqual({
                type: 'invalid_union_variant',
                message: "Unknown union member 'content.video'",
                path: ['content'],
                tag: 'video',
            });
        });

        it('should reject unknown variant keys', () => {
            const error = errorOf(validate(Todo, [{ content: [{ video: ['url'] }] }]));
            expect(error.kind).toBe('InvalidUnionVariant');
            expect(error.tag).toBe('video');
        });

        it('should require fields for an entity variant named as a string', () => {
            const error = errorOf(validate(Todo, [{ content: ['text'] }]));
            expect(error.kind).toBe('EmptyFieldSelection');
            expect(error.message).toBe("Field 'content.text' requires a field selection");
        });

        it('should accept scalar variants by name only', () => {
            expect(validate(Todo, [{ reminder: ['note', { images: ['url'] }] }]).ok).toBe(true);

            const error = errorOf(validate(Todo, [{ reminder: [{ note: ['length'] }] }]));
            expect(error.kind).toBe('InvalidFieldSelection');
            expect(error.message).toBe("Field 'reminder.note' does not support nested field selection");
        });

        it('should reject the tag name on a union without a tag field', () => {
            expect(errorOf(validate(Todo, [{ reminder: ['type'] }])).kind).toBe('InvalidUnionVariant');
        });

        it('should validate a union entity at the root', () => {
            expect(validate(Content, ['type', { image: ['url', 'width'] }]).ok).toBe(true);
        });
    });

    describe('calculations', () => {
        it('should accept a scalar calculation without arguments', () => {
            expect(validate(Todo, [{ priorityScore: {} }])).toEqual({
                ok: true,
                value: [{ priorityScore: {} }],
            });
        });

        it('should accept arguments and fields', () => {
            const input = [{ summary: { args: { maxLength: 50 }, fields: ['text'] } }];
            expect(validate(Todo, input)).toEqual({ ok: true, value: input });
        });

        it('should accept a plain list for an argument-less entity calculation', () => {
            expect(validate(Todo, [{ assignee: ['name'] }]).ok).toBe(true);
            expect(validate(Todo, [{ assignee: { fields: ['name'] } }]).ok).toBe(true);
        });

        it('should require arguments when any is required', () => {
            const error = errorOf(validate(Todo, [{ summary: { fields: ['text'] } }]));
            expect(error.kind).toBe('MissingCalculationArgs');
            expect(error.message).toBe("Calculation 'summary' requires arguments");
        });

        it('should reject arguments of the wrong type', () => {
            const error = errorOf(validate(Todo, [{ summary: { args: { maxLength: '50' }, fields: ['text'] } }]));
            expect(error.kind).toBe('InvalidCalculationArgs');
            expect(error.message).toBe(
                "Invalid arguments for calculation 'summary': argument 'maxLength' must be of type number"
            );
        });

        it('should reject undeclared arguments', () => {
            const error = errorOf(validate(Todo, [{ summary: { args: { maxLength: 5, extra: 1 }, fields: ['text'] } }]));
            expect(error.message).toBe("Invalid arguments for calculation 'summary': unknown argument 'extra'");
        });

        it('should honour argument nullability and requiredness', () => {
            expect(validate(Todo, [{ localizedTitle: { args: { locale: 'en', fallback: null } } }]).ok).toBe(true);

            const nullLocale = errorOf(validate(Todo, [{ localizedTitle: { args: { locale: null } } }]));
            expect(nullLocale.message).toBe(
                "Invalid arguments for calculation 'localizedTitle': argument 'locale' cannot be null"
            );

            const missing = errorOf(validate(Todo, [{ localizedTitle: { args: {} } }]));
            expect(missing.message).toBe(
                "Invalid arguments for calculation 'localizedTitle': missing required argument 'locale'"
            );
        });

        it('should not read omitted arguments from Object.prototype', () => {
            expect(validate(Car, [{ label: { args: {} } }])).toEqual({
                ok: true,
                value: [{ label: { args: {} } }],
            });
            expect(validate(Car, [{ label: { args: { toString: 'short' } } }])).toEqual({
                ok: true,
                value: [{ label: { args: { toString: 'short' } } }],
            });
        });

        it('should reject arguments on a calculation that takes none', () => {
            const error = errorOf(validate(Todo, [{ priorityScore: { args: { x: 1 } } }]));
            expect(error.kind).toBe('InvalidCalculationArgs');
            expect(error.message).toBe(
                "Invalid arguments for calculation 'priorityScore': calculation takes no arguments"
            );
        });

        it('should reject fields on a scalar calculation', () => {
            const error = errorOf(validate(Todo, [{ priorityScore: { fields: ['x'] } }]));
            expect(error.kind).toBe('InvalidFieldSelection');
            expect(error.path).toEqual(['priorityScore']);
        });

        it('should require fields on an entity calculation', () => {
            const error = errorOf(validate(Todo, [{ summary: { args: { maxLength: 5 } } }]));
            expect(error.kind).toBe('EmptyFieldSelection');
            expect(error.message).toBe("Field 'summary' requires a field selection");
        });

        it('should reject unexpected keys in a calculation selection', () => {
            const error = errorOf(
                validate(Todo, [{ summary: { args: { maxLength: 5 }, fields: ['text'], extra: true } }])
            );
            expect(error.message).toBe("Invalid selection at 'summary': unexpected key 'extra'");
        });

        it('should validate fields of the calculation result', () => {
            const error = errorOf(validate(Todo, [{ summary: { args: { maxLength: 5 }, fields: ['words'] } }]));
            expect(error.kind).toBe('UnknownPrimitiveField');
            expect(error.message).toBe("Unknown field 'summary.words'");
        });
    });

    describe('formatPath', () => {
        it('should join segments with dots', () => {
            expect(formatPath(['author', 'manager'], 'email')).toBe('author.manager.email');
            expect(formatPath([])).toBe('<root>');
        });
    });
});
