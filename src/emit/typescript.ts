import type { ScalarType, Shape } from '../types/index.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const SCALAR_TS: Record<ScalarType, string> = {
    string: 'string',
    number: 'number',
    boolean: 'boolean',
    datetime: 'string',
    json: 'Record<string, unknown>',
    unknown: 'unknown',
};

function renderKey(key: string): string {
    return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

/**
 * Render a shape as a single-line TypeScript type expression.
 *
 * ```ts
 * renderShape(project(todo, ['id', { author: ['name'] }]))
 * // => '{ id: string; author: { name: string } | null }'
 * ```
 */
export function renderShape(shape: Shape): string {
    switch (shape.kind) {
        case 'scalar':
            return SCALAR_TS[shape.type];
        case 'literal':
            return shape.values.length > 0
                ? shape.values.map((value) => JSON.stringify(value)).join(' | ')
                : 'never';
        case 'array':
            return `Array<${renderShape(shape.element)}>`;
        case 'nullable':
            return `${renderShape(shape.inner)} | null`;
        case 'calculated':
            return renderShape(shape.result);
        case 'object': {
            const entries = Object.entries(shape.fields);
            if (entries.length === 0) return '{}';
            const members = entries.map(([key, field]) => `${renderKey(key)}: ${renderShape(field)}`);
            return `{ ${members.join('; ')} }`;
        }
    }
}

/**
 * Render an exported type alias for a shape.
 */
export function emitTypeAlias(name: string, shape: Shape): string {
    if (!IDENTIFIER.test(name)) {
        throw new Error(`Invalid type alias name: ${name}`);
    }
    return `export type ${name} = ${renderShape(shape)};`;
}
