import type { DescribeFormat, PaginationSupport, Shape } from '../types/index.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { validate } from '../selection/validator.js';
import { project } from '../projection/projector.js';
import { arrayOf } from '../projection/shape.js';
import { createPageEnvelopes, resolvePageShape } from '../projection/pagination.js';
import { emitTypeAlias } from '../emit/typescript.js';

/**
 * Outcome of a CLI command: text for stdout, or an error for stderr.
 */
export type CommandOutput = { ok: true; output: string } | { ok: false; error: string };

export interface DescribeRequest {
    entity: string;
    selection: unknown;
    maxDepth: number;
    format: DescribeFormat;
    typeName?: string;
    pagination?: PaginationSupport;
    page?: unknown;
}

export function parseJsonArgument(value: string, label: string): unknown {
    try {
        return JSON.parse(value);
    } catch {
        throw new Error(`${label} must be valid JSON`);
    }
}

export function runValidate(
    registry: SchemaRegistry,
    entityName: string,
    selection: unknown,
    maxDepth: number
): CommandOutput {
    const result = validate(registry.resolve(entityName), selection, { maxDepth });
    if (!result.ok) {
        return { ok: false, error: JSON.stringify(result.error.toJSON()) };
    }
    return { ok: true, output: `Selection is valid for ${entityName}` };
}

export function runDescribe(registry: SchemaRegistry, request: DescribeRequest): CommandOutput {
    const entity = registry.resolve(request.entity);
    const validated = validate(entity, request.selection, { maxDepth: request.maxDepth });
    if (!validated.ok) {
        return { ok: false, error: JSON.stringify(validated.error.toJSON()) };
    }

    let shape: Shape = project(entity, validated.value);

    if (request.pagination) {
        const envelopes = createPageEnvelopes({ mixed: request.pagination === 'mixed' });
        const paged = resolvePageShape(
            request.page,
            arrayOf(shape),
            request.pagination === 'keyset' ? undefined : envelopes.offset,
            request.pagination === 'offset' ? undefined : envelopes.keyset
        );
        if (!paged.ok) {
            return { ok: false, error: JSON.stringify(paged.error.toJSON()) };
        }
        shape = paged.value;
    } else if (request.page !== undefined) {
        return { ok: false, error: '--page requires --pagination' };
    }

    if (request.format === 'json') {
        return { ok: true, output: JSON.stringify(shape, null, 2) };
    }
    return { ok: true, output: emitTypeAlias(request.typeName ?? `${entity.name}Result`, shape) };
}

export function runInspect(registry: SchemaRegistry): CommandOutput {
    const lines = ['', `📐 Schema: ${registry.entities().length} entities`, ''];

    for (const entity of registry.entities()) {
        if (entity.kind === 'union') {
            const tag = entity.tagField ? `, tag field '${entity.tagField}'` : '';
            lines.push(`  ${entity.name} (union): ${entity.variants.size} variants${tag}`);
        } else {
            lines.push(
                `  ${entity.name} (${entity.kind}): ${entity.primitiveFields.size} primitive, ` +
                    `${entity.complexFields.size} complex`
            );
        }
    }

    lines.push('');
    return { ok: true, output: lines.join('\n') };
}
