import type { TypedEntity } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { referencedEntities } from './entity.js';

/**
 * Fatal schema problem: duplicate names, dangling references, invariant
 * violations, or lookups of unknown entities. Raised at initialization,
 * never as a request-time condition.
 */
export class SchemaError extends Error {
    constructor(
        message: string,
        public readonly entity?: string
    ) {
        super(message);
        this.name = 'SchemaError';
    }
}

function checkInvariants(entity: TypedEntity): void {
    if (entity.kind === 'union') {
        if (entity.variants.size === 0) {
            throw new SchemaError(`Union ${entity.name} declares no variants`, entity.name);
        }
        for (const [tag, variant] of entity.variants) {
            if (variant.tag !== tag) {
                throw new SchemaError(
                    `Union ${entity.name} maps tag '${tag}' to a variant tagged '${variant.tag}'`,
                    entity.name
                );
            }
        }
        if (entity.tagField !== undefined && entity.variants.has(entity.tagField)) {
            throw new SchemaError(
                `Union ${entity.name} tag field '${entity.tagField}' collides with a variant tag`,
                entity.name
            );
        }
        return;
    }

    for (const name of entity.complexFields.keys()) {
        if (entity.primitiveFields.has(name)) {
            throw new SchemaError(
                `Field '${name}' on ${entity.name} is declared both primitive and complex`,
                entity.name
            );
        }
    }
}

/**
 * Named TypedEntity registry. Written once during initialization, then
 * frozen and read-only.
 */
export class SchemaRegistry {
    private readonly byName = new Map<string, TypedEntity>();
    private frozen = false;

    register(entity: TypedEntity): void {
        if (this.frozen) {
            throw new SchemaError(`Cannot register ${entity.name}: registry is frozen`, entity.name);
        }
        if (this.byName.has(entity.name)) {
            throw new SchemaError(`Duplicate entity name: ${entity.name}`, entity.name);
        }

        checkInvariants(entity);
        this.byName.set(entity.name, entity);
        getLogger('registry').debug({ entity: entity.name, kind: entity.kind }, 'Registered entity');
    }

    resolve(name: string): TypedEntity {
        const entity = this.byName.get(name);
        if (!entity) {
            throw new SchemaError(`Unknown entity: ${name}`, name);
        }
        return entity;
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    entities(): TypedEntity[] {
        return [...this.byName.values()];
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Verify every referenced entity is the registered one, then reject
     * further registration.
     */
    freeze(): void {
        if (this.frozen) return;

        for (const entity of this.byName.values()) {
            for (const ref of referencedEntities(entity)) {
                if (this.byName.get(ref.name) !== ref) {
                    throw new SchemaError(
                        `${entity.name} references unregistered entity ${ref.name}`,
                        entity.name
                    );
                }
            }
        }

        this.frozen = true;
        getLogger('registry').info({ entities: this.byName.size }, 'Schema registry frozen');
    }
}

let defaultRegistry: SchemaRegistry | null = null;

/**
 * Process-wide registry used by the module-level `register`/`resolve`.
 */
export function getRegistry(): SchemaRegistry {
    if (!defaultRegistry) {
        defaultRegistry = new SchemaRegistry();
    }
    return defaultRegistry;
}

/**
 * Drop the process-wide registry. Intended for tests.
 */
export function resetRegistry(): void {
    defaultRegistry = null;
}

export function register(entity: TypedEntity): void {
    getRegistry().register(entity);
}

export function resolve(name: string): TypedEntity {
    return getRegistry().resolve(name);
}
