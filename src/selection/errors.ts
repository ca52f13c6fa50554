import type { SelectionPath } from '../types/index.js';

/**
 * Client-facing selection failures. All are detected before projection
 * and recur identically on retry.
 */
export type SelectionErrorKind =
    | 'UnknownPrimitiveField'
    | 'UnknownComplexField'
    | 'InvalidUnionVariant'
    | 'MissingCalculationArgs'
    | 'InvalidCalculationArgs'
    | 'AmbiguousOrInvalidPagination'
    | 'RecursionDepthExceeded'
    | 'DuplicateField'
    | 'EmptyFieldSelection'
    | 'InvalidFieldSelection'
    | 'InvalidSelection';

export interface SelectionErrorDetails {
    /** Offending field name (for unknown/duplicate/nesting errors) */
    name?: string;
    /** Offending union variant tag */
    tag?: string;
    /** Free-form detail appended to the message */
    detail?: string;
}

/**
 * Serialized form surfaced to clients by the request-handling layer.
 */
export interface SelectionErrorJson {
    type: string;
    message: string;
    path: string[];
    name?: string;
    tag?: string;
}

/**
 * Dotted location of the offending node, e.g. `author.profile.avatar`.
 */
export function formatPath(path: SelectionPath, leaf?: string): string {
    const parts = leaf === undefined ? [...path] : [...path, leaf];
    return parts.length > 0 ? parts.join('.') : '<root>';
}

function toSnakeCase(kind: string): string {
    return kind.replace(/([a-z])([A-Z])/g, '$1_$2').toLowerCase();
}

function describe(kind: SelectionErrorKind, path: SelectionPath, details: SelectionErrorDetails): string {
    const location = formatPath(path, details.name ?? details.tag);

    switch (kind) {
        case 'UnknownPrimitiveField':
            return `Unknown field '${location}'`;
        case 'UnknownComplexField':
            return `Unknown complex field '${location}'`;
        case 'InvalidUnionVariant':
            return `Unknown union member '${location}'`;
        case 'MissingCalculationArgs':
            return `Calculation '${location}' requires arguments`;
        case 'InvalidCalculationArgs':
            return `Invalid arguments for calculation '${location}'`;
        case 'AmbiguousOrInvalidPagination':
            return 'Invalid pagination parameter format';
        case 'RecursionDepthExceeded':
            return `Selection at '${location}' exceeds the maximum depth`;
        case 'DuplicateField':
            return `Field '${location}' was requested multiple times`;
        case 'EmptyFieldSelection':
            return path.length === 0 && details.name === undefined
                ? 'Fields array cannot be empty'
                : `Field '${location}' requires a field selection`;
        case 'InvalidFieldSelection':
            return `Field '${location}' does not support nested field selection`;
        case 'InvalidSelection':
            return `Invalid selection at '${location}'`;
    }
}

/**
 * Path-qualified selection error.
 */
export class SelectionError extends Error {
    public readonly fieldName?: string;
    public readonly tag?: string;

    constructor(
        public readonly kind: SelectionErrorKind,
        public readonly path: SelectionPath,
        details: SelectionErrorDetails = {}
    ) {
        const base = describe(kind, path, details);
        super(details.detail ? `${base}: ${details.detail}` : base);
        this.name = 'SelectionError';
        this.fieldName = details.name;
        this.tag = details.tag;
    }

    toJSON(): SelectionErrorJson {
        const json: SelectionErrorJson = {
            type: toSnakeCase(this.kind),
            message: this.message,
            path: [...this.path],
        };
        if (this.fieldName !== undefined) json.name = this.fieldName;
        if (this.tag !== undefined) json.tag = this.tag;
        return json;
    }
}

/**
 * Outcome of validation-style calls. Errors are returned, never thrown.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: SelectionError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T>(error: SelectionError): Result<T> {
    return { ok: false, error };
}
