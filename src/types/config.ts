/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Pagination flavors an action can support.
 */
export type PaginationSupport = 'offset' | 'keyset' | 'mixed';

/**
 * Output format of the `describe` command.
 */
export type DescribeFormat = 'json' | 'ts';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ShapekitConfig {
    // Input
    schema?: string;

    // Validation
    maxDepth: number;

    // Output
    format: DescribeFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ShapekitConfig = {
    maxDepth: 16,
    format: 'ts',
    logLevel: 'info',
    jsonLogs: false,
};
