import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LogLevel, type ShapekitConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

const ConfigFileSchema = z
    .object({
        schema: z.string(),
        maxDepth: z.number().int().positive(),
        format: z.enum(['json', 'ts']),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

/**
 * Load configuration from shapekit.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<ShapekitConfig> | null> {
    const explorer = cosmiconfig('shapekit', {
        searchPlaces: ['shapekit.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger('config').warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger('config').debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger('config').warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<ShapekitConfig> {
    const config: Partial<ShapekitConfig> = {};

    const maxDepth = env['SHAPEKIT_MAX_DEPTH'];
    if (maxDepth) {
        const parsed = parseInt(maxDepth, 10);
        if (Number.isInteger(parsed) && parsed > 0) {
            config.maxDepth = parsed;
        } else {
            getLogger('config').warn({ maxDepth }, 'Ignoring invalid SHAPEKIT_MAX_DEPTH');
        }
    }

    const logLevel = env['SHAPEKIT_LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
        config.logLevel = logLevel;
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<ShapekitConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<ShapekitConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const file: Partial<ShapekitConfig> = fileConfig ?? {};

    // Per key, since CLI flags arrive as explicit undefineds
    return {
        schema: cliFlags.schema ?? envConfig.schema ?? file.schema ?? DEFAULT_CONFIG.schema,
        maxDepth: cliFlags.maxDepth ?? envConfig.maxDepth ?? file.maxDepth ?? DEFAULT_CONFIG.maxDepth,
        format: cliFlags.format ?? envConfig.format ?? file.format ?? DEFAULT_CONFIG.format,
        logLevel: cliFlags.logLevel ?? envConfig.logLevel ?? file.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? envConfig.jsonLogs ?? file.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
    };
}
