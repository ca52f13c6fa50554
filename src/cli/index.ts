#!/usr/bin/env node
import { Command, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { loadSchemaFile } from '../schema/loader.js';
import { SchemaRegistry } from '../schema/registry.js';
import {
    parseJsonArgument,
    runDescribe,
    runInspect,
    runValidate,
    type CommandOutput,
} from './commands.js';
import type { DescribeFormat, LogLevel, PaginationSupport, ShapekitConfig } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOptions {
    schema?: string;
    maxDepth?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface SelectOptions extends CommonOptions {
    entity: string;
    select: string;
}

interface DescribeOptions extends SelectOptions {
    format?: DescribeFormat;
    typeName?: string;
    pagination?: PaginationSupport;
    page?: string;
}

const program = new Command();

program
    .name('shapekit')
    .description('Validate field selections against a typed entity schema and describe the result shape.')
    .version(VERSION);

async function setup(opts: CommonOptions & { format?: DescribeFormat }): Promise<{
    config: ShapekitConfig;
    registry: SchemaRegistry;
}> {
    const maxDepth = opts.maxDepth === undefined ? undefined : parseInt(opts.maxDepth, 10);
    if (maxDepth !== undefined && !(Number.isInteger(maxDepth) && maxDepth > 0)) {
        throw new Error('--max-depth must be a positive integer');
    }

    const cliConfig: Partial<ShapekitConfig> = {
        schema: opts.schema,
        maxDepth,
        format: opts.format,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };

    const config = await resolveConfig(cliConfig);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    if (!config.schema) {
        throw new Error('No schema file given: pass --schema or set "schema" in shapekit.config.json');
    }

    const registry = await loadSchemaFile(config.schema, new SchemaRegistry());
    return { config, registry };
}

function report(result: CommandOutput): void {
    if (result.ok) {
        console.log(result.output);
    } else {
        console.error(result.error);
        process.exitCode = 1;
    }
}

function fail(label: string, error: unknown): void {
    getLogger('cli').error({ error }, `${label} failed`);
    console.error(`${label} failed:`, error instanceof Error ? error.message : error);
    process.exitCode = 1;
}

const commonOptions = (command: Command): Command =>
    command
        .option('-s, --schema <path>', 'Schema document (JSON)')
        .option('--max-depth <n>', 'Maximum selection depth')
        .addOption(
            new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error'])
        )
        .option('--json-logs', 'Output JSON logs');

// ─── VALIDATE command ─────────────────────────────────────

commonOptions(program.command('validate'))
    .description('Validate a selection against an entity')
    .requiredOption('-e, --entity <name>', 'Entity name')
    .requiredOption('--select <json>', 'Selection as a JSON array')
    .action(async (opts: SelectOptions) => {
        try {
            const { config, registry } = await setup(opts);
            const selection = parseJsonArgument(opts.select, '--select');
            report(runValidate(registry, opts.entity, selection, config.maxDepth));
        } catch (error) {
            fail('Validate', error);
        }
    });

// ─── DESCRIBE command ─────────────────────────────────────

commonOptions(program.command('describe'))
    .description('Describe the result shape of a selection')
    .requiredOption('-e, --entity <name>', 'Entity name')
    .requiredOption('--select <json>', 'Selection as a JSON array')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['ts', 'json']))
    .option('--type-name <name>', 'Name of the emitted type alias')
    .addOption(
        new Option('--pagination <support>', 'Pagination the action supports').choices([
            'offset',
            'keyset',
            'mixed',
        ])
    )
    .option('--page <json>', 'Page parameter as JSON')
    .action(async (opts: DescribeOptions) => {
        try {
            const { config, registry } = await setup(opts);
            report(
                runDescribe(registry, {
                    entity: opts.entity,
                    selection: parseJsonArgument(opts.select, '--select'),
                    maxDepth: config.maxDepth,
                    format: config.format,
                    typeName: opts.typeName,
                    pagination: opts.pagination,
                    page: opts.page === undefined ? undefined : parseJsonArgument(opts.page, '--page'),
                })
            );
        } catch (error) {
            fail('Describe', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

commonOptions(program.command('inspect'))
    .description('List the entities of a schema document')
    .action(async (opts: CommonOptions) => {
        try {
            const { registry } = await setup(opts);
            report(runInspect(registry));
        } catch (error) {
            fail('Inspect', error);
        }
    });

await program.parseAsync();
