import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Components that log under their own `component` binding.
 */
export type LogComponent = 'registry' | 'loader' | 'validator' | 'config' | 'cli';

let rootLogger: pino.Logger | null = null;
const children = new Map<LogComponent, pino.Logger>();

/**
 * Configure the root logger. Called once by the CLI after config resolution;
 * component loggers created earlier are rebuilt on next use.
 */
export function initLogger(options: { level?: LogLevel; jsonLogs?: boolean }): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    rootLogger = jsonLogs
        ? pino({ level })
        : pino({
              level,
              transport: {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'HH:MM:ss',
                      ignore: 'pid,hostname',
                  },
              },
          });
    children.clear();

    return rootLogger;
}

/**
 * Root logger, or a child bound to `component`.
 * Library callers that never call `initLogger()` get a warn-level JSON logger.
 */
export function getLogger(component?: LogComponent): pino.Logger {
    if (!rootLogger) {
        rootLogger = pino({ level: 'warn' });
    }
    if (!component) {
        return rootLogger;
    }

    let child = children.get(component);
    if (!child) {
        child = rootLogger.child({ component });
        children.set(component, child);
    }
    return child;
}
