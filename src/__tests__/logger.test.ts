import { describe, it, expect, afterEach } from 'vitest';
import { getLogger, initLogger } from '../utils/logger.js';

describe('Logger', () => {
    afterEach(() => {
        initLogger({ level: 'warn', jsonLogs: true });
    });

    it('should bind the component on child loggers', () => {
        expect(getLogger('loader').bindings()).toEqual({ component: 'loader' });
    });

    it('should reuse component loggers', () => {
        expect(getLogger('cli')).toBe(getLogger('cli'));
    });

    it('should rebuild component loggers after initialization', () => {
        const before = getLogger('registry');
        initLogger({ level: 'debug', jsonLogs: true });
        const after = getLogger('registry');
        expect(after).not.toBe(before);
        expect(after.level).toBe('debug');
        expect(getLogger().level).toBe('debug');
    });
});
