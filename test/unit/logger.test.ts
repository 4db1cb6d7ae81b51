import { describe, it, expect } from 'vitest';
import { DEFAULT_LOG_LEVEL, parseLogLevel } from '../../src/core/logger.js';
import { LEVELS, captureLogger } from '../helpers.js';

describe('Logger', () => {
    describe('parseLogLevel', () => {
        it('should accept level names in any case', () => {
            expect(parseLogLevel('DEBUG')).toBe('debug');
            expect(parseLogLevel(' info ')).toBe('info');
        });

        it('should map aliases', () => {
            expect(parseLogLevel('warning')).toBe('warn');
            expect(parseLogLevel('panic')).toBe('fatal');
        });

        it('should reject anything else', () => {
            expect(parseLogLevel('loud')).toBeUndefined();
            expect(parseLogLevel('constructor')).toBeUndefined();
            expect(parseLogLevel(20)).toBeUndefined();
            expect(parseLogLevel(undefined)).toBeUndefined();
        });
    });

    it('should default to warn', () => {
        expect(DEFAULT_LOG_LEVEL).toBe('warn');
    });

    it('should write named JSON records', () => {
        const { logger, records } = captureLogger('info');
        logger.debug('hidden');
        logger.warn({ volumeID: 'vol-1' }, 'slow attach');

        expect(records).toHaveLength(1);
        expect(records[0]).toMatchObject({ level: LEVELS.warn, name: 'volctl', msg: 'slow attach', volumeID: 'vol-1' });
    });
});
