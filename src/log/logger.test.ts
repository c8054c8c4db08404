/**
 * @file Logger Tests
 *
 * Level filtering, stream routing and child tags.
 *
 * @module log
 */

import { describe, it, expect } from 'vitest';
import { logger_create, logLevel_is, type LogSink } from './logger.js';

interface Captured {
    sink: LogSink;
    lines: Array<[string, string]>;
}

function capture(): Captured {
    const lines: Array<[string, string]> = [];
    return {
        lines,
        sink: {
            log: (text: unknown): void => {
                lines.push(['log', String(text)]);
            },
            warn: (text: unknown): void => {
                lines.push(['warn', String(text)]);
            },
            error: (text: unknown): void => {
                lines.push(['error', String(text)]);
            },
        },
    };
}

describe('log/logger', (): void => {

    it('should drop messages below the minimum level', (): void => {
        const { sink, lines } = capture();
        const logger = logger_create({ level: 'warn', sink });

        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e');

        expect(lines.map(([stream]: [string, string]): string => stream)).toEqual(['warn', 'error']);
        expect(lines[0][1]).toContain('[ASSETFLOW]');
        expect(lines[0][1].endsWith(' w')).toBe(true);
    });

    it('should route debug and info to log', (): void => {
        const { sink, lines } = capture();
        const logger = logger_create({ level: 'debug', sink });
        logger.debug('d');
        logger.info('i');
        expect(lines.map(([stream]: [string, string]): string => stream)).toEqual(['log', 'log']);
    });

    it('should append child tags and keep level and sink', (): void => {
        const { sink, lines } = capture();
        const child = logger_create({ level: 'info', sink }).child('ENGINE');

        child.debug('hidden');
        child.info('started');

        expect(lines).toHaveLength(1);
        expect(lines[0][1]).toContain('[ASSETFLOW][ENGINE]');
        expect(lines[0][1].endsWith(' started')).toBe(true);
    });

    it('should emit nothing when silent', (): void => {
        const { sink, lines } = capture();
        const logger = logger_create({ level: 'silent', sink });
        logger.error('e');
        expect(lines).toEqual([]);
    });

    it('should recognise level names', (): void => {
        expect(logLevel_is('warn')).toBe(true);
        expect(logLevel_is('silent')).toBe(true);
        expect(logLevel_is('verbose')).toBe(false);
    });
});
