/**
 * @file Settings Tests
 *
 * @module config
 */

import { describe, it, expect } from 'vitest';
import { SettingsService } from './settings.js';

describe('SettingsService', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const service = new SettingsService({});
        expect(service.snapshot()).toEqual({ maxConcurrency: 4, retryDelayMs: 1000, logLevel: 'warn' });
        expect(service.source('maxConcurrency')).toBe('default');
    });

    it('reads and clamps environment values', (): void => {
        const service = new SettingsService({
            ASSETFLOW_MAX_CONCURRENCY: '500',
            ASSETFLOW_RETRY_DELAY_MS: '250',
            ASSETFLOW_LOG_LEVEL: 'DEBUG',
        });
        expect(service.snapshot()).toEqual({ maxConcurrency: 64, retryDelayMs: 250, logLevel: 'debug' });
        expect(service.source('retryDelayMs')).toBe('env');
        expect(service.source('logLevel')).toBe('env');
    });

    it('ignores unparseable environment values', (): void => {
        const service = new SettingsService({
            ASSETFLOW_MAX_CONCURRENCY: 'lots',
            ASSETFLOW_LOG_LEVEL: 'loud',
        });
        expect(service.snapshot().maxConcurrency).toBe(4);
        expect(service.snapshot().logLevel).toBe('warn');
        expect(service.source('logLevel')).toBe('default');
    });

    it('applies overrides above env with clamping', (): void => {
        const service = new SettingsService({ ASSETFLOW_MAX_CONCURRENCY: '8' });
        const result = service.set('maxConcurrency', 0);

        expect(result).toEqual({ ok: true, value: 1 });
        expect(service.snapshot().maxConcurrency).toBe(1);
        expect(service.source('maxConcurrency')).toBe('override');
    });

    it('supports unsetting an override', (): void => {
        const service = new SettingsService({ ASSETFLOW_MAX_CONCURRENCY: '8' });
        service.set('maxConcurrency', 2);
        service.unset('maxConcurrency');
        expect(service.snapshot().maxConcurrency).toBe(8);
    });

    it('rejects invalid values', (): void => {
        const service = new SettingsService({});
        expect(service.set('retryDelayMs', 'nope').ok).toBe(false);
        expect(service.set('logLevel', 'verbose').ok).toBe(false);
        expect(service.set('logLevel', 'error')).toEqual({ ok: true, value: 'error' });
    });
});
