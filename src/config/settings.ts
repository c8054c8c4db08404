/**
 * @file Engine Settings Service
 *
 * Runtime settings with central validation and deterministic precedence
 * (explicit override > env > defaults). Numeric settings are clamped to
 * their bounds; the log level is checked against the known levels.
 *
 * @module config
 */

import { z } from 'zod';
import type { LogLevel } from '../log/logger.js';

export interface EngineSettings {
    maxConcurrency: number;
    retryDelayMs: number;
    logLevel: LogLevel;
}

export type SettingsKey = keyof EngineSettings;

export type SettingSource = 'override' | 'env' | 'default';

type NumericKey = 'maxConcurrency' | 'retryDelayMs';

interface NumericBounds {
    min: number;
    max: number;
}

/** Environment variable read for each setting. */
export const SETTINGS_ENV: Record<SettingsKey, string> = {
    maxConcurrency: 'ASSETFLOW_MAX_CONCURRENCY',
    retryDelayMs: 'ASSETFLOW_RETRY_DELAY_MS',
    logLevel: 'ASSETFLOW_LOG_LEVEL',
};

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type SettingsEnv = Readonly<Record<string, string | undefined>>;

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private overrides: Partial<EngineSettings> = {};
    private readonly defaults: EngineSettings = {
        maxConcurrency: 4,
        retryDelayMs: 1000,
        logLevel: 'warn',
    };
    private readonly bounds: Record<NumericKey, NumericBounds> = {
        maxConcurrency: { min: 1, max: 64 },
        retryDelayMs: { min: 0, max: 600_000 },
    };

    /**
     * @param env - Environment to read; defaults to `process.env`
     */
    constructor(private readonly env: SettingsEnv = process.env) {}

    /**
     * Resolve process-global singleton.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Return the effective value of every setting.
     */
    public snapshot(): EngineSettings {
        return {
            maxConcurrency: this.numeric_resolve('maxConcurrency'),
            retryDelayMs: this.numeric_resolve('retryDelayMs'),
            logLevel: this.logLevel_resolve(),
        };
    }

    /**
     * Set one override with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: number | LogLevel } | { ok: false; error: string } {
        if (key === 'logLevel') {
            const parsed = LogLevelSchema.safeParse(value);
            if (!parsed.success) {
                return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
            }
            this.overrides = { ...this.overrides, logLevel: parsed.data };
            return { ok: true, value: parsed.data };
        }

        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        if (!Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_clamp(key, Math.round(parsed));
        const next: Partial<EngineSettings> = { ...this.overrides };
        next[key] = clamped;
        this.overrides = next;
        return { ok: true, value: clamped };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        const next: Partial<EngineSettings> = { ...this.overrides };
        delete next[key];
        this.overrides = next;
    }

    /**
     * Report where the effective value of a setting comes from.
     */
    public source(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (key === 'logLevel') {
            return this.envLogLevel_resolve() !== undefined ? 'env' : 'default';
        }
        return this.envNumeric_resolve(SETTINGS_ENV[key]) !== undefined ? 'env' : 'default';
    }

    private numeric_resolve(key: NumericKey): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number') {
            return override;
        }

        const envOverride: number | undefined = this.envNumeric_resolve(SETTINGS_ENV[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }

        return this.defaults[key];
    }

    private logLevel_resolve(): LogLevel {
        return this.overrides.logLevel ?? this.envLogLevel_resolve() ?? this.defaults.logLevel;
    }

    private envLogLevel_resolve(): LogLevel | undefined {
        const raw: string | undefined = this.env[SETTINGS_ENV.logLevel];
        if (!raw) return undefined;
        const parsed = LogLevelSchema.safeParse(raw.trim().toLowerCase());
        return parsed.success ? parsed.data : undefined;
    }

    private envNumeric_resolve(name: string): number | undefined {
        const envRaw: string | undefined = this.env[name];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(key: NumericKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}
