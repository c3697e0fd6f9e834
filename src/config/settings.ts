/**
 * @file Engine Settings Service
 *
 * Process-wide engine settings with central validation and deterministic
 * precedence (explicit override > env > defaults).
 *
 * @module config
 */

import type { LogLevel } from '../log/logger.js';

export interface EngineSettings {
    cache_maxEntries?: number;
    hash_maxEntries?: number;
    log_level?: LogLevel;
}

export interface ResolvedEngineSettings {
    cache_maxEntries: number;
    hash_maxEntries: number;
    log_level: LogLevel;
}

export type NumericSettingsKey = 'cache_maxEntries' | 'hash_maxEntries';
export type SettingsKey = keyof EngineSettings;

export type SettingSource = 'override' | 'env' | 'default';

interface NumericBounds {
    min: number;
    max: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const ENV_KEYS: Record<SettingsKey, string> = {
    cache_maxEntries: 'RAMIFY_CACHE_MAX_ENTRIES',
    hash_maxEntries: 'RAMIFY_HASH_MAX_ENTRIES',
    log_level: 'RAMIFY_LOG_LEVEL',
};

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private overrides: EngineSettings = {};
    private readonly defaults: ResolvedEngineSettings = {
        cache_maxEntries: 10000,
        hash_maxEntries: 50000,
        log_level: 'warn',
    };
    private readonly bounds: Record<NumericSettingsKey, NumericBounds> = {
        cache_maxEntries: { min: 1, max: 10_000_000 },
        hash_maxEntries: { min: 1, max: 10_000_000 },
    };

    constructor(private readonly env: Record<string, string | undefined> = process.env) {}

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
     * Return effective settings.
     */
    public snapshot(): ResolvedEngineSettings {
        return {
            cache_maxEntries: this.numeric_resolve('cache_maxEntries'),
            hash_maxEntries: this.numeric_resolve('hash_maxEntries'),
            log_level: this.logLevel_resolve(),
        };
    }

    /**
     * Set one setting with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: number | LogLevel } | { ok: false; error: string } {
        if (key === 'log_level') {
            const level: LogLevel | undefined = logLevel_parse(value);
            if (!level) {
                return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
            }
            this.overrides = { ...this.overrides, log_level: level };
            return { ok: true, value: level };
        }

        if (key !== 'cache_maxEntries' && key !== 'hash_maxEntries') {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }

        const parsed: number = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
        if (!Number.isFinite(parsed)) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }

        const clamped: number = this.value_clamp(key, Math.round(parsed));
        const next: EngineSettings = { ...this.overrides };
        next[key] = clamped;
        this.overrides = next;
        return { ok: true, value: clamped };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        const next: EngineSettings = { ...this.overrides };
        delete next[key];
        this.overrides = next;
    }

    /**
     * Resolve where the effective value of a setting comes from.
     */
    public source_get(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (key === 'log_level') {
            return logLevel_parse(this.env[ENV_KEYS[key]]) ? 'env' : 'default';
        }
        return typeof this.envNumeric_resolve(ENV_KEYS[key]) === 'number' ? 'env' : 'default';
    }

    private numeric_resolve(key: NumericSettingsKey): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number') {
            return this.value_clamp(key, override);
        }

        const envOverride: number | undefined = this.envNumeric_resolve(ENV_KEYS[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }

        return this.defaults[key];
    }

    private logLevel_resolve(): LogLevel {
        return this.overrides.log_level
            ?? logLevel_parse(this.env[ENV_KEYS.log_level])
            ?? this.defaults.log_level;
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.env[key];
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private value_clamp(key: NumericSettingsKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}

function logLevel_parse(value: unknown): LogLevel | undefined {
    if (typeof value !== 'string') return undefined;
    const normalized: string = value.trim().toLowerCase();
    return LOG_LEVELS.find((level: LogLevel): boolean => level === normalized);
}
