import type { GenerateLimits } from '@/types/map';

type EnvSource = Record<string, string | undefined>;

export interface AppConfig {
    limits: GenerateLimits;
    rateLimit: number;
    rateWindowMs: number;
    maxBodyBytes: number;
}

export const DEFAULT_CONFIG: AppConfig = {
    limits: {
        minWidth: 20,
        maxWidth: 240,
        minSupersample: 1,
        maxSupersample: 5,
        maxMargin: 12,
        minCharAspect: 1.0,
        maxCharAspect: 3.5,
    },
    rateLimit: 20,
    rateWindowMs: 60_000,
    maxBodyBytes: 64 * 1024,
};

const DURATION_UNITS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
};

/**
 * Parses `500ms`, `30s`, `1m`, `1h30m`, `1.5h` or a bare millisecond count.
 * Returns null when the text is not a duration.
 */
export function parseDuration(text: string): number | null {
    const value = text.trim();
    if (/^\d+$/.test(value)) {
        return Number(value);
    }

    const pattern = /(\d+(?:\.\d+)?)(ms|h|m|s)/y;
    let total = 0;
    let matched = false;
    while (pattern.lastIndex < value.length) {
        const match = pattern.exec(value);
        if (!match) {
            return null;
        }
        total += Number(match[1]) * DURATION_UNITS[match[2]];
        matched = true;
    }
    return matched ? total : null;
}

/** Renders a millisecond count the way durations are written in the logs: `1m0s`, `1.5s`, `250ms`. */
export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${ms}ms`;
    }
    const hours = Math.floor(ms / 3_600_000);
    const minutes = Math.floor((ms % 3_600_000) / 60_000);
    const seconds = (ms % 60_000) / 1000;
    if (hours > 0) {
        return `${hours}h${minutes}m${seconds}s`;
    }
    if (minutes > 0) {
        return `${minutes}m${seconds}s`;
    }
    return `${seconds}s`;
}

function readEnv(source: EnvSource, name: string): string | null {
    const raw = source[name]?.trim();
    return raw ? raw : null;
}

function warnFallback(kind: string, name: string, raw: string, fallback: string | number): void {
    console.warn(`[config] invalid ${kind} for ${name} (${JSON.stringify(raw)}), using fallback ${fallback}`);
}

function getEnvInt(source: EnvSource, name: string, fallback: number): number {
    const raw = readEnv(source, name);
    if (raw === null) return fallback;

    if (!/^[+-]?\d+$/.test(raw)) {
        warnFallback('integer', name, raw, fallback);
        return fallback;
    }
    return Number(raw);
}

function getEnvFloat(source: EnvSource, name: string, fallback: number): number {
    const raw = readEnv(source, name);
    if (raw === null) return fallback;

    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
        warnFallback('float', name, raw, fallback.toFixed(2));
        return fallback;
    }
    return parsed;
}

function getEnvDuration(source: EnvSource, name: string, fallback: number): number {
    const raw = readEnv(source, name);
    if (raw === null) return fallback;

    const parsed = parseDuration(raw);
    if (parsed === null) {
        warnFallback('duration', name, raw, formatDuration(fallback));
        return fallback;
    }
    return parsed;
}

/**
 * Reads the service configuration. Never throws: unset values fall back
 * silently, unparsable values warn and fall back.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
    const defaults = DEFAULT_CONFIG.limits;
    return {
        limits: {
            minWidth: getEnvInt(source, 'API_MIN_WIDTH', defaults.minWidth),
            maxWidth: getEnvInt(source, 'API_MAX_WIDTH', defaults.maxWidth),
            minSupersample: getEnvInt(source, 'API_MIN_SUPERSAMPLE', defaults.minSupersample),
            maxSupersample: getEnvInt(source, 'API_MAX_SUPERSAMPLE', defaults.maxSupersample),
            maxMargin: getEnvInt(source, 'API_MAX_MARGIN', defaults.maxMargin),
            minCharAspect: getEnvFloat(source, 'API_MIN_CHAR_ASPECT', defaults.minCharAspect),
            maxCharAspect: getEnvFloat(source, 'API_MAX_CHAR_ASPECT', defaults.maxCharAspect),
        },
        rateLimit: getEnvInt(source, 'API_RATE_LIMIT', DEFAULT_CONFIG.rateLimit),
        rateWindowMs: getEnvDuration(source, 'API_RATE_WINDOW', DEFAULT_CONFIG.rateWindowMs),
        maxBodyBytes: getEnvInt(source, 'API_MAX_BODY_BYTES', DEFAULT_CONFIG.maxBodyBytes),
    };
}

export function describeLimits(config: AppConfig): string {
    const { limits } = config;
    return (
        `limits: width=${limits.minWidth}..${limits.maxWidth} ` +
        `supersample=${limits.minSupersample}..${limits.maxSupersample} ` +
        `margin<=${limits.maxMargin} ` +
        `rate=${config.rateLimit}/${formatDuration(config.rateWindowMs)}`
    );
}
