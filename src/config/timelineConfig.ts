import type { EnvSource } from '@utils/env';

export const STANDARD_BEAT_RESOLUTION = 192;
export const STANDARD_BPM = 120;

export interface TimelineConfig {
    /** Ticks per beat used when a timeline is created without an explicit resolution. */
    defaultResolution: number;
    defaultBpm: number;
    debug: boolean;
}

function normalizeBoolean(raw: unknown, fallback: boolean): boolean {
    if (raw === undefined || raw === null) return fallback;
    if (typeof raw === 'boolean') return raw;
    if (typeof raw === 'number') return raw !== 0;
    if (typeof raw === 'string') {
        const normalized = raw.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    }
    return fallback;
}

function normalizePositiveNumber(raw: unknown, fallback: number): number {
    if (typeof raw === 'number' && Number.isFinite(raw) && raw > 0) return raw;
    if (typeof raw === 'string' && raw.trim().length) {
        const parsed = Number(raw);
        if (Number.isFinite(parsed) && parsed > 0) return parsed;
    }
    return fallback;
}

export function readTimelineConfig(env: EnvSource): TimelineConfig {
    const debugRaw = env.TIMELINE_DEBUG ?? env.TIMELINE_VERBOSE_LOGS;
    return {
        defaultResolution: Math.round(
            normalizePositiveNumber(env.TIMELINE_DEFAULT_RESOLUTION, STANDARD_BEAT_RESOLUTION)
        ),
        defaultBpm: normalizePositiveNumber(env.TIMELINE_DEFAULT_BPM, STANDARD_BPM),
        debug: normalizeBoolean(debugRaw, false),
    };
}
