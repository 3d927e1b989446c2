import { describe, it, expect } from 'vitest';
import { readTimelineConfig, STANDARD_BEAT_RESOLUTION, STANDARD_BPM } from '../timelineConfig';

describe('readTimelineConfig', () => {
    it('falls back to the standard defaults', () => {
        expect(readTimelineConfig({})).toEqual({
            defaultResolution: STANDARD_BEAT_RESOLUTION,
            defaultBpm: STANDARD_BPM,
            debug: false,
        });
    });

    it('reads overrides from the environment', () => {
        const config = readTimelineConfig({
            TIMELINE_DEFAULT_RESOLUTION: '480.4',
            TIMELINE_DEFAULT_BPM: '96.5',
            TIMELINE_DEBUG: 'yes',
        });
        expect(config).toEqual({ defaultResolution: 480, defaultBpm: 96.5, debug: true });
    });

    it('ignores invalid numbers', () => {
        const config = readTimelineConfig({ TIMELINE_DEFAULT_RESOLUTION: '-10', TIMELINE_DEFAULT_BPM: 'fast' });
        expect(config.defaultResolution).toBe(192);
        expect(config.defaultBpm).toBe(120);
    });

    it('accepts the verbose flag as a debug alias', () => {
        expect(readTimelineConfig({ TIMELINE_VERBOSE_LOGS: 'on' }).debug).toBe(true);
        expect(readTimelineConfig({ TIMELINE_DEBUG: 'off', TIMELINE_VERBOSE_LOGS: 'on' }).debug).toBe(false);
        expect(readTimelineConfig({ TIMELINE_DEBUG: 'maybe' }).debug).toBe(false);
    });
});
