// Resolution (ticks per beat) helpers. A timeline's resolution only changes through an explicit rescale.
import { readTimelineConfig } from '@config/timelineConfig';
import { TimelineError } from '@core/errors';
import { processEnv } from '@utils/env';

/** Resolution used when a timeline is created without one. Reads TIMELINE_DEFAULT_RESOLUTION. */
export function getDefaultResolution(): number {
    return readTimelineConfig(processEnv()).defaultResolution;
}

export function assertValidResolution(resolution: number): void {
    if (!Number.isFinite(resolution) || resolution <= 0) {
        throw new TimelineError('ERR_INVALID_RESOLUTION', `Invalid resolution: ${resolution}`);
    }
}

export function beatsToTicks(beats: number, resolution: number): number {
    return Math.round(beats * resolution);
}

export function ticksToBeats(ticks: number, resolution: number): number {
    return ticks / resolution;
}

/** Factor that maps ticks at `resolution` onto ticks at `targetResolution`. */
export function resolutionScaleRatio(resolution: number, targetResolution: number): number {
    assertValidResolution(targetResolution);
    return targetResolution / resolution;
}
