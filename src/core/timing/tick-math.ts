import { TimelineError } from '@core/errors';

const SECONDS_PER_MINUTE = 60;

function assertConversionInputs(resolution: number, bpm: number): void {
    if (!Number.isFinite(resolution) || resolution <= 0) {
        throw new TimelineError('ERR_INVALID_RESOLUTION', `Invalid resolution: ${resolution}`);
    }
    if (!Number.isFinite(bpm) || bpm <= 0) {
        throw new TimelineError('ERR_INVALID_TEMPO', `Invalid tempo: ${bpm}`);
    }
}

/** Seconds covered by `tickDelta` ticks at a constant tempo. */
export function tickDeltaToTime(tickDelta: number, resolution: number, bpm: number): number {
    assertConversionInputs(resolution, bpm);
    return (tickDelta / resolution) * (SECONDS_PER_MINUTE / bpm);
}

/**
 * Ticks covered by `timeDelta` seconds at a constant tempo, rounded to the nearest tick.
 * Lossy: a tick -> time -> tick round trip may drift by one tick.
 */
export function timeDeltaToTick(timeDelta: number, resolution: number, bpm: number): number {
    assertConversionInputs(resolution, bpm);
    return Math.round((timeDelta * bpm * resolution) / SECONDS_PER_MINUTE);
}

export function ticksBetweenToTime(startTick: number, endTick: number, resolution: number, bpm: number): number {
    return tickDeltaToTime(endTick - startTick, resolution, bpm);
}

export function timeBetweenToTicks(startTime: number, endTime: number, resolution: number, bpm: number): number {
    return timeDeltaToTick(endTime - startTime, resolution, bpm);
}
