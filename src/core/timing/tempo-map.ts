import { findClosestIndex, type TypedView } from './ordered-track';
import { tickDeltaToTime, timeDeltaToTick } from './tick-math';
import { tempoBpm, type SyncTrackEntry, type TempoMarker } from './types';

export type TempoMapProfileEvent = 'recompute' | 'tick-to-time' | 'time-to-tick' | 'ticks-batch' | 'times-batch';

export interface TempoMapProfiler {
    record(event: TempoMapProfileEvent, durationNanoseconds: number): void;
}

function now(): number {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return performance.now();
    }
    return Date.now();
}

// Negative and NaN inputs clamp to 0; +Infinity passes through and converts to +Infinity.
function clampToStart(value: number): number {
    return Number.isNaN(value) || value < 0 ? 0 : value;
}

/**
 * Last marker whose assigned time is <= `seconds`. Assigned times never decrease in tick order,
 * so a binary search is valid.
 */
function findTempoAtTime(markers: readonly TempoMarker[], seconds: number): TempoMarker {
    let lo = 0;
    let hi = markers.length - 1;
    let idx = 0;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        if (markers[mid].assignedTime <= seconds) {
            idx = mid;
            lo = mid + 1;
        } else {
            hi = mid - 1;
        }
    }
    return markers[idx];
}

/**
 * Tick -> seconds computed straight from a raw sync sequence, ignoring cached assigned times.
 * Use while a batch is open and the cache is stale.
 */
export function liveTickToTime(
    tick: number,
    resolution: number,
    initialTempo: TempoMarker,
    syncEntries: readonly SyncTrackEntry[]
): number {
    const target = clampToStart(tick);
    let time = 0;
    let previous = initialTempo;
    for (const entry of syncEntries) {
        if (entry.kind !== 'tempo') continue;
        if (entry.tick > target) break;
        time += tickDeltaToTime(entry.tick - previous.tick, resolution, tempoBpm(previous));
        previous = entry;
    }
    return time + tickDeltaToTime(target - previous.tick, resolution, tempoBpm(previous));
}

/**
 * Owns the derived assigned time of every tempo marker and converts between ticks and seconds.
 * The marker view always holds the tick-0 anchor, so lookups never come back empty.
 */
export class TempoMap {
    private readonly markers: TypedView<TempoMarker>;
    private readonly resolveResolution: () => number;
    private readonly profiler?: TempoMapProfiler;

    constructor(markers: TypedView<TempoMarker>, resolveResolution: () => number, profiler?: TempoMapProfiler) {
        this.markers = markers;
        this.resolveResolution = resolveResolution;
        this.profiler = profiler;
    }

    get tempoMarkers(): readonly TempoMarker[] {
        return this.markers.entries;
    }

    private profile<T>(event: TempoMapProfileEvent, fn: () => T): T {
        if (!this.profiler) {
            return fn();
        }
        const start = now();
        const result = fn();
        const durationMs = now() - start;
        this.profiler.record(event, durationMs * 1_000_000);
        return result;
    }

    /** Single forward pass: each marker's time is its predecessor's time plus the span at the predecessor's tempo. */
    recomputeAssignedTimes(): void {
        this.profile('recompute', () => {
            const markers = this.markers.entries;
            if (markers.length === 0) return;
            const resolution = this.resolveResolution();
            let previous = markers[0];
            previous.assignedTime = 0;
            for (let i = 1; i < markers.length; i += 1) {
                const marker = markers[i];
                marker.assignedTime =
                    previous.assignedTime + tickDeltaToTime(marker.tick - previous.tick, resolution, tempoBpm(previous));
                previous = marker;
            }
        });
    }

    /** Tempo marker in effect at `tick`. Ticks before the first marker clamp to it. */
    markerAtTick(tick: number): TempoMarker {
        const markers = this.markers.entries;
        let index = findClosestIndex(markers, tick);
        if (markers[index].tick > tick && index > 0) {
            index -= 1;
        }
        return markers[index];
    }

    private tickToTimeInternal(tick: number): number {
        const target = clampToStart(tick);
        const marker = this.markerAtTick(target);
        return marker.assignedTime + tickDeltaToTime(target - marker.tick, this.resolveResolution(), tempoBpm(marker));
    }

    private timeToTickInternal(time: number): number {
        const seconds = clampToStart(time);
        const marker = findTempoAtTime(this.markers.entries, seconds);
        return marker.tick + timeDeltaToTick(seconds - marker.assignedTime, this.resolveResolution(), tempoBpm(marker));
    }

    tickToTime(tick: number): number {
        return this.profile('tick-to-time', () => this.tickToTimeInternal(tick));
    }

    timeToTick(time: number): number {
        return this.profile('time-to-tick', () => this.timeToTickInternal(time));
    }

    ticksToTimeBatch(ticks: ArrayLike<number>): Float64Array {
        return this.profile('ticks-batch', () => {
            const result = new Float64Array(ticks.length);
            for (let i = 0; i < ticks.length; i += 1) {
                result[i] = this.tickToTimeInternal(ticks[i] ?? 0);
            }
            return result;
        });
    }

    timesToTickBatch(times: ArrayLike<number>): Float64Array {
        return this.profile('times-batch', () => {
            const result = new Float64Array(times.length);
            for (let i = 0; i < times.length; i += 1) {
                result[i] = this.timeToTickInternal(times[i] ?? 0);
            }
            return result;
        });
    }
}
