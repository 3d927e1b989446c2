import { describe, expect, it } from 'vitest';
import { OrderedTrack } from '../ordered-track';
import { TempoMap, liveTickToTime, type TempoMapProfileEvent, type TempoMapProfiler } from '../tempo-map';
import {
    SYNC_TRACK_KINDS,
    createBeatMarker,
    createTempoMarker,
    createTimeSignatureMarker,
    type SyncTrackEntry,
} from '../types';

function setup(resolution: number, markers: Array<[number, number]>, profiler?: TempoMapProfiler) {
    const track = new OrderedTrack<SyncTrackEntry>({
        name: 'sync',
        kinds: SYNC_TRACK_KINDS,
        anchoredKinds: ['tempo', 'time-signature'],
    });
    const view = track.declareView('tempo');
    for (const [tick, bpm] of markers) {
        track.insert(createTempoMarker(tick, bpm));
    }
    track.insert(createTimeSignatureMarker(0));
    track.refreshTypedViews();
    const map = new TempoMap(view, () => resolution, profiler);
    map.recomputeAssignedTimes();
    return { track, view, map };
}

describe('TempoMap', () => {
    it('assigns times with a single forward pass', () => {
        const { view } = setup(192, [
            [0, 120],
            [384, 60],
            [576, 240],
        ]);
        expect(view.entries.map((marker) => marker.assignedTime)).toEqual([0, 1, 2]);
    });

    it('maps ticks to seconds across tempo changes', () => {
        const { map } = setup(192, [
            [0, 120],
            [384, 60],
        ]);
        expect(map.tickToTime(0)).toBe(0);
        expect(map.tickToTime(192)).toBe(0.5);
        expect(map.tickToTime(384)).toBe(1);
        expect(map.tickToTime(576)).toBe(2);
    });

    it('maps seconds to ticks and clamps negative time', () => {
        const { map } = setup(192, [
            [0, 120],
            [384, 60],
        ]);
        expect(map.timeToTick(-3)).toBe(0);
        expect(map.timeToTick(0.5)).toBe(192);
        expect(map.timeToTick(1)).toBe(384);
        expect(map.timeToTick(2.5)).toBe(672);
    });

    it('clamps out-of-range inputs to the start of the timeline', () => {
        const { map } = setup(192, [
            [0, 120],
            [384, 60],
        ]);
        expect(map.tickToTime(-192)).toBe(0);
        expect(map.tickToTime(Number.NaN)).toBe(0);
        expect(map.timeToTick(Number.NaN)).toBe(0);
        expect(map.timeToTick(Number.NEGATIVE_INFINITY)).toBe(0);
    });

    it('converts +Infinity to +Infinity', () => {
        const { map } = setup(192, [
            [0, 120],
            [384, 60],
        ]);
        expect(map.timeToTick(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
        expect(map.tickToTime(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
    });

    it('uses the later of two markers on the same tick', () => {
        const { map } = setup(192, [
            [0, 120],
            [192, 60],
            [192, 240],
        ]);
        // 192 ticks at 240 bpm = 0.25s
        expect(map.tickToTime(384)).toBe(0.75);
        expect(map.markerAtTick(192).bpmScaled).toBe(240_000);
    });

    it('supports fractional tempos stored at three decimals', () => {
        const { view, map } = setup(480, [[0, 128.5]]);
        expect(view.entries[0].bpmScaled).toBe(128_500);
        expect(map.tickToTime(480 * 128.5)).toBeCloseTo(60, 9);
    });

    it('converts batches', () => {
        const { map } = setup(192, [
            [0, 120],
            [384, 60],
        ]);
        expect(Array.from(map.ticksToTimeBatch([0, 192, 576]))).toEqual([0, 0.5, 2]);
        expect(Array.from(map.timesToTickBatch([0, 1, 2]))).toEqual([0, 384, 576]);
    });

    it('records profiling events when a profiler is provided', () => {
        const events: TempoMapProfileEvent[] = [];
        const durations: number[] = [];
        const profiler: TempoMapProfiler = {
            record(event, durationNanoseconds) {
                events.push(event);
                durations.push(durationNanoseconds);
            },
        };
        const { map } = setup(192, [[0, 120]], profiler);
        map.tickToTime(10);
        map.timeToTick(1);
        map.ticksToTimeBatch([0]);
        map.timesToTickBatch([0]);
        expect(events).toEqual(['recompute', 'tick-to-time', 'time-to-tick', 'ticks-batch', 'times-batch']);
        expect(durations.every((duration) => duration >= 0)).toBe(true);
    });
});

describe('liveTickToTime', () => {
    it('matches cached conversion while ignoring stale assigned times', () => {
        const { track, view, map } = setup(192, [
            [0, 120],
            [384, 60],
            [960, 180],
        ]);
        track.insert(createBeatMarker(192, 'beat'));
        for (const marker of view.entries) {
            marker.assignedTime = 999;
        }
        const anchor = view.entries[0];
        expect(liveTickToTime(576, 192, anchor, track.entries)).toBe(2);
        map.recomputeAssignedTimes();
        for (const tick of [0, 100, 384, 700, 960, 1500]) {
            expect(liveTickToTime(tick, 192, anchor, track.entries)).toBeCloseTo(map.tickToTime(tick), 9);
        }
    });

    it('sees markers that were inserted without a refresh', () => {
        const { track, view } = setup(192, [[0, 120]]);
        track.insert(createTempoMarker(192, 60));
        expect(liveTickToTime(384, 192, view.entries[0], track.entries)).toBe(1.5);
    });
});
