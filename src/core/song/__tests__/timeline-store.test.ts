import { describe, it, expect } from 'vitest';
import { createSection, createTempoMarker } from '@core/timing/types';
import { SongTimeline } from '../song-timeline';
import { createTimelineStore, snapshotTimeline } from '../timeline-store';

describe('timeline store', () => {
    it('starts from the current timeline state', () => {
        const timeline = new SongTimeline({ resolution: 480, initialBpm: 100 });
        const { store } = createTimelineStore(timeline);
        expect(store.getState()).toMatchObject({
            revision: 1,
            resolution: 480,
            tempoCount: 1,
            timeSignatureCount: 1,
            beatCount: 0,
            eventCount: 0,
            sectionCount: 0,
            venueEventCount: 0,
        });
    });

    it('follows refreshes until disposed', () => {
        const timeline = new SongTimeline({ resolution: 192, initialBpm: 120 });
        const handle = createTimelineStore(timeline);
        const revisions: number[] = [];
        handle.store.subscribe((state) => revisions.push(state.revision));

        timeline.addTempoMarker(createTempoMarker(384, 60));
        timeline.addEvent(createSection(0, 'intro'));
        expect(handle.store.getState().tempoCount).toBe(2);
        expect(handle.store.getState().sectionCount).toBe(1);
        expect(revisions).toEqual([2, 3]);

        handle.dispose();
        timeline.refresh();
        expect(handle.store.getState().revision).toBe(3);
        expect(snapshotTimeline(timeline).revision).toBe(4);
    });

    it('publishes once per batch', () => {
        const timeline = new SongTimeline({ resolution: 192, initialBpm: 120 });
        const { store } = createTimelineStore(timeline);
        let updates = 0;
        store.subscribe(() => {
            updates += 1;
        });
        timeline.withBatch((batch) => {
            batch.addTempoMarker(createTempoMarker(192, 90)).addTempoMarker(createTempoMarker(384, 60));
        });
        expect(updates).toBe(1);
        expect(store.getState().tempoCount).toBe(3);
    });
});
