import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SongTimeline } from './song-timeline';

export interface TimelineStoreState {
    revision: number;
    resolution: number;
    tempoCount: number;
    timeSignatureCount: number;
    beatCount: number;
    eventCount: number;
    sectionCount: number;
    venueEventCount: number;
    lastRefreshDurationMs: number;
}

export interface TimelineStoreHandle {
    store: StoreApi<TimelineStoreState>;
    /** Stops mirroring the timeline. The store keeps its last state. */
    dispose(): void;
}

export function snapshotTimeline(timeline: SongTimeline): TimelineStoreState {
    return {
        revision: timeline.revision,
        resolution: timeline.resolution,
        tempoCount: timeline.tempoMarkers.length,
        timeSignatureCount: timeline.timeSignatures.length,
        beatCount: timeline.beats.length,
        eventCount: timeline.textEvents.length,
        sectionCount: timeline.sections.length,
        venueEventCount: timeline.venueEvents.length,
        lastRefreshDurationMs: timeline.lastRefreshDurationMs,
    };
}

/**
 * Mirrors a timeline's refresh state into a zustand store so renderers can subscribe to
 * refreshes without holding a listener on the timeline itself.
 */
export function createTimelineStore(timeline: SongTimeline): TimelineStoreHandle {
    const store = createStore<TimelineStoreState>()(() => snapshotTimeline(timeline));
    const unsubscribe = timeline.subscribe((_event, source) => {
        store.setState(snapshotTimeline(source), true);
    });
    return { store, dispose: unsubscribe };
}
