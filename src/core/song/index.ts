export { SongTimeline } from './song-timeline';
export type { SongTimelineOptions, TimelineRefreshEvent } from './song-timeline';
export { TimelineBatch } from './timeline-batch';
export { InstrumentChart } from './instrument-chart';
export type { ChartObject } from './instrument-chart';
export * from './instruments';
export { createTimelineStore, snapshotTimeline } from './timeline-store';
export type { TimelineStoreHandle, TimelineStoreState } from './timeline-store';
