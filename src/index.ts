export * from './core';
export { readTimelineConfig, STANDARD_BEAT_RESOLUTION, STANDARD_BPM } from './config/timelineConfig';
export type { TimelineConfig } from './config/timelineConfig';
