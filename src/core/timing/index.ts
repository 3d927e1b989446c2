// Barrel exports for the timing subsystem
export * from './types';
export * from './tick-math';
export * from './resolution';
export { OrderedTrack, TypedView, findClosestIndex, findPrevious, insertByTick, removeByIdentity } from './ordered-track';
export type { OrderedTrackOptions, TickOrdered, TrackRemoveOutcome } from './ordered-track';
export { TempoMap, liveTickToTime } from './tempo-map';
export type { TempoMapProfileEvent, TempoMapProfiler } from './tempo-map';
export * from './bbt';
