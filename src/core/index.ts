// Chart timeline core exports

// ==========================================
// Timing: entries, tick math, ordered tracks, tempo map
// ==========================================
export * from '@core/timing';

// ==========================================
// Song timeline aggregate and chart slots
// ==========================================
export * from '@core/song';

// ==========================================
// Errors
// ==========================================
export { TimelineError, isTimelineError } from '@core/errors';
export type { TimelineErrorCode } from '@core/errors';
