// Unified timeline entry types. Every entry carries an explicit kind tag; typed views
// are built by partitioning on that tag.

export const BPM_SCALE = 1000;

export interface TimelineEntryBase<K extends string> {
    readonly kind: K;
    tick: number;
}

export interface TempoMarker extends TimelineEntryBase<'tempo'> {
    /** Beats per minute x 1000, rounded to an integer. */
    bpmScaled: number;
    /** Derived playback time in seconds; written only by the tempo map refresh. */
    assignedTime: number;
}

export interface TimeSignatureMarker extends TimelineEntryBase<'time-signature'> {
    numerator: number;
    denominator: number;
}

export type BeatEmphasis = 'measure' | 'beat';

export interface BeatMarker extends TimelineEntryBase<'beat'> {
    emphasis: BeatEmphasis;
}

export interface TextEvent extends TimelineEntryBase<'event'> {
    text: string;
}

export interface SectionEvent extends TimelineEntryBase<'section'> {
    name: string;
}

export type VenueEventType = 'lighting' | 'post-processing' | 'camera' | 'singalong' | 'spotlight' | 'other';

export interface VenueEvent extends TimelineEntryBase<'venue'> {
    venueType: VenueEventType;
    text: string;
}

export type SyncTrackEntry = TempoMarker | TimeSignatureMarker | BeatMarker;
export type EventTrackEntry = TextEvent | SectionEvent | VenueEvent;
export type TimelineEntry = SyncTrackEntry | EventTrackEntry;

export type SyncTrackKind = SyncTrackEntry['kind'];
export type EventTrackKind = EventTrackEntry['kind'];

export const SYNC_TRACK_KINDS: readonly SyncTrackKind[] = ['tempo', 'time-signature', 'beat'];
export const EVENT_TRACK_KINDS: readonly EventTrackKind[] = ['event', 'section', 'venue'];

export function scaleBpm(bpm: number): number {
    return Math.round(bpm * BPM_SCALE);
}

export function tempoBpm(marker: Pick<TempoMarker, 'bpmScaled'>): number {
    return marker.bpmScaled / BPM_SCALE;
}

export function createTempoMarker(tick: number, bpm: number): TempoMarker {
    return { kind: 'tempo', tick, bpmScaled: scaleBpm(bpm), assignedTime: 0 };
}

export function createTimeSignatureMarker(tick: number, numerator = 4, denominator = 4): TimeSignatureMarker {
    return { kind: 'time-signature', tick, numerator, denominator };
}

export function createBeatMarker(tick: number, emphasis: BeatEmphasis = 'beat'): BeatMarker {
    return { kind: 'beat', tick, emphasis };
}

export function createTextEvent(tick: number, text: string): TextEvent {
    return { kind: 'event', tick, text };
}

export function createSection(tick: number, name: string): SectionEvent {
    return { kind: 'section', tick, name };
}

export function createVenueEvent(tick: number, venueType: VenueEventType, text: string): VenueEvent {
    return { kind: 'venue', tick, venueType, text };
}
