/**
 * SongTimeline - tick-indexed tempo, time-signature and event timeline of one chart.
 *
 * Owns two ordered tracks (sync and events), the tempo map derived from the sync track,
 * and a fixed instrument x difficulty table of chart slots. Mutations either refresh the
 * derived views immediately (`autoUpdate`) or defer to the end of a batch.
 */
import { readTimelineConfig } from '@config/timelineConfig';
import { TimelineError } from '@core/errors';
import { formatTickAsBBT, getBeatGridInTicks } from '@core/timing/bbt';
import { findPrevious, OrderedTrack, type TrackRemoveOutcome, type TypedView } from '@core/timing/ordered-track';
import { assertValidResolution, getDefaultResolution, resolutionScaleRatio } from '@core/timing/resolution';
import { liveTickToTime, TempoMap, type TempoMapProfiler } from '@core/timing/tempo-map';
import {
    createBeatMarker,
    createTempoMarker,
    createTimeSignatureMarker,
    EVENT_TRACK_KINDS,
    SYNC_TRACK_KINDS,
    type BeatMarker,
    type EventTrackEntry,
    type SectionEvent,
    type SyncTrackEntry,
    type TempoMarker,
    type TextEvent,
    type TimeSignatureMarker,
    type VenueEvent,
} from '@core/timing/types';
import { debugLog } from '@utils/debug-log';
import { processEnv } from '@utils/env';
import { InstrumentChart } from './instrument-chart';
import {
    chartSlotIndex,
    DIFFICULTIES,
    DIFFICULTY_COUNT,
    INSTRUMENTS,
    instrumentIndex,
    type Difficulty,
    type Instrument,
} from './instruments';
import { TimelineBatch } from './timeline-batch';

export interface SongTimelineOptions {
    /** Ticks per beat. Defaults to TIMELINE_DEFAULT_RESOLUTION or 192. */
    resolution?: number;
    /** Tempo of the tick-0 anchor. Defaults to TIMELINE_DEFAULT_BPM or 120. */
    initialBpm?: number;
    name?: string;
    /** Audio offset in seconds; metadata only, not applied to conversions. */
    offset?: number;
    /** Song length in seconds when set by the author instead of derived from the audio. */
    manualLength?: number | null;
    /** Free-form song metadata (artist, album, charter, ...). */
    metadata?: Record<string, string>;
    profiler?: TempoMapProfiler;
}

export interface TimelineRefreshEvent {
    revision: number;
    durationMs: number;
}

type TimelineRefreshListener = (event: TimelineRefreshEvent, timeline: SongTimeline) => void;

function now(): number {
    return typeof performance !== 'undefined' ? performance.now() : Date.now();
}

function assertValidTick(tick: number): void {
    if (!Number.isInteger(tick) || tick < 0) {
        throw new TimelineError('ERR_INVALID_TICK', `Invalid tick: ${tick}`);
    }
}

function assertValidTempo(marker: TempoMarker): void {
    if (!Number.isFinite(marker.bpmScaled) || marker.bpmScaled <= 0) {
        throw new TimelineError('ERR_INVALID_TEMPO', `Invalid tempo at tick ${marker.tick}: ${marker.bpmScaled}`);
    }
}

function assertValidSignature(marker: TimeSignatureMarker): void {
    const valid =
        Number.isInteger(marker.numerator) &&
        marker.numerator > 0 &&
        Number.isInteger(marker.denominator) &&
        marker.denominator > 0;
    if (!valid) {
        throw new TimelineError(
            'ERR_INVALID_TIME_SIGNATURE',
            `Invalid time signature at tick ${marker.tick}: ${marker.numerator}/${marker.denominator}`
        );
    }
}

function requireAnchor<T>(entry: T | undefined, label: string): T {
    if (entry === undefined) {
        throw new TimelineError('ERR_MISSING_ANCHOR', `Timeline has no ${label} anchor`);
    }
    return entry;
}

export class SongTimeline {
    name: string;
    offset: number;
    manualLength: number | null;
    readonly metadata: Record<string, string>;
    private _resolution: number;
    private _revision = 0;
    private _lastRefreshDurationMs = 0;
    private batchDepth = 0;

    private readonly sync = new OrderedTrack<SyncTrackEntry>({
        name: 'sync',
        kinds: SYNC_TRACK_KINDS,
        anchoredKinds: ['tempo', 'time-signature'],
    });
    private readonly events = new OrderedTrack<EventTrackEntry>({ name: 'events', kinds: EVENT_TRACK_KINDS });

    private readonly tempoView: TypedView<TempoMarker>;
    private readonly signatureView: TypedView<TimeSignatureMarker>;
    private readonly beatView: TypedView<BeatMarker>;
    private readonly textEventView: TypedView<TextEvent>;
    private readonly sectionView: TypedView<SectionEvent>;
    private readonly venueView: TypedView<VenueEvent>;

    private readonly tempoMap: TempoMap;
    private readonly chartSlots: readonly InstrumentChart[];
    private readonly listeners = new Set<TimelineRefreshListener>();

    constructor(options: SongTimelineOptions = {}) {
        const resolution = options.resolution ?? getDefaultResolution();
        assertValidResolution(resolution);
        this._resolution = resolution;
        this.name = options.name ?? '';
        this.offset = options.offset ?? 0;
        this.manualLength = options.manualLength ?? null;
        this.metadata = { ...options.metadata };

        this.tempoView = this.sync.declareView('tempo');
        this.signatureView = this.sync.declareView('time-signature');
        this.beatView = this.sync.declareView('beat');
        this.textEventView = this.events.declareView('event');
        this.sectionView = this.events.declareView('section');
        this.venueView = this.events.declareView('venue');
        this.tempoMap = new TempoMap(this.tempoView, () => this._resolution, options.profiler);

        const slots: InstrumentChart[] = [];
        for (let i = 0; i < INSTRUMENTS.length * DIFFICULTY_COUNT; i += 1) {
            slots.push(new InstrumentChart(INSTRUMENTS[Math.floor(i / DIFFICULTY_COUNT)], DIFFICULTIES[i % DIFFICULTY_COUNT]));
        }
        this.chartSlots = slots;

        this.addTempoMarker(createTempoMarker(0, options.initialBpm ?? readTimelineConfig(processEnv()).defaultBpm), false);
        this.addTimeSignatureMarker(createTimeSignatureMarker(0, 4, 4), false);
        this.refresh();
    }

    get resolution(): number {
        return this._resolution;
    }

    /** Incremented on every refresh. */
    get revision(): number {
        return this._revision;
    }

    get lastRefreshDurationMs(): number {
        return this._lastRefreshDurationMs;
    }

    get isBatching(): boolean {
        return this.batchDepth > 0;
    }

    // Backing sequences, kept sorted at all times
    get syncTrack(): readonly SyncTrackEntry[] {
        return this.sync.entries;
    }
    get eventsAndSections(): readonly EventTrackEntry[] {
        return this.events.entries;
    }

    // Typed views, consistent with the backing sequences as of the last refresh
    get tempoMarkers(): readonly TempoMarker[] {
        return this.tempoView.entries;
    }
    get timeSignatures(): readonly TimeSignatureMarker[] {
        return this.signatureView.entries;
    }
    get beats(): readonly BeatMarker[] {
        return this.beatView.entries;
    }
    get textEvents(): readonly TextEvent[] {
        return this.textEventView.entries;
    }
    get sections(): readonly SectionEvent[] {
        return this.sectionView.entries;
    }
    get venueEvents(): readonly VenueEvent[] {
        return this.venueView.entries;
    }

    addTempoMarker(marker: TempoMarker, autoUpdate = true): void {
        assertValidTick(marker.tick);
        assertValidTempo(marker);
        this.sync.insert(marker);
        this.afterMutation(autoUpdate);
    }

    addTimeSignatureMarker(marker: TimeSignatureMarker, autoUpdate = true): void {
        assertValidTick(marker.tick);
        assertValidSignature(marker);
        this.sync.insert(marker);
        this.afterMutation(autoUpdate);
    }

    addBeatMarker(marker: BeatMarker, autoUpdate = true): void {
        assertValidTick(marker.tick);
        this.sync.insert(marker);
        this.afterMutation(autoUpdate);
    }

    removeTempoMarker(marker: TempoMarker, autoUpdate = true): boolean {
        return this.removeSyncEntry(marker, autoUpdate);
    }

    removeTimeSignatureMarker(marker: TimeSignatureMarker, autoUpdate = true): boolean {
        return this.removeSyncEntry(marker, autoUpdate);
    }

    removeBeatMarker(marker: BeatMarker, autoUpdate = true): boolean {
        return this.removeSyncEntry(marker, autoUpdate);
    }

    addEvent(event: EventTrackEntry, autoUpdate = true): void {
        assertValidTick(event.tick);
        this.events.insert(event);
        this.afterMutation(autoUpdate);
    }

    removeEvent(event: EventTrackEntry, autoUpdate = true): boolean {
        const outcome = this.events.remove(event);
        if (outcome !== 'removed') {
            this.logRemoveFailure(event, outcome);
            return false;
        }
        this.afterMutation(autoUpdate);
        return true;
    }

    /** Rebuilds every typed view and the tempo map's assigned times, then notifies subscribers. */
    refresh(): void {
        const start = now();
        this.sync.refreshTypedViews();
        this.events.refreshTypedViews();
        this.tempoMap.recomputeAssignedTimes();
        this._revision += 1;
        this._lastRefreshDurationMs = now() - start;
        this.notify({ revision: this._revision, durationMs: this._lastRefreshDurationMs });
    }

    /** Opens a batch; the timeline refreshes when the outermost open batch ends. */
    beginBatch(): TimelineBatch {
        this.batchDepth += 1;
        return new TimelineBatch(this, () => this.releaseBatch());
    }

    /** Runs `fn` inside a batch that is ended on every exit path, including a throw. */
    withBatch<T>(fn: (batch: TimelineBatch) => T): T {
        const batch = this.beginBatch();
        try {
            return fn(batch);
        } finally {
            batch.end();
        }
    }

    subscribe(listener: TimelineRefreshListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    tickToTime(tick: number): number {
        return this.tempoMap.tickToTime(tick);
    }

    timeToTick(time: number): number {
        return this.tempoMap.timeToTick(time);
    }

    ticksToTimeBatch(ticks: ArrayLike<number>): Float64Array {
        return this.tempoMap.ticksToTimeBatch(ticks);
    }

    timesToTickBatch(times: ArrayLike<number>): Float64Array {
        return this.tempoMap.timesToTickBatch(times);
    }

    /** Tick -> seconds from the raw sync track; valid even while a batch is open. */
    liveTickToTime(tick: number): number {
        let initial: TempoMarker | undefined;
        for (const entry of this.sync.entries) {
            if (entry.kind === 'tempo') {
                initial = entry;
                break;
            }
        }
        return liveTickToTime(tick, this._resolution, requireAnchor(initial, 'tempo'), this.sync.entries);
    }

    getPreviousTempoMarker(tick: number): TempoMarker {
        return requireAnchor(findPrevious(this.tempoView.entries, tick), 'tempo');
    }

    getPreviousTimeSignature(tick: number): TimeSignatureMarker {
        return requireAnchor(findPrevious(this.signatureView.entries, tick), 'time signature');
    }

    getPreviousSection(tick: number): SectionEvent | undefined {
        return findPrevious(this.sectionView.entries, tick);
    }

    formatTick(tick: number): string {
        return formatTickAsBBT(tick, this.signatureView.entries, this._resolution);
    }

    /**
     * Replaces every beat marker with the bar and beat grid of the current time signatures,
     * from tick 0 through `endTick`. Returns the number of markers written.
     */
    rebuildBeatMarkers(endTick: number): number {
        const signatures: TimeSignatureMarker[] = [];
        for (const entry of this.sync.entries) {
            if (entry.kind === 'time-signature') signatures.push(entry);
        }
        const grid = getBeatGridInTicks(0, endTick, signatures, this._resolution);
        return this.withBatch((batch) => {
            const removed = this.sync.removeWhere((entry) => entry.kind === 'beat');
            for (const line of grid) {
                batch.addBeatMarker(createBeatMarker(line.tick, line.emphasis));
            }
            debugLog('[songTimeline] rebuilt beat markers', { removed, written: grid.length, endTick });
            return grid.length;
        });
    }

    resolutionScaleRatio(targetResolution: number): number {
        return resolutionScaleRatio(this._resolution, targetResolution);
    }

    /** Moves every entry and chart object onto `targetResolution` ticks, then refreshes. */
    rescale(targetResolution: number): void {
        const ratio = this.resolutionScaleRatio(targetResolution);
        if (ratio === 1) return;
        this.sync.rescaleTicks(ratio);
        this.events.rescaleTicks(ratio);
        for (const chart of this.chartSlots) {
            chart.rescaleTicks(ratio);
        }
        this._resolution = targetResolution;
        this.refresh();
    }

    get charts(): readonly InstrumentChart[] {
        return this.chartSlots;
    }

    instrumentChartSlot(instrument: Instrument, difficulty: Difficulty): InstrumentChart {
        return this.chartSlots[chartSlotIndex(instrument, difficulty)];
    }

    chartExistsForInstrument(instrument: Instrument): boolean {
        const base = instrumentIndex(instrument) * DIFFICULTY_COUNT;
        for (let i = 0; i < DIFFICULTY_COUNT; i += 1) {
            if (!this.chartSlots[base + i].isEmpty) return true;
        }
        return false;
    }

    doesChartExist(instrument: Instrument, difficulty: Difficulty): boolean {
        return !this.instrumentChartSlot(instrument, difficulty).isEmpty;
    }

    updateAllChartCaches(): void {
        for (const chart of this.chartSlots) {
            chart.updateCache();
        }
    }

    private removeSyncEntry(entry: SyncTrackEntry, autoUpdate: boolean): boolean {
        const outcome = this.sync.remove(entry);
        if (outcome !== 'removed') {
            this.logRemoveFailure(entry, outcome);
            return false;
        }
        this.afterMutation(autoUpdate);
        return true;
    }

    // Failed removals leave the timeline untouched: no refresh, no notification.
    private logRemoveFailure(entry: SyncTrackEntry | EventTrackEntry, outcome: Exclude<TrackRemoveOutcome, 'removed'>): void {
        if (outcome === 'anchor') {
            debugLog('[songTimeline] refused to remove tick-0 anchor', entry.kind);
        } else {
            debugLog('[songTimeline] entry not found for removal', entry.kind, entry.tick);
        }
    }

    private afterMutation(autoUpdate: boolean): void {
        if (autoUpdate && this.batchDepth === 0) {
            this.refresh();
        }
    }

    private releaseBatch(): void {
        this.batchDepth = Math.max(0, this.batchDepth - 1);
        if (this.batchDepth === 0) {
            this.refresh();
        }
    }

    private notify(event: TimelineRefreshEvent): void {
        if (!this.listeners.size) return;
        for (const listener of this.listeners) {
            try {
                listener(event, this);
            } catch (error) {
                console.error('[songTimeline] refresh listener error', error);
            }
        }
    }
}
