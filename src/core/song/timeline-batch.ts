import { TimelineError } from '@core/errors';
import type { BeatMarker, EventTrackEntry, TempoMarker, TimeSignatureMarker } from '@core/timing/types';
import type { SongTimeline } from './song-timeline';

/**
 * Scoped mutation handle. Every mutation made through it defers the timeline refresh;
 * the refresh runs once when the outermost open batch is ended.
 */
export class TimelineBatch {
    private open = true;

    constructor(
        private readonly timeline: SongTimeline,
        private readonly release: () => void
    ) {}

    get isOpen(): boolean {
        return this.open;
    }

    addTempoMarker(marker: TempoMarker): this {
        this.assertOpen();
        this.timeline.addTempoMarker(marker, false);
        return this;
    }

    addTimeSignatureMarker(marker: TimeSignatureMarker): this {
        this.assertOpen();
        this.timeline.addTimeSignatureMarker(marker, false);
        return this;
    }

    addBeatMarker(marker: BeatMarker): this {
        this.assertOpen();
        this.timeline.addBeatMarker(marker, false);
        return this;
    }

    addEvent(event: EventTrackEntry): this {
        this.assertOpen();
        this.timeline.addEvent(event, false);
        return this;
    }

    removeTempoMarker(marker: TempoMarker): boolean {
        this.assertOpen();
        return this.timeline.removeTempoMarker(marker, false);
    }

    removeTimeSignatureMarker(marker: TimeSignatureMarker): boolean {
        this.assertOpen();
        return this.timeline.removeTimeSignatureMarker(marker, false);
    }

    removeBeatMarker(marker: BeatMarker): boolean {
        this.assertOpen();
        return this.timeline.removeBeatMarker(marker, false);
    }

    removeEvent(event: EventTrackEntry): boolean {
        this.assertOpen();
        return this.timeline.removeEvent(event, false);
    }

    /** Closes the handle. Ending an already ended batch does nothing. */
    end(): void {
        if (!this.open) return;
        this.open = false;
        this.release();
    }

    private assertOpen(): void {
        if (!this.open) {
            throw new TimelineError('ERR_BATCH_CLOSED', 'Timeline batch has already been ended');
        }
    }
}
