import { insertByTick, removeByIdentity } from '@core/timing/ordered-track';
import { instrumentToGameMode, type Difficulty, type GameMode, type Instrument } from './instruments';

/** Opaque chart content owned by note-level collaborators; the timeline only orders it by tick. */
export interface ChartObject {
    readonly kind: string;
    tick: number;
}

export class InstrumentChart {
    readonly instrument: Instrument;
    readonly difficulty: Difficulty;
    readonly gameMode: GameMode;
    private readonly objects: ChartObject[] = [];
    private kindCounts = new Map<string, number>();

    constructor(instrument: Instrument, difficulty: Difficulty) {
        this.instrument = instrument;
        this.difficulty = difficulty;
        this.gameMode = instrumentToGameMode(instrument);
    }

    get chartObjects(): readonly ChartObject[] {
        return this.objects;
    }

    get isEmpty(): boolean {
        return this.objects.length === 0;
    }

    add(object: ChartObject, autoUpdate = true): void {
        insertByTick(this.objects, object);
        if (autoUpdate) this.updateCache();
    }

    remove(object: ChartObject, autoUpdate = true): boolean {
        const removed = removeByIdentity(this.objects, object);
        if (autoUpdate) this.updateCache();
        return removed;
    }

    clear(): void {
        this.objects.length = 0;
        this.updateCache();
    }

    /** Count of objects of `kind` as of the last cache update. */
    countOf(kind: string): number {
        return this.kindCounts.get(kind) ?? 0;
    }

    updateCache(): void {
        const counts = new Map<string, number>();
        for (const object of this.objects) {
            counts.set(object.kind, (counts.get(object.kind) ?? 0) + 1);
        }
        this.kindCounts = counts;
    }

    rescaleTicks(ratio: number): void {
        for (const object of this.objects) {
            object.tick = Math.round(object.tick * ratio);
        }
    }
}
