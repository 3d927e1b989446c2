import { TimelineError } from '@core/errors';
import type { TimelineEntry } from './types';

export interface TickOrdered {
    tick: number;
}

export type TrackRemoveOutcome = 'removed' | 'not-found' | 'anchor';

// An entry belongs to at most one track at a time.
const ownedEntries = new WeakSet<TickOrdered>();

/** Index of the first entry whose tick is strictly greater than `tick`. */
function upperBound(entries: ReadonlyArray<TickOrdered>, tick: number): number {
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
        const mid = (lo + hi) >> 1;
        if (entries[mid].tick <= tick) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Index of the entry whose tick is closest to `tick`, or -1 for an empty sequence.
 * Between two distinct neighbours the earlier one wins; among equal ticks the last one wins.
 */
export function findClosestIndex(entries: ReadonlyArray<TickOrdered>, tick: number): number {
    if (entries.length === 0) return -1;
    const after = upperBound(entries, tick);
    if (after === 0) return 0;
    if (after === entries.length) return after - 1;
    const distanceBefore = tick - entries[after - 1].tick;
    const distanceAfter = entries[after].tick - tick;
    return distanceBefore <= distanceAfter ? after - 1 : after;
}

/**
 * Last entry with tick <= `tick`. A query before the first entry clamps to the first entry;
 * only an empty sequence yields undefined.
 */
export function findPrevious<T extends TickOrdered>(entries: ReadonlyArray<T>, tick: number): T | undefined {
    let index = findClosestIndex(entries, tick);
    if (index < 0) return undefined;
    if (entries[index].tick > tick && index > 0) {
        index -= 1;
    }
    return entries[index];
}

/** Splices `entry` after every entry with an equal or lower tick. Returns the insertion index. */
export function insertByTick<T extends TickOrdered>(entries: T[], entry: T): number {
    const index = upperBound(entries, entry.tick);
    entries.splice(index, 0, entry);
    return index;
}

export function removeByIdentity<T>(entries: T[], entry: T): boolean {
    const index = entries.indexOf(entry);
    if (index < 0) return false;
    entries.splice(index, 1);
    return true;
}

/** Read-only, tick-ordered sequence holding exactly one kind of entry from a track. */
export class TypedView<T extends TimelineEntry> implements Iterable<T> {
    private readonly items: T[] = [];

    constructor(
        public readonly kind: string,
        private readonly accepts: (entry: TimelineEntry) => entry is T
    ) {}

    /** Stable array reference; its contents are replaced on every refresh. */
    get entries(): readonly T[] {
        return this.items;
    }

    get length(): number {
        return this.items.length;
    }

    at(index: number): T | undefined {
        return this.items[index];
    }

    [Symbol.iterator](): Iterator<T> {
        return this.items[Symbol.iterator]();
    }

    rebuild(source: readonly TimelineEntry[]): void {
        this.items.length = 0;
        for (const entry of source) {
            if (this.accepts(entry)) {
                this.items.push(entry);
            }
        }
    }
}

export interface OrderedTrackOptions<E extends TimelineEntry> {
    name: string;
    kinds: readonly E['kind'][];
    /** Kinds whose tick-0 entries anchor the track and cannot be removed. */
    anchoredKinds?: readonly E['kind'][];
}

/**
 * Tick-sorted backing sequence shared by several entry kinds, with one typed view per declared kind.
 * Views are only consistent with the backing sequence after `refreshTypedViews()`.
 */
export class OrderedTrack<E extends TimelineEntry> {
    readonly name: string;
    private readonly backing: E[] = [];
    private readonly kinds: ReadonlySet<string>;
    private readonly anchoredKinds: ReadonlySet<string>;
    private readonly views: Array<TypedView<TimelineEntry>> = [];

    constructor(options: OrderedTrackOptions<E>) {
        this.name = options.name;
        this.kinds = new Set<string>(options.kinds);
        this.anchoredKinds = new Set<string>(options.anchoredKinds ?? []);
    }

    get entries(): readonly E[] {
        return this.backing;
    }

    get size(): number {
        return this.backing.length;
    }

    declareView<K extends E['kind']>(kind: K): TypedView<Extract<E, { kind: K }>> {
        this.assertKnownKind(kind);
        const view = new TypedView(kind, (entry: TimelineEntry): entry is Extract<E, { kind: K }> => entry.kind === kind);
        view.rebuild(this.backing);
        this.views.push(view);
        return view;
    }

    insert(entry: E): number {
        this.assertKnownKind(entry.kind);
        if (ownedEntries.has(entry)) {
            throw new TimelineError(
                'ERR_ENTRY_OWNED',
                `[${this.name}] ${entry.kind} entry at tick ${entry.tick} already belongs to a timeline`
            );
        }
        const index = insertByTick(this.backing, entry);
        ownedEntries.add(entry);
        return index;
    }

    remove(entry: E): TrackRemoveOutcome {
        if (this.isAnchor(entry)) return 'anchor';
        if (!removeByIdentity(this.backing, entry)) return 'not-found';
        ownedEntries.delete(entry);
        return 'removed';
    }

    /** Removes every non-anchor entry matching `predicate`; returns how many were removed. */
    removeWhere(predicate: (entry: E) => boolean): number {
        let removed = 0;
        for (let i = this.backing.length - 1; i >= 0; i -= 1) {
            const entry = this.backing[i];
            if (!predicate(entry) || this.isAnchor(entry)) continue;
            this.backing.splice(i, 1);
            ownedEntries.delete(entry);
            removed += 1;
        }
        return removed;
    }

    contains(entry: E): boolean {
        return this.backing.includes(entry);
    }

    isAnchor(entry: E): boolean {
        return entry.tick === 0 && this.anchoredKinds.has(entry.kind);
    }

    /** Multiplies every tick by `ratio`, rounding to whole ticks. Relative order is unchanged. */
    rescaleTicks(ratio: number): void {
        for (const entry of this.backing) {
            entry.tick = Math.round(entry.tick * ratio);
        }
    }

    refreshTypedViews(): void {
        for (const view of this.views) {
            view.rebuild(this.backing);
        }
    }

    private assertKnownKind(kind: string): void {
        if (!this.kinds.has(kind)) {
            throw new TimelineError('ERR_UNKNOWN_KIND', `[${this.name}] does not hold '${kind}' entries`);
        }
    }
}
