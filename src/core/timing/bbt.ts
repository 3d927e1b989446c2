// Bar.beat.tick utilities driven by the time-signature map.
// A signature's beat lasts resolution * 4 / denominator ticks; a bar holds `numerator` beats.
// Signature changes restart bar counting, and a bar cut short by a change still counts as a bar.
import type { BeatEmphasis, TimeSignatureMarker } from './types';

type SignatureShape = Pick<TimeSignatureMarker, 'tick' | 'numerator' | 'denominator'>;

const COMMON_TIME: SignatureShape = { tick: 0, numerator: 4, denominator: 4 };

export function beatLengthInTicks(signature: SignatureShape, resolution: number): number {
    return (resolution * 4) / Math.max(1, signature.denominator);
}

export function barLengthInTicks(signature: SignatureShape, resolution: number): number {
    return beatLengthInTicks(signature, resolution) * Math.max(1, signature.numerator);
}

function signaturesOrDefault(signatures: readonly SignatureShape[]): readonly SignatureShape[] {
    return signatures.length > 0 ? signatures : [COMMON_TIME];
}

function barsInSegment(signature: SignatureShape, next: SignatureShape | undefined, resolution: number): number {
    if (!next) return Number.POSITIVE_INFINITY;
    return Math.ceil((next.tick - signature.tick) / barLengthInTicks(signature, resolution));
}

export function formatTickAsBBT(tick: number, signatures: readonly SignatureShape[], resolution: number): string {
    if (!Number.isFinite(tick) || tick < 0) return '1.1.0';
    const list = signaturesOrDefault(signatures);
    let barsBefore = 0;
    let segment = list[0];
    for (let i = 0; i < list.length; i += 1) {
        const next = list[i + 1];
        segment = list[i];
        if (!next || next.tick > tick) break;
        barsBefore += barsInSegment(segment, next, resolution);
    }
    const beatTicks = beatLengthInTicks(segment, resolution);
    const barTicks = barLengthInTicks(segment, resolution);
    const relative = Math.max(0, tick - segment.tick);
    const bar = Math.floor(relative / barTicks);
    const inBar = relative - bar * barTicks;
    const beat = Math.floor(inBar / beatTicks);
    const tickRemainder = Math.round(inBar - beat * beatTicks);
    return `${barsBefore + bar + 1}.${beat + 1}.${tickRemainder}`;
}

// Parse strings like "5.2.120" or "5:2:120" or "5.2" (ticks default to 0) or "5" (bar only)
export function parseBBT(input: string, signatures: readonly SignatureShape[], resolution: number): number | null {
    if (!input) return null;
    const parts = input
        .trim()
        .replace(/:/g, '.')
        .split('.')
        .map((p) => p.trim())
        .filter(Boolean);
    if (parts.length === 0 || parts.length > 3) return null;
    const [bar, beat = 1, ticks = 0] = parts.map((p) => Number.parseInt(p, 10));
    if (![bar, beat, ticks].every((n) => Number.isFinite(n) && n >= 0)) return null;
    if (bar < 1 || beat < 1) return null;

    const list = signaturesOrDefault(signatures);
    let barsBefore = 0;
    for (let i = 0; i < list.length; i += 1) {
        const segment = list[i];
        const segmentBars = barsInSegment(segment, list[i + 1], resolution);
        const barIndex = bar - 1 - barsBefore;
        if (barIndex < segmentBars) {
            const offset =
                barIndex * barLengthInTicks(segment, resolution) +
                (beat - 1) * beatLengthInTicks(segment, resolution) +
                ticks;
            return Math.round(segment.tick + offset);
        }
        barsBefore += segmentBars;
    }
    return null;
}

export type BeatGridLine = { tick: number; emphasis: BeatEmphasis };

// Bar and beat lines for the tick window [startTick, endTick]
export function getBeatGridInTicks(
    startTick: number,
    endTick: number,
    signatures: readonly SignatureShape[],
    resolution: number
): BeatGridLine[] {
    const s = Math.max(0, Math.min(startTick, endTick));
    const e = Math.max(0, Math.max(startTick, endTick));
    const list = signaturesOrDefault(signatures);
    const lines: BeatGridLine[] = [];
    for (let i = 0; i < list.length; i += 1) {
        const segment = list[i];
        const next = list[i + 1];
        if (segment.tick > e) break;
        const segmentEnd = next ? next.tick : Number.POSITIVE_INFINITY;
        if (segmentEnd <= s) continue;
        const beatTicks = beatLengthInTicks(segment, resolution);
        const beatsPerBar = Math.max(1, segment.numerator);
        const firstBeat = Math.max(0, Math.ceil((s - segment.tick) / beatTicks));
        for (let beatIndex = firstBeat; ; beatIndex += 1) {
            const tick = Math.round(segment.tick + beatIndex * beatTicks);
            if (tick >= segmentEnd || tick > e) break;
            lines.push({ tick, emphasis: beatIndex % beatsPerBar === 0 ? 'measure' : 'beat' });
        }
    }
    return lines;
}
