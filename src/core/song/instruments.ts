import { TimelineError } from '@core/errors';

// Order defines the slot layout; do not reorder.
export const INSTRUMENTS = [
    'guitar',
    'guitar-coop',
    'bass',
    'rhythm',
    'keys',
    'drums',
    'ghl-guitar',
    'ghl-bass',
    'ghl-rhythm',
    'ghl-coop',
    'pro-guitar-17',
    'pro-guitar-22',
    'pro-bass-17',
    'pro-bass-22',
    'vocals',
    'harmony-1',
    'harmony-2',
    'harmony-3',
] as const;

export const DIFFICULTIES = ['expert', 'hard', 'medium', 'easy'] as const;

export type Instrument = (typeof INSTRUMENTS)[number];
export type Difficulty = (typeof DIFFICULTIES)[number];
export type GameMode = 'guitar' | 'drums' | 'ghl-guitar' | 'pro-guitar' | 'vocals';

export const INSTRUMENT_COUNT = INSTRUMENTS.length;
export const DIFFICULTY_COUNT = DIFFICULTIES.length;

const INSTRUMENT_INDEX: ReadonlyMap<string, number> = new Map(INSTRUMENTS.map((name, index) => [name, index]));
const DIFFICULTY_INDEX: ReadonlyMap<string, number> = new Map(DIFFICULTIES.map((name, index) => [name, index]));

const GAME_MODES: Record<Instrument, GameMode> = {
    guitar: 'guitar',
    'guitar-coop': 'guitar',
    bass: 'guitar',
    rhythm: 'guitar',
    keys: 'guitar',
    drums: 'drums',
    'ghl-guitar': 'ghl-guitar',
    'ghl-bass': 'ghl-guitar',
    'ghl-rhythm': 'ghl-guitar',
    'ghl-coop': 'ghl-guitar',
    'pro-guitar-17': 'pro-guitar',
    'pro-guitar-22': 'pro-guitar',
    'pro-bass-17': 'pro-guitar',
    'pro-bass-22': 'pro-guitar',
    vocals: 'vocals',
    'harmony-1': 'vocals',
    'harmony-2': 'vocals',
    'harmony-3': 'vocals',
};

export function instrumentIndex(instrument: string): number {
    const index = INSTRUMENT_INDEX.get(instrument);
    if (index === undefined) {
        throw new TimelineError('ERR_UNKNOWN_INSTRUMENT', `Unknown instrument: ${instrument}`);
    }
    return index;
}

export function difficultyIndex(difficulty: string): number {
    const index = DIFFICULTY_INDEX.get(difficulty);
    if (index === undefined) {
        throw new TimelineError('ERR_UNKNOWN_DIFFICULTY', `Unknown difficulty: ${difficulty}`);
    }
    return index;
}

/** Dense slot index: instrument-major, difficulty-minor. */
export function chartSlotIndex(instrument: string, difficulty: string): number {
    return instrumentIndex(instrument) * DIFFICULTY_COUNT + difficultyIndex(difficulty);
}

export function parseInstrument(name: string): Instrument {
    return INSTRUMENTS[instrumentIndex(name)];
}

export function parseDifficulty(name: string): Difficulty {
    return DIFFICULTIES[difficultyIndex(name)];
}

export function instrumentToGameMode(instrument: Instrument): GameMode {
    instrumentIndex(instrument);
    return GAME_MODES[instrument];
}
