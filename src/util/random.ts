export type RandomSource = () => number;

const DEFAULT_SEED = 1;

const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = seed >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

const entropySeed = (): number => {
    const buffer = new Uint32Array(1);
    crypto.getRandomValues(buffer);
    return normalizeSeed(buffer[0]);
};

/**
 * Seeded PRNG returning values in [0, 1).
 */
export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface RandomManager {
    /** Uniform integer in [min, max], both ends inclusive. */
    readonly intInRange: (min: number, max: number) => number;
}

export interface RandomManagerOptions {
    /** Replaces the seeded generator, e.g. with a scripted sequence in tests. The seed is then unused. */
    readonly source?: RandomSource;
}

/**
 * Integer draws for spawning. Omitting the seed draws one from `crypto`.
 */
export const createRandomManager = (seed?: number | null, options: RandomManagerOptions = {}): RandomManager => {
    const next = options.source ?? mulberry32(seed === null || seed === undefined ? entropySeed() : seed);

    const intInRange = (min: number, max: number): number => {
        const low = Math.ceil(min);
        const high = Math.floor(max);
        if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
            throw new RangeError(`invalid integer range [${min}, ${max}]`);
        }
        return low + Math.floor(next() * (high - low + 1));
    };

    return { intInRange };
};
