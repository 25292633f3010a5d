import { RandomSource } from '../types';

// A simple seeded PRNG (mulberry32)
export function mulberry32(a: number): RandomSource {
    return function () {
        a |= 0; a = a + 0x6D2B79F5 | 0;
        let t = Math.imul(a ^ a >>> 15, 1 | a);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

// Seeds every default source; itself seeded once from the wall clock.
const seedSource = mulberry32(Date.now());

/**
 * Creates a random source with a fresh seed. Sources created in the same millisecond
 * still produce different sequences, and repeated runs differ.
 */
export function createDefaultRandom(): RandomSource {
    return mulberry32(Math.floor(seedSource() * 4294967296));
}

/**
 * Returns an integer in [0, n).
 */
export function randomIndex(random: RandomSource, n: number): number {
    return Math.floor(random() * n);
}

/**
 * Picks one element uniformly at random. The caller guarantees `items` is non-empty.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
    return items[randomIndex(random, items.length)];
}
