import { ALPHABET, DECODER_SHUFFLE_SWAPS } from '../defaults';
import { RandomSource } from '../types';
import { createDefaultRandom, randomIndex } from './Random';

/**
 * Returns the standard A=1, B=2, ... decoder key.
 */
export function identityDecoderKey(): string {
    return ALPHABET;
}

/**
 * Returns a shuffled decoder key.
 *
 * The alphabet is shuffled by swapping two random positions a fixed number of times.
 * That is close to, but not exactly, a uniform permutation, which is fine for a puzzle.
 *
 * @param random - Source of randomness. Defaults to a freshly seeded source.
 */
export function randomDecoderKey(random: RandomSource = createDefaultRandom()): string {
    const letters = ALPHABET.split('');
    for (let i = 0; i < DECODER_SHUFFLE_SWAPS; i++) {
        const a = randomIndex(random, letters.length);
        const b = randomIndex(random, letters.length);
        [letters[a], letters[b]] = [letters[b], letters[a]];
    }
    return letters.join('');
}

/**
 * Returns the letters that appear more than once in a decoder key, in key order.
 * An empty result for a 26-character key means the key is a true permutation.
 */
export function findDuplicateLetters(decoderKey: string): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const c of decoderKey) {
        if (seen.has(c)) duplicates.add(c);
        seen.add(c);
    }
    return [...duplicates];
}
