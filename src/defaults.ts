/**
 * The 26 lowercase Latin letters, in order. Also the identity decoder key (a=1, b=2, ...).
 */
export const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/** Number of characters a decoder key must contain. */
export const DECODER_KEY_LENGTH = ALPHABET.length;

/**
 * The default digit range: the standard 12x12 times table without the 1s, which are too easy.
 */
export const DEFAULT_MIN_DIGIT = 2;
export const DEFAULT_MAX_DIGIT = 12;

/** How many random swaps are applied to the alphabet when shuffling a decoder key. */
export const DECODER_SHUFFLE_SWAPS = 100;
