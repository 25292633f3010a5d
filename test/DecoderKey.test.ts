import { findDuplicateLetters, identityDecoderKey, randomDecoderKey } from '../src/engine/DecoderKey';
import { mulberry32 } from '../src/engine/Random';

describe('Decoder keys', () => {
    it('returns the alphabet as the identity key', () => {
        expect(identityDecoderKey()).toBe('abcdefghijklmnopqrstuvwxyz');
        expect(identityDecoderKey()).toBe(identityDecoderKey());
    });

    it('shuffles the alphabet into a 26-letter permutation', () => {
        const key = randomDecoderKey(mulberry32(42));

        expect(key).toMatch(/^[a-z]{26}$/);
        expect(key.split('').sort().join('')).toBe(identityDecoderKey());
        expect(findDuplicateLetters(key)).toEqual([]);
    });

    it('is deterministic for a given seed', () => {
        expect(randomDecoderKey(mulberry32(7))).toBe(randomDecoderKey(mulberry32(7)));
    });

    it('produces different keys for different seeds', () => {
        expect(randomDecoderKey(mulberry32(1))).not.toBe(randomDecoderKey(mulberry32(2)));
    });

    it('defaults to a freshly seeded source on every call', () => {
        const key = randomDecoderKey();
        expect(key).toHaveLength(26);
        expect(key).toMatch(/^[a-z]+$/);

        let same = 0;
        for (let i = 0; i < 100; i++) {
            if (randomDecoderKey() === randomDecoderKey()) same++;
        }
        expect(same).toBe(0);
    });

    it('finds repeated letters', () => {
        expect(findDuplicateLetters('aacdefghijklmnopqrstuvwxyy')).toEqual(['a', 'y']);
    });
});
