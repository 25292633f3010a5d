import { PuzzleGenerator } from '../src/engine/Generator';
import {
    ConfigurationError,
    IncompleteDifferenceCoverageError,
    InvalidDecoderKeyLengthError,
    InvalidDigitRangeError,
    MultiCryptoError,
} from '../src/errors';
import { ALPHABET } from '../src/defaults';

describe('Validation', () => {
    it('should throw InvalidDecoderKeyLengthError for a 25-character key', () => {
        expect(() => new PuzzleGenerator(2, 12, ALPHABET.slice(1))).toThrow(InvalidDecoderKeyLengthError);
    });

    it('should throw InvalidDecoderKeyLengthError for a 27-character key', () => {
        expect(() => new PuzzleGenerator(2, 12, ALPHABET + 'a')).toThrow(InvalidDecoderKeyLengthError);
    });

    it('reports the bad key length', () => {
        let error: unknown;
        try {
            new PuzzleGenerator(2, 12, 'abc');
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(InvalidDecoderKeyLengthError);
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toBeInstanceOf(MultiCryptoError);
        if (error instanceof InvalidDecoderKeyLengthError) {
            expect(error.length).toBe(3);
            expect(error.name).toBe('InvalidDecoderKeyLengthError');
            expect(error.message).toBe('The decoder key must be 26 characters, got 3.');
        }
    });

    it('exposes the missing values on a coverage error', () => {
        let error: unknown;
        try {
            new PuzzleGenerator(2, 3, ALPHABET);
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(IncompleteDifferenceCoverageError);
        if (error instanceof IncompleteDifferenceCoverageError) {
            expect(error.missingValues).toHaveLength(23);
            expect(error.missingValues.slice(0, 3)).toEqual([1, 4, 6]);
        }
    });

    it('should throw InvalidDigitRangeError when min > max', () => {
        expect(() => new PuzzleGenerator(12, 2, ALPHABET)).toThrow(InvalidDigitRangeError);
    });

    it('should throw IncompleteDifferenceCoverageError for a range too narrow to reach 1..26', () => {
        expect(() => new PuzzleGenerator(2, 3, ALPHABET)).toThrow(IncompleteDifferenceCoverageError);
        expect(() => new PuzzleGenerator(5, 5, ALPHABET)).toThrow(IncompleteDifferenceCoverageError);
    });

    it('lists the unreachable values', () => {
        expect(() => new PuzzleGenerator(2, 3, ALPHABET)).toThrow(/cannot produce a difference of 1, 4, 6, 7,/);
    });

    it('checks the key length before the digit range', () => {
        expect(() => new PuzzleGenerator(12, 2, 'abc')).toThrow(InvalidDecoderKeyLengthError);
    });
});
