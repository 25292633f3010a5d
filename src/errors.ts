/**
 * Base error class for the MultiCrypto puzzle library.
 */
export class MultiCryptoError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MultiCryptoError';
    }
}

/**
 * Thrown when a generator cannot be built from the provided configuration.
 */
export class ConfigurationError extends MultiCryptoError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when the digit range is reversed or its bounds are not integers.
 */
export class InvalidDigitRangeError extends ConfigurationError {
    constructor(public readonly min: number, public readonly max: number) {
        super(`Invalid digit range [${min}, ${max}]: bounds must be integers with min <= max.`);
        this.name = 'InvalidDigitRangeError';
    }
}

/**
 * Thrown when the decoder key does not have exactly one character per letter.
 */
export class InvalidDecoderKeyLengthError extends ConfigurationError {
    constructor(public readonly length: number, expected: number) {
        super(`The decoder key must be ${expected} characters, got ${length}.`);
        this.name = 'InvalidDecoderKeyLengthError';
    }
}

/**
 * Thrown when the digit range cannot express every value from 1 to 26
 * as a difference of two products.
 */
export class IncompleteDifferenceCoverageError extends ConfigurationError {
    constructor(public readonly min: number, public readonly max: number, public readonly missingValues: number[]) {
        super(`Digit range [${min}, ${max}] cannot produce a difference of ${missingValues.join(', ')}.`);
        this.name = 'IncompleteDifferenceCoverageError';
    }
}

/**
 * Thrown when a generation call is made with input the generator cannot encode.
 */
export class PuzzleGenerationError extends MultiCryptoError {
    constructor(message: string) {
        super(message);
        this.name = 'PuzzleGenerationError';
    }
}
