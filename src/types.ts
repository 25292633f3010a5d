/**
 * A source of uniformly distributed numbers in [0, 1), like `Math.random`.
 */
export type RandomSource = () => number;

/**
 * The inclusive range every multiplication operand is drawn from.
 */
export interface DigitRange {
    min: number;
    max: number;
}

/**
 * Two numbers being multiplied together (a x b).
 */
export interface MultiplicationOperation {
    a: number;
    b: number;
}

/**
 * One product subtracted from another (a - b), where both are keys of a {@link ProductTable}.
 */
export interface SubtractionOperation {
    a: number;
    b: number;
}

/**
 * Every achievable product, mapped to all the operand pairs producing it.
 * Both (i, j) and (j, i) are kept.
 */
export type ProductTable = ReadonlyMap<number, readonly MultiplicationOperation[]>;

/**
 * Entry `v - 1` holds every subtraction of two products that equals `v`, for v in 1..26.
 */
export type SubtractionTable = readonly (readonly SubtractionOperation[])[];

/**
 * Configuration options for a puzzle generator.
 */
export interface PuzzleGeneratorOptions {
    /**
     * Seed for the generator's own pseudo-random source.
     * Default: a fresh seed per generator, so separate generators and runs differ.
     */
    seed?: number;
    /**
     * A random source to draw from instead of a seeded one. Takes precedence over `seed`.
     */
    random?: RandomSource;
    /**
     * Callback for trace logs of construction and selection details.
     */
    onTrace?: (message: string) => void;
}
