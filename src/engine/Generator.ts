import { ALPHABET, DECODER_KEY_LENGTH } from '../defaults';
import { IncompleteDifferenceCoverageError, InvalidDecoderKeyLengthError, PuzzleGenerationError } from '../errors';
import { DigitRange, MultiplicationOperation, ProductTable, PuzzleGeneratorOptions, RandomSource, SubtractionTable } from '../types';
import { buildProductTable, buildSubtractionTable, findUncoveredValues } from './Combinatorics';
import { findDuplicateLetters } from './DecoderKey';
import { DecoderKeyCharacter, MathProblemCharacter, PuzzleCharacter, literal, mathProblem, puzzleCharacterToString } from './PuzzleCharacter';
import { createDefaultRandom, mulberry32, pick } from './Random';

/**
 * Generates puzzles from phrases, where each letter is represented as a math problem
 * in the form `(a x b) - (c x d)`. The result is a number between 1 and 26: the
 * 1-based position of the letter in the decoder key.
 *
 * The product and subtraction tables are computed once, in the constructor, and are
 * read-only afterwards. Every generation call samples them again, so the same letter
 * gets a different problem each time it appears.
 */
export class PuzzleGenerator {
    private readonly random: RandomSource;
    private readonly onTrace?: (message: string) => void;
    private readonly products: ProductTable;
    private readonly subtractions: SubtractionTable;

    /**
     * Creates a new PuzzleGenerator.
     *
     * @param minDigit - The smallest number to use as a multiplication factor.
     * @param maxDigit - The largest number to use as a multiplication factor.
     * @param decoderKey - 26 characters, each letter standing for its 1-based position.
     *   With "abcdefg..." A=1, B=2; with "bdagq..." B=1, D=2, and so on. See
     *   `identityDecoderKey()` and `randomDecoderKey()`. The key is expected to be a
     *   permutation of the alphabet; duplicate letters are accepted but traced.
     * @param options - Random source and trace callback.
     * @throws {InvalidDecoderKeyLengthError} If the key is not 26 characters.
     * @throws {InvalidDigitRangeError} If minDigit > maxDigit.
     * @throws {IncompleteDifferenceCoverageError} If some value 1..26 cannot be produced.
     */
    constructor(
        public readonly minDigit: number,
        public readonly maxDigit: number,
        public readonly decoderKey: string,
        options: PuzzleGeneratorOptions = {}
    ) {
        if (decoderKey.length !== DECODER_KEY_LENGTH) {
            throw new InvalidDecoderKeyLengthError(decoderKey.length, DECODER_KEY_LENGTH);
        }

        this.onTrace = options.onTrace;
        this.random = options.random ?? (options.seed !== undefined ? mulberry32(options.seed) : createDefaultRandom());

        const duplicates = findDuplicateLetters(decoderKey);
        if (duplicates.length > 0) {
            this.trace(`PuzzleGenerator: decoder key repeats ${duplicates.join(', ')}; some letters cannot be encoded.`);
        }

        this.products = buildProductTable(minDigit, maxDigit);
        this.subtractions = buildSubtractionTable(this.products);

        const missing = findUncoveredValues(this.subtractions);
        if (missing.length > 0) {
            throw new IncompleteDifferenceCoverageError(minDigit, maxDigit, missing);
        }

        this.trace(`PuzzleGenerator: ${this.products.size} products and ${this.subtractions.reduce((n, s) => n + s.length, 0)} subtractions for digits ${minDigit}-${maxDigit}.`);
    }

    public get digitRange(): DigitRange {
        return { min: this.minDigit, max: this.maxDigit };
    }

    public getProductTable(): ProductTable {
        return this.products;
    }

    public getSubtractionTable(): SubtractionTable {
        return this.subtractions;
    }

    /**
     * Returns clues for the decoder key, with new random problems on each call.
     * The result is in alphabetical order: the first problem gives the value of A,
     * the second of B, and so on, whatever the order of the decoder key.
     *
     * @throws {PuzzleGenerationError} If a letter is missing from the decoder key.
     */
    public generateDecoderKey(): DecoderKeyCharacter[] {
        const result: DecoderKeyCharacter[] = [];
        for (const c of ALPHABET) {
            const index = this.decoderKey.indexOf(c);
            if (index < 0) {
                throw new PuzzleGenerationError(`Letter '${c}' does not appear in the decoder key '${this.decoderKey}'.`);
            }
            result.push({ letter: c.toUpperCase(), clue: this.expressionForIndex(index) });
        }
        return result;
    }

    /**
     * Builds a puzzle for the phrase, converting each letter to a math problem and
     * passing anything else (spaces, digits, punctuation) through as a literal.
     * The phrase is lowercased first.
     */
    public generatePuzzle(phrase: string): PuzzleCharacter[] {
        const result: PuzzleCharacter[] = [];
        for (const c of phrase.toLowerCase()) {
            const index = this.decoderKey.indexOf(c);
            if (index < 0) {
                result.push(literal(c));
            } else {
                result.push(this.expressionForIndex(index));
            }
        }
        return result;
    }

    /**
     * Returns a random math problem whose result is `index + 1`.
     *
     * @param index - 0-based position in the decoder key.
     * @throws {PuzzleGenerationError} If index is outside 0..25.
     */
    public expressionForIndex(index: number): MathProblemCharacter {
        if (!Number.isInteger(index) || index < 0 || index >= DECODER_KEY_LENGTH) {
            throw new PuzzleGenerationError(`Index ${index} is outside the decoder key (0-${DECODER_KEY_LENGTH - 1}).`);
        }

        // a random subtraction for this letter, then a random way to make each of its products
        const subtraction = pick(this.random, this.subtractions[index]);
        const left = pick(this.random, this.productsFor(subtraction.a));
        const right = pick(this.random, this.productsFor(subtraction.b));

        const problem = mathProblem(left.a, left.b, right.a, right.b);
        this.trace(`PuzzleGenerator: ${index + 1} = ${subtraction.a} - ${subtraction.b} = ${puzzleCharacterToString(problem)}`);
        return problem;
    }

    private productsFor(product: number): readonly MultiplicationOperation[] {
        const ways = this.products.get(product);
        if (!ways) {
            // Subtractions are built from the product table's own keys.
            throw new PuzzleGenerationError(`Product ${product} is not in the product table.`);
        }
        return ways;
    }

    private trace(message: string): void {
        if (this.onTrace) this.onTrace(message);
    }
}
