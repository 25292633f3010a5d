/**
 * Enumeration of the two forms a puzzle character can take.
 */
export enum PuzzleCharacterType {
    /** A letter, encoded as a math problem in the form (a x b) - (c x d). */
    MATH_PROBLEM,
    /** Anything other than a letter, passed through unchanged. */
    LITERAL,
}

/**
 * A letter encoded as `(a x b) - (c x d)`. The result is the letter's 1-based position in the decoder key.
 * Example: with the key "klcnogdwprftyxqismjvehabzu", (3 x 5) - (2 x 3) = 9 encodes "p".
 */
export interface MathProblemCharacter {
    type: PuzzleCharacterType.MATH_PROBLEM;
    a: number;
    b: number;
    c: number;
    d: number;
}

/**
 * A character that is not in the decoder key (space, digit, punctuation), shown as-is.
 */
export interface LiteralCharacter {
    type: PuzzleCharacterType.LITERAL;
    text: string;
}

export type PuzzleCharacter = MathProblemCharacter | LiteralCharacter;

/**
 * The clue for one letter of the alphabet in the decoder key block.
 */
export interface DecoderKeyCharacter {
    /** Uppercase letter, A..Z. */
    letter: string;
    clue: MathProblemCharacter;
}

export function mathProblem(a: number, b: number, c: number, d: number): MathProblemCharacter {
    return { type: PuzzleCharacterType.MATH_PROBLEM, a, b, c, d };
}

export function literal(text: string): LiteralCharacter {
    return { type: PuzzleCharacterType.LITERAL, text };
}

/**
 * Whether this character is a math problem, and so needs an answer blank after it.
 */
export function isMathProblem(character: PuzzleCharacter): character is MathProblemCharacter {
    return character.type === PuzzleCharacterType.MATH_PROBLEM;
}

/**
 * Evaluates a math problem. Literals have no value.
 */
export function evaluate(character: PuzzleCharacter): number | undefined {
    if (!isMathProblem(character)) return undefined;
    return character.a * character.b - character.c * character.d;
}

/**
 * Formats a character: `(a x b) - (c x d)` for a math problem, the text itself for a literal.
 */
export function puzzleCharacterToString(character: PuzzleCharacter): string {
    switch (character.type) {
        case PuzzleCharacterType.MATH_PROBLEM:
            return `(${character.a} x ${character.b}) - (${character.c} x ${character.d})`;
        case PuzzleCharacterType.LITERAL:
            return character.text;
    }
}
