import { DecoderKeyCharacter, PuzzleCharacter, evaluate, isMathProblem, puzzleCharacterToString } from './PuzzleCharacter';

/** The blank a student writes each answer on. */
export const ANSWER_BLANK = '______';

function heading(title: string): string[] {
    return [title, '-'.repeat(title.length), ''];
}

/**
 * Renders the decoder key block, one `A: (a x b) - (c x d) = ______` line per letter.
 */
export function renderDecoderKey(clues: DecoderKeyCharacter[]): string[] {
    return [
        ...heading('Decoder Key'),
        ...clues.map(c => `${c.letter}: ${puzzleCharacterToString(c.clue)} = ${ANSWER_BLANK}`),
    ];
}

/**
 * Renders the secret message block. Math problems get an answer blank; literals are printed as-is.
 */
export function renderPuzzle(puzzle: PuzzleCharacter[]): string[] {
    return [
        ...heading('Secret Message'),
        ...puzzle.map(c => isMathProblem(c) ? `${puzzleCharacterToString(c)} = ${ANSWER_BLANK}` : puzzleCharacterToString(c)),
    ];
}

/**
 * Renders a full worksheet: the decoder key, three blank lines, then the secret message.
 */
export function renderWorksheet(clues: DecoderKeyCharacter[], puzzle: PuzzleCharacter[]): string {
    return [...renderDecoderKey(clues), '', '', '', ...renderPuzzle(puzzle)].join('\n');
}

/**
 * Produces the answer key for a puzzle: each math problem is evaluated and looked up in the decoder key.
 * Literals are copied through. A result outside the key decodes to '?'.
 */
export function solvePuzzle(puzzle: PuzzleCharacter[], decoderKey: string): string {
    return puzzle.map(c => {
        const value = evaluate(c);
        if (value === undefined) return puzzleCharacterToString(c);
        return decoderKey.charAt(value - 1) || '?';
    }).join('');
}
