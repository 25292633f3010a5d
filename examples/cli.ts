import { PuzzleGenerator } from '../src/engine/Generator';
import { identityDecoderKey, randomDecoderKey } from '../src/engine/DecoderKey';
import { mulberry32 } from '../src/engine/Random';
import { renderWorksheet } from '../src/engine/Renderer';
import { DEFAULT_MAX_DIGIT, DEFAULT_MIN_DIGIT } from '../src/defaults';
import { MultiCryptoError } from '../src/errors';

// Usage: cli.ts "<phrase>" [--seed <n>] [--alphabetic] [--verbose]
const args = process.argv.slice(2);
const phrase = args.find((a, i) => !a.startsWith('--') && args[i - 1] !== '--seed');
const seedIdx = args.indexOf('--seed');
const seed = seedIdx >= 0 ? Number(args[seedIdx + 1]) : Date.now();

if (!phrase) {
    console.error('Need a word or phrase!');
    process.exit(1);
}
if (Number.isNaN(seed)) {
    console.error(`Invalid seed: ${args[seedIdx + 1]}`);
    process.exit(1);
}

const random = mulberry32(seed);
const decoderKey = args.includes('--alphabetic') ? identityDecoderKey() : randomDecoderKey(random);

try {
    // the standard 12x12 times table, but without 1x's, since that's too easy!
    const generator = new PuzzleGenerator(DEFAULT_MIN_DIGIT, DEFAULT_MAX_DIGIT, decoderKey, {
        random,
        onTrace: args.includes('--verbose') ? message => console.error(message) : undefined,
    });

    console.log(renderWorksheet(generator.generateDecoderKey(), generator.generatePuzzle(phrase)));
} catch (e) {
    if (e instanceof MultiCryptoError) {
        console.error(`Oops! Something went wrong building the puzzle: ${e.message}`);
        process.exit(1);
    }
    throw e;
}
