export * from './types';
export * from './engine/PuzzleCharacter';
export * from './engine/Random';
export * from './engine/DecoderKey';
export * from './engine/Combinatorics';
export * from './engine/Generator';
export * from './engine/Renderer';
export * from './defaults';
export * from './errors';
