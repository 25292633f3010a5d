import { DECODER_KEY_LENGTH } from '../defaults';
import { InvalidDigitRangeError } from '../errors';
import { MultiplicationOperation, ProductTable, SubtractionOperation, SubtractionTable } from '../types';

/**
 * Calculates every product of two numbers in [min, max], along with all the ways to get it.
 *
 * @throws {InvalidDigitRangeError} If min > max or either bound is not an integer.
 */
export function buildProductTable(min: number, max: number): ProductTable {
    if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
        throw new InvalidDigitRangeError(min, max);
    }

    const products = new Map<number, MultiplicationOperation[]>();
    for (let i = min; i <= max; i++) {
        for (let j = min; j <= max; j++) {
            const ixj = i * j;
            const ways = products.get(ixj);
            if (ways) {
                ways.push({ a: i, b: j });
            } else {
                products.set(ixj, [{ a: i, b: j }]);
            }
        }
    }
    return products;
}

/**
 * Finds, for each value 1..26, every pair of distinct products whose difference is that value.
 * Entry `v - 1` of the result holds the pairs for `v`. An entry is empty when the
 * product table cannot reach its value.
 */
export function buildSubtractionTable(products: ProductTable): SubtractionTable {
    const result: SubtractionOperation[][] = Array.from({ length: DECODER_KEY_LENGTH }, () => []);
    const keys = [...products.keys()];

    for (const i of keys) {
        for (const j of keys) {
            const difference = i - j;
            if (difference >= 1 && difference <= DECODER_KEY_LENGTH) {
                result[difference - 1].push({ a: i, b: j });
            }
        }
    }
    return result;
}

/**
 * Returns the values in 1..26 that have no subtraction in the table.
 */
export function findUncoveredValues(subtractions: SubtractionTable): number[] {
    const missing: number[] = [];
    for (let value = 1; value <= DECODER_KEY_LENGTH; value++) {
        if ((subtractions[value - 1]?.length ?? 0) === 0) missing.push(value);
    }
    return missing;
}
