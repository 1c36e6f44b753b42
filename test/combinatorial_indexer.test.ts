// test/combinatorial_indexer.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    CombinatorialIndexer,
    ContractError,
    SequenceStateError
} from '../src/index.js';

suite('CombinatorialIndexer: spreadAndCombine', () => {

    const indexer = new CombinatorialIndexer();
    const rows = [[1, 2], [3], [4, 5, 6]];

    test('should combine rows in odometer order', () => {
        assert.deepStrictEqual(indexer.spreadAndCombine(rows), [
            [1, 3, 4], [1, 3, 5], [1, 3, 6],
            [2, 3, 4], [2, 3, 5], [2, 3, 6]
        ]);
    });

    test('should wrap a single row element by element', () => {
        assert.deepStrictEqual(indexer.spreadAndCombine([['a', 'b']]), [['a'], ['b']]);
    });

    test('should count combinations without building them', () => {
        assert.strictEqual(indexer.combinationCount(rows), 6);
        assert.strictEqual(indexer.combinationCount([[1, 2, 3], [4, 5], [6, 7]]), 12);
    });

    test('should reject missing or empty rows', () => {
        assert.throws(() => indexer.spreadAndCombine([]), ContractError);
        assert.throws(() => indexer.spreadAndCombine([[], [1]]), ContractError);
        assert.throws(() => indexer.spreadAndCombine([[1], []]), ContractError);
        assert.throws(() => indexer.spreadAndCombineAtIndex([[1], []], 0), ContractError);
    });
});

suite('CombinatorialIndexer: index mapping', () => {

    const indexer = new CombinatorialIndexer();
    const rows = [[1, 2], [3], [4, 5, 6]];

    test('should decode a flat index', () => {
        assert.deepStrictEqual(indexer.spreadAndCombineAtIndex(rows, 0), [1, 3, 4]);
        assert.deepStrictEqual(indexer.spreadAndCombineAtIndex(rows, 4), [2, 3, 5]);
        assert.deepStrictEqual(indexer.spreadAndCombineAtIndex(rows, 5), [2, 3, 6]);
    });

    test('should encode a tuple', () => {
        assert.strictEqual(indexer.spreadAndCombineToIndex(rows, [1, 3, 4]), 0);
        assert.strictEqual(indexer.spreadAndCombineToIndex(rows, [2, 3, 5]), 4);
    });

    test('should agree with the materialised combinations in both directions', () => {
        const wide = [['a', 'b', 'c'], ['d', 'e'], ['f'], ['g', 'h']];
        const combined = indexer.spreadAndCombine(wide);
        assert.strictEqual(combined.length, indexer.combinationCount(wide));
        for (let i = 0; i < combined.length; i++) {
            assert.deepStrictEqual(indexer.spreadAndCombineAtIndex(wide, i), combined[i]);
            assert.strictEqual(indexer.spreadAndCombineToIndex(wide, combined[i]), i);
            assert.strictEqual(indexer.spreadAndCombineToIndex(wide, indexer.spreadAndCombineAtIndex(wide, i)), i);
        }
    });

    test('should reject out-of-range indices', () => {
        assert.throws(() => indexer.spreadAndCombineAtIndex(rows, 6), RangeError);
        assert.throws(() => indexer.spreadAndCombineAtIndex(rows, -1), RangeError);
        assert.throws(() => indexer.spreadAndCombineAtIndex(rows, 2.5), RangeError);
    });

    test('should reject values absent from their row', () => {
        assert.throws(() => indexer.spreadAndCombineToIndex(rows, [1, 4, 4]), SequenceStateError);
    });

    test('should reject tuples of the wrong length', () => {
        assert.throws(() => indexer.spreadAndCombineToIndex(rows, [1, 3]), ContractError);
    });

    test('should resolve duplicates within a row to the first match', () => {
        const duplicated = [['x', 'x'], ['y', 'z']];
        assert.strictEqual(indexer.spreadAndCombineToIndex(duplicated, ['x', 'z']), 1);
    });
});

suite('CombinatorialIndexer: allChoices', () => {

    const indexer = new CombinatorialIndexer();

    test('should list every subset by size', () => {
        assert.deepStrictEqual(indexer.allChoices([1, 2]), [[], [1], [2], [1, 2]]);
    });

    test('should order subsets of one size by position', () => {
        assert.deepStrictEqual(indexer.allChoices(['a', 'b', 'c']), [
            [],
            ['a'], ['b'], ['c'],
            ['a', 'b'], ['a', 'c'], ['b', 'c'],
            ['a', 'b', 'c']
        ]);
    });

    test('should give the empty choice for an empty list', () => {
        assert.deepStrictEqual(indexer.allChoices([]), [[]]);
    });

    test('should produce 2^n choices', () => {
        assert.strictEqual(indexer.allChoices([1, 2, 3, 4, 5]).length, 32);
    });
});
