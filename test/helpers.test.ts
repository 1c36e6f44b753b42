// test/helpers.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    sum, product, min, max, atLowestFactors, atLowestFactorsBigInt,
    firstEntryWhere, firstKeyWhere, firstValueWhere,
    singleEntryWhere, singleKeyWhere, singleValueWhere,
    reverseMap, expandMap,
    regExpForMultipleMatches, capitalise, splitFirst, splitLast, removeExtraSpace,
    splitByAll, startsWithOneOf, endsWithOneOf, replaceLast, matchAll,
    ContractError,
    SequenceStateError
} from '../src/index.js';

suite('Numeric helpers', () => {

    test('should reduce numbers', () => {
        assert.strictEqual(sum([1, 5, 8]), 14);
        assert.strictEqual(product([1, 5, 8]), 40);
        assert.strictEqual(min([4, -3, 9]), -3);
    });

    test('should return the true maximum', () => {
        // A max that reuses the min comparison would return -3 here.
        assert.strictEqual(max([4, -3, 9]), 9);
        assert.strictEqual(max(new Set([2])), 2);
    });

    test('should reject reductions over nothing', () => {
        assert.throws(() => sum([]), SequenceStateError);
        assert.throws(() => max([]), SequenceStateError);
    });

    test('should reduce integers to their lowest factors', () => {
        assert.deepStrictEqual(atLowestFactors([2, 112, 20]), [1, 56, 10]);
        assert.deepStrictEqual(atLowestFactors([-4, 6]), [-2, 3]);
        assert.deepStrictEqual(atLowestFactors([-5]), [-1]);
        assert.throws(() => atLowestFactors([3, 0, 6]), SequenceStateError);
        assert.throws(() => atLowestFactors([0]), SequenceStateError);
    });

    test('should reject non-integers before reducing', () => {
        assert.throws(() => atLowestFactors([NaN, 2]), ContractError);
        assert.throws(() => atLowestFactors([Infinity, 4]), ContractError);
        assert.throws(() => atLowestFactors([0.1, 0.3]), ContractError);
    });

    test('should reduce big integers to their lowest factors', () => {
        assert.deepStrictEqual(
            atLowestFactorsBigInt([2n, 111111111111111111111111111111112n, 20n]),
            [1n, 55555555555555555555555555555556n, 10n]
        );
        assert.throws(() => atLowestFactorsBigInt([0n, 2n]), SequenceStateError);
    });
});

suite('Map helpers', () => {

    const map = new Map([['first', 1], ['second', 2], ['third', 3], ['fourth', 4]]);

    test('should find the first matching entry, key and value', () => {
        assert.deepStrictEqual(firstEntryWhere(map, (_k, v) => v > 1), ['second', 2]);
        assert.strictEqual(firstKeyWhere(map, (_k, v) => v % 2 === 0), 'second');
        assert.strictEqual(firstValueWhere(map, k => k.startsWith('t')), 3);
    });

    test('should fall back to orElse or throw on a miss', () => {
        assert.strictEqual(firstKeyWhere(map, () => false, () => 'none'), 'none');
        assert.throws(() => firstValueWhere(map, () => false), SequenceStateError);
    });

    test('should find the single matching entry', () => {
        assert.deepStrictEqual(singleEntryWhere(map, (k, v) => k.length + v > 9), ['fourth', 4]);
        assert.strictEqual(singleKeyWhere(map, (_k, v) => v === 3), 'third');
        assert.strictEqual(singleValueWhere(map, k => k === 'first'), 1);
    });

    test('should reject more than one match even with orElse', () => {
        assert.throws(() => singleKeyWhere(map, (_k, v) => v > 2, () => 'fallback'), SequenceStateError);
        assert.strictEqual(singleValueWhere(map, () => false, () => 0), 0);
    });

    test('should reverse keys and values, last key winning', () => {
        assert.deepStrictEqual(reverseMap(map), new Map([[1, 'first'], [2, 'second'], [3, 'third'], [4, 'fourth']]));
        assert.deepStrictEqual(reverseMap(new Map([['a', 1], ['b', 1]])), new Map([[1, 'b']]));
    });

    test('should expand every entry into a new map', () => {
        const expanded = expandMap(new Map([['x', 2]]), (key, value) => new Map([[key, value], [key.toUpperCase(), value * 10]]));
        assert.deepStrictEqual(expanded, new Map([['x', 2], ['X', 20]]));
    });
});

suite('String helpers', () => {

    test('should capitalise the first letter', () => {
        assert.strictEqual(capitalise('hello'), 'Hello');
        assert.strictEqual(capitalise(''), '');
    });

    test('should split around the first and last occurrence', () => {
        assert.deepStrictEqual(splitFirst('happy', 'p'), ['ha', 'py']);
        assert.deepStrictEqual(splitFirst('happy', 'pp'), ['ha', 'y']);
        assert.deepStrictEqual(splitFirst('happy', 'z'), ['happy']);
        assert.deepStrictEqual(splitLast('happy', 'p'), ['hap', 'y']);
        assert.deepStrictEqual(splitLast('happy', 'pp'), ['ha', 'y']);
        assert.deepStrictEqual(splitLast('happy', 'z'), ['happy']);
    });

    test('should remove extra spaces', () => {
        assert.strictEqual(removeExtraSpace('  I       want  to     leave.       '), 'I want to leave.');
    });

    test('should split by every delimiter', () => {
        assert.deepStrictEqual(splitByAll('Happy, sad and angry', [',', ' ']), ['Happy', 'sad', 'and', 'angry']);
        assert.deepStrictEqual(splitByAll('a.b|c', ['.', '|', '']), ['a', 'b', 'c']);
        assert.throws(() => splitByAll('abc', []), ContractError);
        assert.throws(() => splitByAll('abc', ['']), ContractError);
    });

    test('should check prefixes and suffixes against several candidates', () => {
        assert.strictEqual(startsWithOneOf('value', ['b', 'v', 'l']), true);
        assert.strictEqual(startsWithOneOf('value', ['a', 'e']), false);
        assert.strictEqual(endsWithOneOf('value', ['a', 'e']), true);
        assert.strictEqual(endsWithOneOf('value', ['b', 'v']), false);
    });

    test('should replace the last occurrence', () => {
        assert.strictEqual(replaceLast('0.0001', '0', '7'), '0.0071');
        assert.strictEqual(replaceLast('0.0001', '0', '7', 3), '0.0701');
        assert.strictEqual(replaceLast('abc', 'z', '7'), 'abc');
    });

    test('should match every value', () => {
        const value = removeExtraSpace('  I       want  to     leave.       ');
        assert.deepStrictEqual(matchAll(value, ['a', 'e', 'i', 'o', 'u']).map(match => match.index), [3, 8, 11, 12, 14]);
        assert.deepStrictEqual(matchAll('I am here', ['a', 'e']).map(match => match.index), [2, 6, 8]);
    });

    test('should build a literal, longest-first pattern', () => {
        assert.strictEqual(regExpForMultipleMatches(['a', 'a.b']).source, 'a\\.b|a');
        assert.deepStrictEqual('xa.by'.match(regExpForMultipleMatches(['a', 'a.b']))?.[0], 'a.b');
        assert.throws(() => regExpForMultipleMatches([]), ContractError);
    });
});
