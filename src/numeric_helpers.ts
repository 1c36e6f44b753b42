/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ContractError, SequenceStateError } from './errors.js';

function _reduce<T>(values: Iterable<T>, combine: (accumulated: T, value: T) => T): T {
    const iterator = values[Symbol.iterator]();
    const first = iterator.next();
    if (first.done === true) {
        throw new SequenceStateError('No element.');
    }
    let accumulated = first.value;
    for (let next = iterator.next(); next.done !== true; next = iterator.next()) {
        accumulated = combine(accumulated, next.value);
    }
    return accumulated;
}

function _gcd(a: number, b: number): number {
    let x = Math.abs(a);
    let y = Math.abs(b);
    while (y !== 0) [x, y] = [y, x % y];
    return x;
}

function _gcdBigInt(a: bigint, b: bigint): bigint {
    let x = a < 0n ? -a : a;
    let y = b < 0n ? -b : b;
    while (y !== 0n) [x, y] = [y, x % y];
    return x;
}

/** @throws {SequenceStateError} If `values` is empty. */
export function sum(values: Iterable<number>): number {
    return _reduce(values, (a, b) => a + b);
}

/** @throws {SequenceStateError} If `values` is empty. */
export function product(values: Iterable<number>): number {
    return _reduce(values, (a, b) => a * b);
}

/** @throws {SequenceStateError} If `values` is empty. */
export function min(values: Iterable<number>): number {
    return _reduce(values, (a, b) => Math.min(a, b));
}

/** @throws {SequenceStateError} If `values` is empty. */
export function max(values: Iterable<number>): number {
    return _reduce(values, (a, b) => Math.max(a, b));
}

/**
 * Divides every integer by the greatest common divisor of all of them, so
 * that the result has a gcd of 1. Signs are kept.
 *
 * @example
 * ```typescript
 * atLowestFactors([2, 112, 20]); // [1, 56, 10]
 * ```
 * @throws {ContractError} If any value is not an integer.
 * @throws {SequenceStateError} If `values` is empty or contains 0.
 */
export function atLowestFactors(values: Iterable<number>): number[] {
    const numbers = Array.from(values);
    for (const n of numbers) {
        if (!Number.isInteger(n)) {
            throw new ContractError(`atLowestFactors takes integers, got ${n}.`);
        }
    }
    const gcd = Math.abs(_reduce(numbers, (a, b) => {
        if (a === 0 || b === 0) {
            throw new SequenceStateError('None of the numbers can be zero.');
        }
        return _gcd(a, b);
    }));
    if (gcd === 0) {
        throw new SequenceStateError('None of the numbers can be zero.');
    }
    return numbers.map(n => n / gcd);
}

/**
 * `atLowestFactors` for arbitrarily large integers.
 * @throws {SequenceStateError} If `values` is empty or contains 0n.
 */
export function atLowestFactorsBigInt(values: Iterable<bigint>): bigint[] {
    const numbers = Array.from(values);
    const gcd = _gcdBigInt(_reduce(numbers, (a, b) => {
        if (a === 0n || b === 0n) {
            throw new SequenceStateError('None of the numbers can be zero.');
        }
        return _gcdBigInt(a, b);
    }), 0n);
    if (gcd === 0n) {
        throw new SequenceStateError('None of the numbers can be zero.');
    }
    return numbers.map(n => n / gcd);
}
