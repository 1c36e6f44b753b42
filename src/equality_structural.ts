/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { SequenceEquality, sameValueZero } from './sequence_equality.js';

function _isPlainObject(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object') return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Deep equality over arrays, Maps, Sets, Dates and plain objects.
 *
 * Arrays compare elementwise in order. Map keys are matched by SameValueZero
 * and their values compared structurally. Sets need the same size and every
 * member of one matched to a distinct, structurally equal member of the other.
 * Anything else falls back to SameValueZero.
 * Cyclic structures are not supported.
 */
export function structuralEquals(a: unknown, b: unknown): boolean {
    if (sameValueZero(a, b)) return true;

    if (Array.isArray(a) && Array.isArray(b)) {
        if (a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!structuralEquals(a[i], b[i])) return false;
        }
        return true;
    }

    if (a instanceof Map && b instanceof Map) {
        if (a.size !== b.size) return false;
        for (const [key, value] of a) {
            if (!b.has(key) || !structuralEquals(value, b.get(key))) return false;
        }
        return true;
    }

    if (a instanceof Set && b instanceof Set) {
        if (a.size !== b.size) return false;
        const unmatched = [...b];
        for (const member of a) {
            const at = unmatched.findIndex(candidate => structuralEquals(member, candidate));
            if (at === -1) return false;
            unmatched.splice(at, 1);
        }
        return true;
    }

    if (a instanceof Date && b instanceof Date) {
        return a.getTime() === b.getTime();
    }

    if (_isPlainObject(a) && _isPlainObject(b)) {
        const keysA = Object.keys(a);
        const keysB = Object.keys(b);
        if (keysA.length !== keysB.length) return false;
        for (const key of keysA) {
            if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
            if (!structuralEquals(a[key], b[key])) return false;
        }
        return true;
    }

    return false;
}

/**
 * Registers the deep `structural` equality strategy.
 *
 * @example
 * registerStructuralEqualityStrategy(SequenceEquality);
 * const comparator = new SequenceComparator({ equality: 'structural' });
 * comparator.shallowEquals([[0, 1], [2]], [[0, 1], [2]]); // true
 */
export function registerStructuralEqualityStrategy(Registry: typeof SequenceEquality): void {
    Registry.registerStrategy('structural', structuralEquals);
}
