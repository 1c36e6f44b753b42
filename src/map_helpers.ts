/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { SequenceStateError } from './errors.js';

export type EntryPredicate<K, V> = (key: K, value: V) => boolean;

function _firstEntry<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>): [K, V] | undefined {
    for (const [key, value] of map) {
        if (predicate(key, value)) return [key, value];
    }
    return undefined;
}

function _singleEntry<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>): [K, V] | undefined {
    let match: [K, V] | undefined;
    for (const [key, value] of map) {
        if (!predicate(key, value)) continue;
        if (match !== undefined) {
            throw new SequenceStateError('Too many matches!');
        }
        match = [key, value];
    }
    return match;
}

function _orElse<R>(orElse: (() => R) | undefined): R {
    if (orElse) return orElse();
    throw new SequenceStateError('No entry satisfies the predicate!');
}

/**
 * The first entry, in insertion order, that satisfies `predicate`.
 * Falls back to `orElse`; without it a miss throws.
 * @throws {SequenceStateError} If nothing matches and no `orElse` is given.
 */
export function firstEntryWhere<K, V>(
    map: ReadonlyMap<K, V>,
    predicate: EntryPredicate<K, V>,
    orElse?: () => [K, V]
): [K, V] {
    return _firstEntry(map, predicate) ?? _orElse(orElse);
}

export function firstKeyWhere<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>, orElse?: () => K): K {
    const entry = _firstEntry(map, predicate);
    return entry ? entry[0] : _orElse(orElse);
}

export function firstValueWhere<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>, orElse?: () => V): V {
    const entry = _firstEntry(map, predicate);
    return entry ? entry[1] : _orElse(orElse);
}

/**
 * The only entry that satisfies `predicate`. A second match always throws,
 * even when `orElse` is given.
 * @throws {SequenceStateError} On more than one match, or on none without `orElse`.
 */
export function singleEntryWhere<K, V>(
    map: ReadonlyMap<K, V>,
    predicate: EntryPredicate<K, V>,
    orElse?: () => [K, V]
): [K, V] {
    return _singleEntry(map, predicate) ?? _orElse(orElse);
}

export function singleKeyWhere<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>, orElse?: () => K): K {
    const entry = _singleEntry(map, predicate);
    return entry ? entry[0] : _orElse(orElse);
}

export function singleValueWhere<K, V>(map: ReadonlyMap<K, V>, predicate: EntryPredicate<K, V>, orElse?: () => V): V {
    const entry = _singleEntry(map, predicate);
    return entry ? entry[1] : _orElse(orElse);
}

/**
 * Swaps keys and values. When several keys share a value, the last one in
 * insertion order wins.
 *
 * @example
 * ```typescript
 * reverseMap(new Map([['one', 1], ['two', 2]])); // Map { 1 => 'one', 2 => 'two' }
 * ```
 */
export function reverseMap<K, V>(map: ReadonlyMap<K, V>): Map<V, K> {
    const reversed = new Map<V, K>();
    for (const [key, value] of map) {
        reversed.set(value, key);
    }
    return reversed;
}

/**
 * Replaces every entry by the entries of the map `expand` returns for it,
 * merged in order into a new map. `map` is not modified.
 */
export function expandMap<K, V, RK, RV>(
    map: ReadonlyMap<K, V>,
    expand: (key: K, value: V) => ReadonlyMap<RK, RV>
): Map<RK, RV> {
    const expanded = new Map<RK, RV>();
    for (const [key, value] of map) {
        for (const [newKey, newValue] of expand(key, value)) {
            expanded.set(newKey, newValue);
        }
    }
    return expanded;
}
