/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ContractError } from './errors.js';

function _escapeRegExp(source: string): string {
    return source.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds a RegExp matching any of `sources` literally. Longer sources are
 * tried first, so `['a', 'ab']` matches all of `'ab'`.
 *
 * @param flags - RegExp flags, e.g. `'gi'`.
 * @throws {ContractError} If `sources` is empty.
 */
export function regExpForMultipleMatches(sources: Iterable<string>, flags: string = ''): RegExp {
    const alternatives = Array.from(sources)
        .sort((a, b) => b.length - a.length)
        .map(_escapeRegExp);
    if (alternatives.length === 0) {
        throw new ContractError('At least one source is required.');
    }
    return new RegExp(alternatives.join('|'), flags);
}

/** Upper-cases the first character; the empty string is returned as is. */
export function capitalise(text: string): string {
    if (text.length === 0) return text;
    return text[0].toUpperCase() + text.slice(1);
}

/**
 * Splits around the first occurrence of `pattern`.
 *
 * @example
 * ```typescript
 * splitFirst('happy', 'p'); // ['ha', 'py']
 * splitFirst('happy', 'z'); // ['happy']
 * ```
 */
export function splitFirst(text: string, pattern: string): string[] {
    const index = text.indexOf(pattern);
    if (index === -1) return [text];
    return [text.slice(0, index), text.slice(index + pattern.length)];
}

/**
 * Splits around the last occurrence of `pattern`.
 *
 * @example
 * ```typescript
 * splitLast('happy', 'p'); // ['hap', 'y']
 * ```
 */
export function splitLast(text: string, pattern: string): string[] {
    const index = text.lastIndexOf(pattern);
    if (index === -1) return [text];
    return [text.slice(0, index), text.slice(index + pattern.length)];
}

/**
 * Collapses runs of spaces into one and trims both ends.
 *
 * @example
 * ```typescript
 * removeExtraSpace('I want   to   be  free.    '); // 'I want to be free.'
 * ```
 */
export function removeExtraSpace(text: string): string {
    return text
        .split(' ')
        .map(word => word.trim())
        .filter(word => word.length > 0)
        .join(' ');
}

/**
 * Splits by every one of `delimiters` and drops empty pieces. Empty
 * delimiters are ignored.
 *
 * @example
 * ```typescript
 * splitByAll('Happy, sad and angry', [',', ' ']); // ['Happy', 'sad', 'and', 'angry']
 * ```
 * @throws {ContractError} If no non-empty delimiter is given.
 */
export function splitByAll(text: string, delimiters: Iterable<string>): string[] {
    const usable = Array.from(delimiters).filter(delimiter => delimiter.length > 0);
    if (usable.length === 0) {
        throw new ContractError('The list of delimiters cannot be empty!');
    }
    return text
        .split(regExpForMultipleMatches(usable))
        .filter(piece => piece.length > 0);
}

export function startsWithOneOf(text: string, prefixes: Iterable<string>): boolean {
    for (const prefix of prefixes) {
        if (text.startsWith(prefix)) return true;
    }
    return false;
}

export function endsWithOneOf(text: string, suffixes: Iterable<string>): boolean {
    for (const suffix of suffixes) {
        if (text.endsWith(suffix)) return true;
    }
    return false;
}

/**
 * Replaces the last occurrence of `from` that starts at or before `endIndex`.
 *
 * @example
 * ```typescript
 * replaceLast('0.0001', '0', '7'); // '0.0071'
 * replaceLast('0.0001', '0', '7', 3); // '0.0701'
 * ```
 */
export function replaceLast(text: string, from: string, to: string, endIndex: number = text.length - 1): string {
    const index = text.lastIndexOf(from, endIndex);
    if (index === -1) return text;
    return text.slice(0, index) + to + text.slice(index + from.length);
}

/**
 * Every match of any of `values` in `text`, left to right.
 *
 * @example
 * ```typescript
 * matchAll('I am here', ['a', 'e']).map(match => match.index); // [2, 6, 8]
 * ```
 */
export function matchAll(text: string, values: Iterable<string>): RegExpMatchArray[] {
    return Array.from(text.matchAll(regExpForMultipleMatches(values, 'g')));
}
