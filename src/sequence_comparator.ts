/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { ContractError, SequenceStateError } from './errors.js';
import { SequenceEngine } from './sequence_engine.js';

function _toArray<T>(items: Iterable<T>): readonly T[] {
	return Array.isArray(items) ? items : Array.from(items);
}

/**
 * Compares two ordered sequences: locates the single element that separates
 * two near-equal sequences, and matches sub-lists, prefixes and suffixes.
 *
 * All methods accept any iterable; iterables that are not arrays are read once
 * into an array before comparing.
 *
 * @example
 * ```typescript
 * const comparator = new SequenceComparator();
 * comparator.findSingleMissingFrom([1, 2, 4], [1, 2, 3, 4]); // 2
 * comparator.findSingleSwappedFrom([1, 2, 3], [1, 2, 4]); // 2
 * comparator.containsInOrder([1, 2, 3, 4, 2], [2, 3, 4]); // true
 * ```
 */
export class SequenceComparator extends SequenceEngine {
	protected readonly label = 'SequenceComparator';

	/**
	 * Finds the index of the single element of `other` that is missing from `self`.
	 *
	 * `self` must be exactly one element shorter than `other`, and the two must
	 * agree in order once that element is skipped.
	 *
	 * @returns The index, in `other`, of the missing element.
	 * @throws {ContractError} If `self` is not one element shorter than `other`.
	 * @throws {SequenceStateError} If the sequences are identical or differ in more than one place.
	 */
	public findSingleMissingFrom<T>(self: Iterable<T>, other: Iterable<T>): number {
		return this._findSingleDifference(_toArray(self), _toArray(other), 'this', 'the provided');
	}

	/**
	 * Finds the index of the single element of `self` that is absent from `other`.
	 *
	 * @returns The index, in `self`, of the extra element.
	 * @throws {ContractError} If `self` is not one element longer than `other`.
	 * @throws {SequenceStateError} If the sequences are identical or differ in more than one place.
	 */
	public findSingleExtraFrom<T>(self: Iterable<T>, other: Iterable<T>): number {
		return this._findSingleDifference(_toArray(other), _toArray(self), 'the provided', 'this');
	}

	/**
	 * Finds the only position at which two equal-length sequences disagree.
	 *
	 * @throws {ContractError} If the lengths differ.
	 * @throws {SequenceStateError} If the sequences are identical or differ in more than one position.
	 */
	public findSingleSwappedFrom<T>(self: Iterable<T>, other: Iterable<T>): number {
		const left = _toArray(self);
		const right = _toArray(other);
		if (left.length !== right.length) {
			throw new ContractError(`The two sequences must have the same length (${left.length} vs ${right.length}).`);
		}

		let differentIndex: number | undefined;
		for (let i = 0; i < left.length; i++) {
			if (this.equals(left[i], right[i])) continue;
			if (differentIndex !== undefined) {
				throw new SequenceStateError(`The two sequences differ at more than one position (${differentIndex} and ${i}).`);
			}
			differentIndex = i;
		}

		if (differentIndex === undefined) {
			throw new SequenceStateError('The two sequences are identical: no difference found.');
		}
		this._log(`findSingleSwappedFrom -> ${differentIndex}`);
		return differentIndex;
	}

	/**
	 * Returns `true` if the elements of `subset` appear in `self` in the same
	 * order as one uninterrupted run.
	 *
	 * `self` is read in a single pass. A cursor tracks how much of `subset` has
	 * matched so far; on a mismatch it falls back to the longest prefix of
	 * `subset` that is still a suffix of what was matched, so overlapping
	 * candidates are never skipped.
	 *
	 * An empty `subset` matches only an empty `self`.
	 */
	public containsInOrder<T>(self: Iterable<T>, subset: Iterable<T>): boolean {
		const pattern = _toArray(subset);
		if (pattern.length === 0) {
			return self[Symbol.iterator]().next().done === true;
		}

		const fallback = this._buildFallbackTable(pattern);
		let matched = 0;
		for (const element of self) {
			while (matched > 0 && !this.equals(element, pattern[matched])) {
				matched = fallback[matched - 1];
			}
			if (this.equals(element, pattern[matched])) {
				matched++;
				if (matched === pattern.length) return true;
			}
		}
		return false;
	}

	/**
	 * Returns `true` if `self` is at least as long as `prefix` and agrees with
	 * it on every one of its elements.
	 */
	public startsWith<T>(self: Iterable<T>, prefix: Iterable<T>): boolean {
		const selfIterator = self[Symbol.iterator]();
		for (const expected of prefix) {
			const next = selfIterator.next();
			if (next.done === true || !this.equals(next.value, expected)) return false;
		}
		return true;
	}

	/**
	 * Returns `true` if the last elements of `self` are those of `suffix`, in order.
	 */
	public endsWith<T>(self: readonly T[], suffix: readonly T[]): boolean {
		if (self.length < suffix.length) return false;
		const offset = self.length - suffix.length;
		for (let i = 0; i < suffix.length; i++) {
			if (!this.equals(self[offset + i], suffix[i])) return false;
		}
		return true;
	}

	/**
	 * Returns `true` if both sequences have the same length and are elementwise
	 * equal in order. Nested collections are compared by the configured
	 * strategy, so `[[0]]` and `[[0]]` differ unless it is `structural`.
	 */
	public shallowEquals<T>(a: Iterable<T>, b: Iterable<T>): boolean {
		const left = _toArray(a);
		const right = _toArray(b);
		if (left.length !== right.length) return false;
		for (let i = 0; i < left.length; i++) {
			if (!this.equals(left[i], right[i])) return false;
		}
		return true;
	}

	/**
	 * Returns `true` if both iterables yield the same number of elements,
	 * stepping through them in lockstep.
	 */
	public hasSameLengthAs<A, B>(a: Iterable<A>, b: Iterable<B>): boolean {
		const left = a[Symbol.iterator]();
		const right = b[Symbol.iterator]();
		for (;;) {
			const leftDone = left.next().done === true;
			const rightDone = right.next().done === true;
			if (leftDone || rightDone) return leftDone === rightDone;
		}
	}

	/**
	 * Walks `shorter` and `longer` with independent cursors. A mismatch (or
	 * running off the end of `shorter`) advances only the `longer` cursor and
	 * records its index.
	 * @private
	 */
	private _findSingleDifference<T>(
		shorter: readonly T[], longer: readonly T[],
		shorterLabel: string, longerLabel: string
	): number {
		if (longer.length !== shorter.length + 1) {
			if (longer.length === shorter.length && this.shallowEquals(shorter, longer)) {
				throw new SequenceStateError('The two sequences are identical: no difference found.');
			}
			throw new ContractError(
				`The length of ${longerLabel} sequence (${longer.length}) must be one more than the length of ${shorterLabel} sequence (${shorter.length}).`
			);
		}

		this._group(`_findSingleDifference shorter=${shorter.length} longer=${longer.length}`);
		let shorterCursor = 0;
		let longerCursor = 0;
		let index: number | undefined;
		while (longerCursor < longer.length) {
			if (shorterCursor < shorter.length && this.equals(shorter[shorterCursor], longer[longerCursor])) {
				shorterCursor++;
				longerCursor++;
				continue;
			}
			if (index !== undefined) {
				this._groupEnd();
				throw new SequenceStateError(`The two sequences have more than one different element (${index} and ${longerCursor}).`);
			}
			this._log(`divergence at ${longerCursor}`);
			index = longerCursor;
			longerCursor++;
		}
		this._groupEnd();

		if (index === undefined) {
			throw new SequenceStateError('The two sequences are identical: no difference found.');
		}
		return index;
	}

	/**
	 * `table[k]` is the length of the longest proper prefix of `pattern` that
	 * is also a suffix of `pattern.slice(0, k + 1)`.
	 * @private
	 */
	private _buildFallbackTable<T>(pattern: readonly T[]): number[] {
		const table = new Array<number>(pattern.length).fill(0);
		let length = 0;
		for (let i = 1; i < pattern.length; i++) {
			while (length > 0 && !this.equals(pattern[i], pattern[length])) {
				length = table[length - 1];
			}
			if (this.equals(pattern[i], pattern[length])) length++;
			table[i] = length;
		}
		return table;
	}
}
