/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { ContractError, SequenceStateError, checkValidIndex } from './errors.js';
import { SequenceEngine } from './sequence_engine.js';

function _hasDuplicateIndices(indices: readonly number[]): boolean {
	return new Set(indices).size !== indices.length;
}

function _factorial(n: number): number {
	let result = 1;
	for (let i = 2; i <= n; i++) result *= i;
	return result;
}

/**
 * Yields every ordering of `[0, n)` in lexicographic order, starting from the
 * identity. Each yielded array is a fresh copy.
 */
function* _indexPermutations(n: number): Generator<number[]> {
	const order = Array.from({ length: n }, (_, i) => i);
	yield order.slice();

	for (;;) {
		// Rightmost ascent.
		let k = n - 2;
		while (k >= 0 && order[k] > order[k + 1]) k--;
		if (k < 0) return;

		let l = n - 1;
		while (order[l] < order[k]) l--;
		[order[k], order[l]] = [order[l], order[k]];

		for (let lo = k + 1, hi = n - 1; lo < hi; lo++, hi--) {
			[order[lo], order[hi]] = [order[hi], order[lo]];
		}
		yield order.slice();
	}
}

/**
 * A lazy, restartable view of every ordering of a source array, in
 * lexicographic order of source positions.
 *
 * Each traversal (and each `elementAt` call) reads the source at that moment;
 * mutating the source while a traversal is in progress is not supported.
 * `length` is `n!`, which exceeds the safe integer range beyond n = 18.
 */
export class Permutations<T> implements Iterable<T[]> {
	constructor(private readonly source: readonly T[]) {}

	public get length(): number {
		return _factorial(this.source.length);
	}

	/**
	 * Decodes `k` in the factorial number system into the k-th ordering,
	 * without enumerating the ones before it.
	 * @throws {RangeError} If `k` is not an integer in `[0, n!)`.
	 */
	public elementAt(k: number): T[] {
		checkValidIndex(k, this.length, 'k');

		const remaining = Array.from({ length: this.source.length }, (_, i) => i);
		const result: T[] = [];
		let rest = k;
		for (let place = this.source.length; place > 0; place--) {
			const block = _factorial(place - 1);
			const digit = Math.floor(rest / block);
			rest %= block;
			const [position] = remaining.splice(digit, 1);
			result.push(this.source[position]);
		}
		return result;
	}

	public *[Symbol.iterator](): Iterator<T[]> {
		for (const order of _indexPermutations(this.source.length)) {
			yield order.map(i => this.source[i]);
		}
	}
}

/**
 * Reorders arrays: cyclic relocation of chosen positions, full reordering by
 * an index list, permutation enumeration and permutation distances.
 *
 * Mutating methods (`permute`, `swap`) check every argument before writing,
 * so a rejected call leaves the array untouched.
 *
 * @example
 * ```typescript
 * const engine = new PermutationEngine();
 * const sentence = ['I', 'would', 'have', 'known', 'not', 'that'];
 * engine.permute(sentence, [2, 3, 4]);
 * // ['I', 'would', 'not', 'have', 'known', 'that']
 * engine.withOrder(['I', 'went', 'there', 'yesterday'], [3, 0, 1, 2]);
 * // ['yesterday', 'I', 'went', 'there']
 * ```
 */
export class PermutationEngine extends SequenceEngine {
	protected readonly label = 'PermutationEngine';

	/**
	 * Moves the element at `indices[k]` to `indices[k + 1]` for each
	 * consecutive pair, and the element at the last index to `indices[0]`.
	 * Positions not listed are untouched. Fewer than two indices is a no-op.
	 *
	 * @throws {ContractError} If `indices` contains a duplicate.
	 * @throws {RangeError} If an index is not valid for `list`.
	 */
	public permute<T>(list: T[], indices: readonly number[]): void {
		if (indices.length < 2) return;
		if (_hasDuplicateIndices(indices)) {
			throw new ContractError('The list of indices has duplicates.');
		}
		for (let i = 0; i < indices.length; i++) {
			checkValidIndex(indices[i], list.length, `indices[${i}]`);
		}

		this._log(`permute cycle [${indices.join(', ')}]`);
		const last = list[indices[indices.length - 1]];
		for (let i = indices.length - 2; i >= 0; i--) {
			list[indices[i + 1]] = list[indices[i]];
		}
		list[indices[0]] = last;
	}

	/**
	 * Exchanges the elements at `i` and `j`.
	 * @throws {RangeError} If either index is not valid for `list`.
	 */
	public swap<T>(list: T[], i: number, j: number): void {
		checkValidIndex(i, list.length, 'i');
		checkValidIndex(j, list.length, 'j');
		if (i === j) return;
		[list[i], list[j]] = [list[j], list[i]];
	}

	/**
	 * Returns a new array whose element `i` is `list[newOrder[i]]`.
	 *
	 * `newOrder` must use every index of `list` exactly once.
	 *
	 * @throws {ContractError} If `newOrder` has duplicates or a different length.
	 * @throws {RangeError} If an entry is not a valid index.
	 */
	public withOrder<T>(list: readonly T[], newOrder: readonly number[]): T[] {
		if (_hasDuplicateIndices(newOrder)) {
			throw new ContractError('The new order has duplicate indices.');
		}
		if (newOrder.length !== list.length) {
			throw new ContractError(
				`The new order must contain every index of the list exactly once (expected ${list.length} indices, got ${newOrder.length}).`
			);
		}

		const reordered: T[] = [];
		for (let i = 0; i < newOrder.length; i++) {
			checkValidIndex(newOrder[i], list.length, `newOrder[${i}]`);
			reordered.push(list[newOrder[i]]);
		}
		return reordered;
	}

	/**
	 * All `n!` orderings of `list`, lazily.
	 *
	 * @example
	 * ```typescript
	 * [...engine.allPermutations([1, 2, 3])];
	 * // [[1, 2, 3], [1, 3, 2], [2, 1, 3], [2, 3, 1], [3, 1, 2], [3, 2, 1]]
	 * ```
	 */
	public allPermutations<T>(list: readonly T[]): Permutations<T> {
		return new Permutations(list);
	}

	/**
	 * All orderings of `list` except those elementwise equal to `list` itself.
	 * Restartable: every iteration starts a fresh enumeration.
	 */
	public otherPermutations<T>(list: readonly T[]): Iterable<T[]> {
		const permutations = this.allPermutations(list);
		const isOriginal = (candidate: readonly T[]): boolean =>
			candidate.every((element, i) => this.equals(element, list[i]));
		return {
			*[Symbol.iterator]() {
				for (const permutation of permutations) {
					if (!isOriginal(permutation)) yield permutation;
				}
			},
		};
	}

	/**
	 * Index of the first position where `list` and `permutation` disagree.
	 *
	 * `permutation` is assumed, not checked, to be a permutation of `list`.
	 *
	 * @throws {ContractError} If the lengths differ.
	 * @throws {SequenceStateError} If no position differs.
	 */
	public firstDifferenceTo<T>(list: readonly T[], permutation: readonly T[]): number {
		this._checkSameLength(list, permutation);
		for (let i = 0; i < list.length; i++) {
			if (!this.equals(list[i], permutation[i])) return i;
		}
		throw new SequenceStateError('The two lists are the same or are not permutations of each other.');
	}

	/**
	 * Number of positions where `list` and `permutation` disagree.
	 * @throws {ContractError} If the lengths differ.
	 */
	public distanceTo<T>(list: readonly T[], permutation: readonly T[]): number {
		this._checkSameLength(list, permutation);
		let distance = 0;
		for (let i = 0; i < list.length; i++) {
			if (!this.equals(list[i], permutation[i])) distance++;
		}
		return distance;
	}

	public allIndicesOf<T>(list: readonly T[], element: T): number[] {
		return this.allIndicesWhere(list, candidate => this.equals(candidate, element));
	}

	/**
	 * Every index, ascending, whose element satisfies `predicate`.
	 */
	public allIndicesWhere<T>(list: readonly T[], predicate: (element: T, index: number) => boolean): number[] {
		const matches: number[] = [];
		for (let i = 0; i < list.length; i++) {
			if (predicate(list[i], i)) matches.push(i);
		}
		return matches;
	}

	private _checkSameLength<T>(list: readonly T[], permutation: readonly T[]): void {
		if (list.length !== permutation.length) {
			throw new ContractError(`The two lists don't have the same length (${list.length} vs ${permutation.length}).`);
		}
	}
}
