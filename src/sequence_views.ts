/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { ContractError, SequenceStateError, checkValidIndex } from './errors.js';

/**
 * A lazy, restartable view that maps each element of a source array together
 * with its index. Elements are computed on every access; the view keeps a
 * reference to the source rather than a copy.
 */
export class MappedListView<S, E> implements Iterable<S> {
	constructor(
		private readonly source: readonly E[],
		private readonly transform: (element: E, index: number) => S
	) {}

	public get length(): number {
		return this.source.length;
	}

	/**
	 * @throws {RangeError} If `index` is outside the source.
	 */
	public elementAt(index: number): S {
		checkValidIndex(index, this.source.length);
		return this.transform(this.source[index], index);
	}

	public *[Symbol.iterator](): Iterator<S> {
		for (let i = 0; i < this.source.length; i++) {
			yield this.transform(this.source[i], i);
		}
	}

	public toArray(): S[] {
		return Array.from(this);
	}
}

/**
 * A pair of values taken from the same position of two lists.
 */
export class ZippedContent<A, B> {
	constructor(
		public readonly first: A,
		public readonly second: B
	) {}

	public toString(): string {
		return `(${String(this.first)}, ${String(this.second)})`;
	}
}

/**
 * A lazy, restartable view pairing two equal-length arrays position by
 * position.
 */
export class ZippedListView<A, B> implements Iterable<ZippedContent<A, B>> {
	constructor(
		private readonly firstList: readonly A[],
		private readonly secondList: readonly B[]
	) {}

	/**
	 * @throws {SequenceStateError} If the two lists no longer have the same length.
	 */
	public get length(): number {
		if (this.firstList.length !== this.secondList.length) {
			throw new SequenceStateError(`The length of the two lists isn't the same anymore (${this.firstList.length} vs ${this.secondList.length}).`);
		}
		return this.firstList.length;
	}

	public elementAt(index: number): ZippedContent<A, B> {
		checkValidIndex(index, this.length);
		return new ZippedContent(this.firstList[index], this.secondList[index]);
	}

	public *[Symbol.iterator](): Iterator<ZippedContent<A, B>> {
		for (let i = 0; i < this.length; i++) {
			yield new ZippedContent(this.firstList[i], this.secondList[i]);
		}
	}

	public toArray(): ZippedContent<A, B>[] {
		return Array.from(this);
	}
}

/**
 * Lazily maps each element of `list` with its index.
 *
 * @example
 * ```typescript
 * mapWithIndex([5, 10, 12, 8, 5], (n, i) => n * i).toArray(); // [0, 10, 24, 24, 20]
 * ```
 */
export function mapWithIndex<E, S>(list: readonly E[], transform: (element: E, index: number) => S): MappedListView<S, E> {
	return new MappedListView(list, transform);
}

/**
 * Lazily pairs two lists of the same length.
 *
 * @example
 * ```typescript
 * const zipped = zipTwoLists([0, 1, 2], ['zero', 'one', 'two']);
 * zipped.elementAt(1).second; // 'one'
 * String(zipped.elementAt(2)); // '(2, two)'
 * ```
 * @throws {ContractError} If the lists have different lengths.
 */
export function zipTwoLists<A, B>(firstList: readonly A[], secondList: readonly B[]): ZippedListView<A, B> {
	if (firstList.length !== secondList.length) {
		throw new ContractError(`The length of the two lists isn't the same (${firstList.length} vs ${secondList.length}).`);
	}
	return new ZippedListView(firstList, secondList);
}
