/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { checkValidRange } from './errors.js';
import { SequenceEngine } from './sequence_engine.js';

/**
 * Decides whether `current` joins the partition that `previous` closes.
 * `index` is the position of `previous`.
 */
export type PartitionPredicate<T> = (
	previous: T,
	current: T,
	index: number,
	partition: readonly T[]
) => boolean;

/**
 * Rewrites ranges of an array in place and groups adjacent elements.
 *
 * @example
 * ```typescript
 * const reorganizer = new RangeReorganizer();
 * const fruits = ['apple', 'banana', 'carrot', 'mango', 'pineapple'];
 * reorganizer.replaceElementsByReorganisation(fruits, 1, 3, [1, 0]);
 * // ['apple', 'carrot', 'banana', 'mango', 'pineapple']
 * ```
 */
export class RangeReorganizer extends SequenceEngine {
	protected readonly label = 'RangeReorganizer';

	/**
	 * Replaces `list[startIndex..endIndex)` by the elements of that range
	 * picked in the order `changeArray` gives, each entry being an offset from
	 * `startIndex`. Offsets are read against the range as it was before the
	 * call, and may repeat or be left out, so the array can grow or shrink.
	 *
	 * @throws {RangeError} If the range is invalid or an offset falls outside it.
	 */
	public replaceElementsByReorganisation<T>(
		list: T[],
		startIndex: number,
		endIndex: number,
		changeArray: readonly number[]
	): void {
		checkValidRange(startIndex, endIndex, list.length);
		const width = endIndex - startIndex;
		for (let i = 0; i < changeArray.length; i++) {
			const offset = changeArray[i];
			if (!Number.isInteger(offset) || offset < 0 || offset >= width) {
				throw new RangeError(`changeArray[${i}] (${offset}) must be within the replaced range [0, ${width}).`);
			}
		}

		const replacement = changeArray.map(offset => list[startIndex + offset]);
		this._log(`replace [${startIndex}, ${endIndex}) with ${replacement.length} elements`);
		const tail = list.slice(endIndex);
		list.length = startIndex;
		for (const element of replacement) list.push(element);
		for (const element of tail) list.push(element);
	}

	/**
	 * Splits `list` into runs of adjacent elements. A new run starts whenever
	 * `predicate` returns `false` for a pair of neighbours. Without a
	 * predicate, neighbours stay together while they are equal under the
	 * configured equality strategy.
	 *
	 * The runs are new arrays; `list` is not modified.
	 *
	 * @example
	 * ```typescript
	 * reorganizer.partitionInOrder([1, 2, 3, 5, 6, 10, 12, 13], (prev, cur) => prev + 1 === cur);
	 * // [[1, 2, 3], [5, 6], [10], [12, 13]]
	 * reorganizer.partitionInOrder(['a', 'a', 'b', 'a']);
	 * // [['a', 'a'], ['b'], ['a']]
	 * ```
	 */
	public partitionInOrder<T>(
		list: readonly T[],
		predicate: PartitionPredicate<T> = (previous, current) => this.equals(previous, current)
	): T[][] {
		if (list.length === 0) return [];

		const partitions: T[][] = [];
		let current: T[] = [list[0]];
		for (let i = 0; i < list.length - 1; i++) {
			if (predicate(list[i], list[i + 1], i, current)) {
				current.push(list[i + 1]);
			} else {
				partitions.push(current);
				current = [list[i + 1]];
			}
		}
		partitions.push(current);
		return partitions;
	}

	/**
	 * Inserts `addition` between every two adjacent elements of `list`, in
	 * place; nothing is added before the first or after the last element.
	 */
	public addWithin<T>(list: T[], addition: T): void {
		const length = list.length;
		for (let i = 0; i < length - 1; i++) {
			list.splice(2 * i + 1, 0, addition);
		}
	}

	/** Replaces every element of `list` by `transform(element, index)`, in place. */
	public updateAll<T>(list: T[], transform: (element: T, index: number) => T): void {
		for (let i = 0; i < list.length; i++) {
			list[i] = transform(list[i], i);
		}
	}
}
