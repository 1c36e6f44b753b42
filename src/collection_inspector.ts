/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { SequenceStateError } from './errors.js';
import { SequenceEngine } from './sequence_engine.js';

/**
 * Counting, existence and selection helpers over iterables and sets. Element
 * comparisons go through the configured equality strategy.
 */
export class CollectionInspector extends SequenceEngine {
	protected readonly label = 'CollectionInspector';

	/** `true` if `items` yields exactly one element. */
	public isSingle<T>(items: Iterable<T>): boolean {
		const iterator = items[Symbol.iterator]();
		if (iterator.next().done === true) return false;
		return iterator.next().done === true;
	}

	public count<T>(items: Iterable<T>, element: T): number {
		return this.countWhere(items, item => this.equals(item, element));
	}

	public countWhere<T>(items: Iterable<T>, predicate: (element: T) => boolean): number {
		let count = 0;
		for (const item of items) {
			if (predicate(item)) count++;
		}
		return count;
	}

	public hasDuplicates<T>(items: Iterable<T>): boolean {
		return this._hasDuplicates(Array.from(items));
	}

	/**
	 * `true` if every element of each list is found in the other, ignoring
	 * order and multiplicity.
	 */
	public hasSameElementsAs<T>(a: readonly T[], b: readonly T[]): boolean {
		return a.every(element => this._indexOf(b, element) !== -1)
			&& b.every(element => this._indexOf(a, element) !== -1);
	}

	/**
	 * `true` if both sets have the same members. Membership follows the sets'
	 * own SameValueZero rule.
	 */
	public setEquals<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
		if (a.size !== b.size) return false;
		for (const member of a) {
			if (!b.has(member)) return false;
		}
		return true;
	}

	/**
	 * The first element whose `selector` result is neither `null` nor `undefined`.
	 * @throws {SequenceStateError} If there is none.
	 */
	public firstWhereNotNull<T, L>(items: Iterable<T>, selector: (element: T) => L | null | undefined): T {
		for (const item of items) {
			if (selector(item) != null) return item;
		}
		throw new SequenceStateError('No element has a non-null value.');
	}

	/** Lazily keeps the elements whose `selector` result is not null. */
	public whereNotNull<T, L>(items: Iterable<T>, selector: (element: T) => L | null | undefined): Iterable<T> {
		return {
			*[Symbol.iterator]() {
				for (const item of items) {
					if (selector(item) != null) yield item;
				}
			},
		};
	}

	/**
	 * The element with the smallest `score`; the first one wins a tie.
	 * @throws {SequenceStateError} If `items` is empty.
	 */
	public smallestWhere<T>(items: Iterable<T>, score: (element: T) => number): T {
		return this._extremeWhere(items, score, (candidate, best) => candidate < best);
	}

	/**
	 * The element with the largest `score`; the first one wins a tie.
	 * @throws {SequenceStateError} If `items` is empty.
	 */
	public largestWhere<T>(items: Iterable<T>, score: (element: T) => number): T {
		return this._extremeWhere(items, score, (candidate, best) => candidate > best);
	}

	/** Sum of `value(element)` over `items`; 0 when empty. */
	public sumWhere<T>(items: Iterable<T>, value: (element: T) => number): number {
		let total = 0;
		for (const item of items) total += value(item);
		return total;
	}

	/** Product of `value(element)` over `items`; 1 when empty. */
	public productWhere<T>(items: Iterable<T>, value: (element: T) => number): number {
		let total = 1;
		for (const item of items) total *= value(item);
		return total;
	}

	private _extremeWhere<T>(
		items: Iterable<T>,
		score: (element: T) => number,
		isBetter: (candidate: number, best: number) => boolean
	): T {
		const iterator = items[Symbol.iterator]();
		const first = iterator.next();
		if (first.done === true) {
			throw new SequenceStateError('No element.');
		}
		let best = first.value;
		let bestScore = score(best);
		for (let next = iterator.next(); next.done !== true; next = iterator.next()) {
			const candidateScore = score(next.value);
			if (isBetter(candidateScore, bestScore)) {
				best = next.value;
				bestScore = candidateScore;
			}
		}
		return best;
	}
}
