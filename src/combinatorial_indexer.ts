/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { ContractError, SequenceStateError } from './errors.js';
import { SequenceEngine } from './sequence_engine.js';

/**
 * Yields every k-element subset of the positions `[0, n)`, each as an
 * ascending index array, in lexicographic order.
 */
function* _combinationIndices(n: number, k: number): Generator<number[]> {
	if (k > n) return;
	const chosen = Array.from({ length: k }, (_, i) => i);
	yield chosen.slice();

	for (;;) {
		let i = k - 1;
		while (i >= 0 && chosen[i] === n - k + i) i--;
		if (i < 0) return;
		chosen[i]++;
		for (let j = i + 1; j < k; j++) chosen[j] = chosen[j - 1] + 1;
		yield chosen.slice();
	}
}

/**
 * Cartesian "spread and combine" over a list of rows, and the mixed-radix
 * mapping between a flat index and the tuple it denotes.
 *
 * Tuples are ordered like an odometer: row 0 is the most significant digit
 * and changes slowest, the last row changes fastest. Row `i` contributes the
 * digit base `rows[i].length`, so with rows `[[1, 2], [3], [4, 5, 6]]` the
 * tuple `[2, 3, 5]` sits at `1 * 3 + 0 * 3 + 1 = 4`.
 *
 * @example
 * ```typescript
 * const indexer = new CombinatorialIndexer();
 * const rows = [[1, 2], [3], [4, 5, 6]];
 * indexer.spreadAndCombine(rows);
 * // [[1, 3, 4], [1, 3, 5], [1, 3, 6], [2, 3, 4], [2, 3, 5], [2, 3, 6]]
 * indexer.spreadAndCombineAtIndex(rows, 4); // [2, 3, 5]
 * indexer.spreadAndCombineToIndex(rows, [2, 3, 5]); // 4
 * ```
 */
export class CombinatorialIndexer extends SequenceEngine {
	protected readonly label = 'CombinatorialIndexer';

	/**
	 * Every tuple formed by picking one element from each row, keeping row
	 * order, in odometer order.
	 *
	 * @throws {ContractError} If there are no rows or a row is empty.
	 */
	public spreadAndCombine<T>(rows: readonly (readonly T[])[]): T[][] {
		this._checkRows(rows);

		let combined: T[][] = rows[0].map(element => [element]);
		for (let i = 1; i < rows.length; i++) {
			const spread: T[][] = [];
			for (const partial of combined) {
				for (const element of rows[i]) {
					spread.push([...partial, element]);
				}
			}
			combined = spread;
			this._log(`row ${i} spread -> ${combined.length} tuples`);
		}
		return combined;
	}

	/**
	 * Number of tuples `spreadAndCombine` would produce: the product of the
	 * row lengths. Counts and indices are plain numbers, so they are exact
	 * only while the product stays within `Number.MAX_SAFE_INTEGER`.
	 * @throws {ContractError} If there are no rows or a row is empty.
	 */
	public combinationCount<T>(rows: readonly (readonly T[])[]): number {
		this._checkRows(rows);
		return rows.reduce((total, row) => total * row.length, 1);
	}

	/**
	 * The tuple at position `index` of `spreadAndCombine(rows)`, decoded
	 * digit by digit without building the other tuples. Indices past
	 * `Number.MAX_SAFE_INTEGER` lose precision.
	 *
	 * @throws {ContractError} If there are no rows or a row is empty.
	 * @throws {RangeError} If `index` is not an integer in `[0, combinationCount(rows))`.
	 */
	public spreadAndCombineAtIndex<T>(rows: readonly (readonly T[])[], index: number): T[] {
		const total = this.combinationCount(rows);
		if (!Number.isInteger(index) || index < 0 || index >= total) {
			throw new RangeError(`index (${index}) must be in [0, ${total - 1}]`);
		}

		const tuple: T[] = [];
		let span = total;
		for (const row of rows) {
			const remainder = index % span;
			span /= row.length;
			tuple.push(row[Math.floor(remainder / span)]);
		}
		return tuple;
	}

	/**
	 * The position of `tuple` within `spreadAndCombine(rows)`.
	 *
	 * Each value is located in its row with the configured equality; if a row
	 * holds the value more than once, the first occurrence is used.
	 *
	 * @throws {ContractError} If there are no rows, a row is empty, or `tuple` has the wrong length.
	 * @throws {SequenceStateError} If a value is not found in its row.
	 */
	public spreadAndCombineToIndex<T>(rows: readonly (readonly T[])[], tuple: readonly T[]): number {
		this._checkRows(rows);
		if (tuple.length !== rows.length) {
			throw new ContractError(`The tuple must hold one value per row (expected ${rows.length}, got ${tuple.length}).`);
		}

		let index = 0;
		for (let i = 0; i < rows.length; i++) {
			const digit = this._indexOf(rows[i], tuple[i]);
			if (digit === -1) {
				throw new SequenceStateError(`The value at position ${i} of the tuple isn't found in row ${i}.`);
			}
			index = index * rows[i].length + digit;
		}
		return index;
	}

	/**
	 * Every subset of `list`, smallest first; subsets of one size come in
	 * lexicographic order of their positions.
	 *
	 * @example
	 * ```typescript
	 * indexer.allChoices([1, 2]); // [[], [1], [2], [1, 2]]
	 * ```
	 */
	public allChoices<T>(list: readonly T[]): T[][] {
		const choices: T[][] = [];
		for (let size = 0; size <= list.length; size++) {
			for (const positions of _combinationIndices(list.length, size)) {
				choices.push(positions.map(i => list[i]));
			}
		}
		this._log(`allChoices -> ${choices.length} subsets`);
		return choices;
	}

	private _checkRows<T>(rows: readonly (readonly T[])[]): void {
		if (rows.length === 0) {
			throw new ContractError('At least one row is required.');
		}
		for (let i = 0; i < rows.length; i++) {
			if (rows[i].length === 0) {
				throw new ContractError(`Row ${i} is empty: no row can be empty.`);
			}
		}
	}
}
