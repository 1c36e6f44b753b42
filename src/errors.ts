/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Thrown when an argument has the wrong shape: duplicate indices where
 * uniqueness is required, mismatched lengths, an empty row, an empty
 * delimiter set or an unknown equality strategy.
 */
export class ContractError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ContractError';
	}
}

/**
 * Thrown when a precondition about the relationship between two sequences
 * does not hold at run time (no divergence, more than one divergence, a value
 * missing during a reverse lookup).
 */
export class SequenceStateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'SequenceStateError';
	}
}

/**
 * Throws a RangeError unless `index` is an integer in `[0, length)`.
 * @param name - Argument label used in the message.
 */
export function checkValidIndex(index: number, length: number, name: string = 'index'): void {
	if (!Number.isInteger(index) || index < 0 || index >= length) {
		throw new RangeError(`${name} (${index}) must be a valid index in [0, ${length})`);
	}
}

/**
 * Throws a RangeError unless `0 <= start <= end <= length`.
 */
export function checkValidRange(start: number, end: number, length: number): void {
	if (!Number.isInteger(start) || start < 0 || start > length) {
		throw new RangeError(`startIndex (${start}) must be in [0, ${length}]`);
	}
	if (!Number.isInteger(end) || end < start || end > length) {
		throw new RangeError(`endIndex (${end}) must be in [${start}, ${length}]`);
	}
}
