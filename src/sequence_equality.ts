/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { ContractError } from './errors.js';

/**
 * Decides whether two elements are equal. Strategies must be reflexive and
 * symmetric; the engines never assume transitivity.
 */
export type EqualityFn = (a: unknown, b: unknown) => boolean;

/**
 * Options shared by every engine in the library.
 */
export interface SequenceOptions {
	/** Name of a registered equality strategy used to compare elements. */
	equality?: string;
	/** If true, engines trace their steps to the console. */
	debug?: boolean;
}

/**
 * SameValueZero: `===`, except that `NaN` equals `NaN`.
 * This is the membership rule of `Set` and `Map`.
 */
export const sameValueZero: EqualityFn = (a, b) =>
	a === b || (typeof a === 'number' && typeof b === 'number' && a !== a && b !== b);

/**
 * Registry of named equality strategies.
 *
 * Engines look a strategy up by the `equality` option when they are
 * constructed, so a strategy must be registered before the engine that names
 * it is created. The built-in `default` (SameValueZero) and `identity`
 * (`Object.is`) strategies are registered on first use.
 *
 * @example
 * ```typescript
 * SequenceEquality.registerStrategy('caseless', (a, b) =>
 * 	typeof a === 'string' && typeof b === 'string'
 * 		? a.toLowerCase() === b.toLowerCase()
 * 		: sameValueZero(a, b));
 * const comparator = new SequenceComparator({ equality: 'caseless' });
 * ```
 */
export class SequenceEquality {
	private static strategyRegistry = new Map<string, EqualityFn>();
	private static areBuiltInsRegistered = false;

	private static ensureBuiltInsRegistered(): void {
		if (!SequenceEquality.areBuiltInsRegistered) {
			SequenceEquality.areBuiltInsRegistered = true;
			SequenceEquality.strategyRegistry.set('default', sameValueZero);
			SequenceEquality.strategyRegistry.set('identity', Object.is);
		}
	}

	/**
	 * Registers (or replaces) an equality strategy.
	 * @param name - The name engines refer to through `SequenceOptions.equality`.
	 * @param equalityFn - The comparison to use.
	 */
	public static registerStrategy(name: string, equalityFn: EqualityFn): void {
		SequenceEquality.ensureBuiltInsRegistered();
		SequenceEquality.strategyRegistry.set(name, equalityFn);
	}

	public static isRegistered(name: string): boolean {
		SequenceEquality.ensureBuiltInsRegistered();
		return SequenceEquality.strategyRegistry.has(name);
	}

	/**
	 * Looks up a strategy by name.
	 * @throws {ContractError} If nothing is registered under `name`.
	 */
	public static resolve(name: string): EqualityFn {
		SequenceEquality.ensureBuiltInsRegistered();
		const equalityFn = SequenceEquality.strategyRegistry.get(name);
		if (!equalityFn) {
			throw new ContractError(`[SequenceEquality] Strategy '${name}' is not registered.`);
		}
		return equalityFn;
	}
}
