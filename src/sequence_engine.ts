/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { SequenceEquality, type EqualityFn, type SequenceOptions } from './sequence_equality.js';

/**
 * Common ground for the engines: merges options over the defaults, resolves
 * the equality strategy once, and traces to the console when `debug` is set.
 *
 * Engines hold no state between calls beyond this resolved configuration, so a
 * single instance may be reused freely.
 */
export abstract class SequenceEngine {
	public static readonly defaultOptions: Required<SequenceOptions> = {
		equality: 'default',
		debug: false,
	};

	protected readonly config: Required<SequenceOptions>;
	protected readonly equals: EqualityFn;

	/** Prefix for trace output, e.g. `PermutationEngine`. */
	protected abstract readonly label: string;

	/**
	 * @param options - Overrides for {@link SequenceEngine.defaultOptions}.
	 * @throws {ContractError} If `options.equality` names an unregistered strategy.
	 */
	constructor(options?: SequenceOptions) {
		this.config = {
			...SequenceEngine.defaultOptions,
			...options,
		};
		this.equals = SequenceEquality.resolve(this.config.equality);
	}

	/** Name of the equality strategy in use. */
	public get equalityName(): string {
		return this.config.equality;
	}

	protected _log(message: string, ...details: unknown[]): void {
		if (this.config.debug) {
			console.log(`[${this.label}] ${message}`, ...details);
		}
	}

	protected _group(title: string): void {
		if (this.config.debug) {
			console.group(`[${this.label}] ${title}`);
		}
	}

	protected _groupEnd(): void {
		if (this.config.debug) {
			console.groupEnd();
		}
	}

	/** Index of the first element of `list` equal to `value`, or -1. */
	protected _indexOf<T>(list: readonly T[], value: T): number {
		for (let i = 0; i < list.length; i++) {
			if (this.equals(list[i], value)) return i;
		}
		return -1;
	}

	/** True if two elements of `list` are equal under the configured strategy. */
	protected _hasDuplicates<T>(list: readonly T[]): boolean {
		for (let i = 1; i < list.length; i++) {
			for (let j = 0; j < i; j++) {
				if (this.equals(list[i], list[j])) return true;
			}
		}
		return false;
	}
}
