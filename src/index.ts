// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Errors and guards
export {
	ContractError,
	SequenceStateError,
	checkValidIndex,
	checkValidRange
} from './errors.js';

// Equality registry and engine base
export {
	SequenceEquality,
	sameValueZero,
	type EqualityFn,
	type SequenceOptions
} from './sequence_equality.js';
export { SequenceEngine } from './sequence_engine.js';

// Core engines
export { SequenceComparator } from './sequence_comparator.js';
export { PermutationEngine, Permutations } from './permutation_engine.js';
export { CombinatorialIndexer } from './combinatorial_indexer.js';
export { RangeReorganizer, type PartitionPredicate } from './range_reorganizer.js';
export { CollectionInspector } from './collection_inspector.js';

// Lazy views
export {
	MappedListView,
	ZippedContent,
	ZippedListView,
	mapWithIndex,
	zipTwoLists
} from './sequence_views.js';

// Built-in equality plugins
export { registerStructuralEqualityStrategy, structuralEquals } from './equality_structural.js';

// Standalone helpers
export { sum, product, min, max, atLowestFactors, atLowestFactorsBigInt } from './numeric_helpers.js';
export {
	firstEntryWhere,
	firstKeyWhere,
	firstValueWhere,
	singleEntryWhere,
	singleKeyWhere,
	singleValueWhere,
	reverseMap,
	expandMap,
	type EntryPredicate
} from './map_helpers.js';
export {
	regExpForMultipleMatches,
	capitalise,
	splitFirst,
	splitLast,
	removeExtraSpace,
	splitByAll,
	startsWithOneOf,
	endsWithOneOf,
	replaceLast,
	matchAll
} from './string_helpers.js';
