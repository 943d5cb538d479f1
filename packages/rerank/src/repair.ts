/**
 * Output repair policy
 *
 * Turns a parse result into a usable permutation without calling the model
 * again where possible:
 * 1. complete output is accepted as-is
 * 2. partial output missing at most repairThreshold labels is completed by
 *    appending the missing indices in their pre-window order
 * 3. anything else asks for a retry while budget remains, then falls back
 *    to the identity order
 */

import type { ParseResult, Permutation, RepairDecision } from './types.js';

export type RepairPolicy = {
	repairThreshold: number;
	retriesRemaining: number;
};

export function identityPermutation(size: number): Permutation {
	return Array.from({ length: size }, (_, i) => i);
}

/**
 * Appends every index of [0, size) missing from the prefix, in ascending order
 */
export function completePermutation(prefix: number[], size: number): Permutation {
	const present = new Set(prefix);
	const missing = identityPermutation(size).filter((index) => !present.has(index));
	return [...prefix, ...missing];
}

/**
 * True when permutation is a bijection over [0, size)
 */
export function isPermutation(permutation: number[], size: number): boolean {
	if (permutation.length !== size) {
		return false;
	}
	const seen = new Set<number>();
	for (const index of permutation) {
		if (!Number.isInteger(index) || index < 0 || index >= size || seen.has(index)) {
			return false;
		}
		seen.add(index);
	}
	return true;
}

export function repairPermutation(result: ParseResult, windowSize: number, policy: RepairPolicy): RepairDecision {
	if (result.kind === 'complete') {
		return { kind: 'accept', permutation: result.permutation, outcome: 'complete' };
	}

	if (result.kind === 'partial' && result.missing <= policy.repairThreshold) {
		return {
			kind: 'accept',
			permutation: completePermutation(result.recognized, windowSize),
			outcome: 'repaired'
		};
	}

	if (policy.retriesRemaining > 0) {
		return { kind: 'retry', reason: result.kind === 'partial' ? 'too-many-missing' : 'unparseable' };
	}

	return { kind: 'accept', permutation: identityPermutation(windowSize), outcome: 'identity' };
}
