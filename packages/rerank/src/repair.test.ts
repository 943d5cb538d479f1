import { describe, it, expect } from 'vitest';
import { completePermutation, identityPermutation, isPermutation, repairPermutation } from './repair.js';

describe('repairPermutation', () => {
	const policy = { repairThreshold: 3, retriesRemaining: 1 };

	it('should accept complete output unchanged', () => {
		expect(repairPermutation({ kind: 'complete', permutation: [1, 0, 2] }, 3, policy)).toEqual({
			kind: 'accept',
			permutation: [1, 0, 2],
			outcome: 'complete'
		});
	});

	it('should append missing labels in pre-window order when within threshold', () => {
		const recognized = [9, 8, 7, 6, 5, 4, 3, 2];
		const decision = repairPermutation({ kind: 'partial', recognized, missing: 2 }, 10, policy);

		expect(decision).toEqual({
			kind: 'accept',
			permutation: [9, 8, 7, 6, 5, 4, 3, 2, 0, 1],
			outcome: 'repaired'
		});
	});

	it('should produce the same repair for the same input', () => {
		const result = { kind: 'partial' as const, recognized: [4, 1], missing: 3 };
		expect(repairPermutation(result, 5, policy)).toEqual(repairPermutation(result, 5, policy));
	});

	it('should ask for a retry when too many labels are missing', () => {
		const decision = repairPermutation({ kind: 'partial', recognized: [0, 1, 2, 3, 4], missing: 5 }, 10, policy);
		expect(decision).toEqual({ kind: 'retry', reason: 'too-many-missing' });
	});

	it('should ask for a retry on unparseable output', () => {
		expect(repairPermutation({ kind: 'unparseable' }, 4, policy)).toEqual({ kind: 'retry', reason: 'unparseable' });
	});

	it('should fall back to identity once retries are exhausted', () => {
		const exhausted = { repairThreshold: 3, retriesRemaining: 0 };
		expect(repairPermutation({ kind: 'unparseable' }, 4, exhausted)).toEqual({
			kind: 'accept',
			permutation: [0, 1, 2, 3],
			outcome: 'identity'
		});
	});
});

describe('permutation helpers', () => {
	it('should build identity permutations', () => {
		expect(identityPermutation(0)).toEqual([]);
		expect(identityPermutation(3)).toEqual([0, 1, 2]);
	});

	it('should complete a prefix with the remaining indices ascending', () => {
		expect(completePermutation([3, 1], 5)).toEqual([3, 1, 0, 2, 4]);
	});

	it('should recognize bijections only', () => {
		expect(isPermutation([2, 0, 1], 3)).toBe(true);
		expect(isPermutation([0, 0, 1], 3)).toBe(false);
		expect(isPermutation([0, 1], 3)).toBe(false);
		expect(isPermutation([0, 1, 3], 3)).toBe(false);
	});
});
