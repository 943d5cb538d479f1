import { describe, it, expect } from 'vitest';
import { applyFold, planWindows, windowsAreDisjoint } from './windows.js';
import { toCandidates } from './engine.js';
import { ids, makeCandidates } from './testing.js';

describe('planWindows', () => {
	it('should split into disjoint windows with a short tail', () => {
		expect(
			planWindows({ windowSize: 10, stride: 10, direction: 'forward', rankStart: 0, rankEnd: 25 })
		).toEqual([
			{ start: 0, end: 10 },
			{ start: 10, end: 20 },
			{ start: 20, end: 25 }
		]);
	});

	it('should overlap windows when stride is smaller than the window', () => {
		expect(planWindows({ windowSize: 4, stride: 2, direction: 'forward', rankStart: 0, rankEnd: 8 })).toEqual([
			{ start: 0, end: 4 },
			{ start: 2, end: 6 },
			{ start: 4, end: 8 }
		]);
	});

	it('should sweep from the tail when direction is backward', () => {
		expect(planWindows({ windowSize: 4, stride: 2, direction: 'backward', rankStart: 0, rankEnd: 8 })).toEqual([
			{ start: 4, end: 8 },
			{ start: 2, end: 6 },
			{ start: 0, end: 4 }
		]);
	});

	it('should collapse to one window when the window covers the list', () => {
		expect(planWindows({ windowSize: 20, stride: 10, direction: 'forward', rankStart: 0, rankEnd: 5 })).toEqual([
			{ start: 0, end: 5 }
		]);
	});

	it('should stay inside the rank span', () => {
		expect(planWindows({ windowSize: 3, stride: 3, direction: 'forward', rankStart: 2, rankEnd: 7 })).toEqual([
			{ start: 2, end: 5 },
			{ start: 5, end: 7 }
		]);
	});

	it('should plan nothing for an empty span', () => {
		expect(planWindows({ windowSize: 3, stride: 3, direction: 'forward', rankStart: 4, rankEnd: 4 })).toEqual([]);
	});
});

describe('windowsAreDisjoint', () => {
	it('should depend on stride reaching the window size', () => {
		expect(windowsAreDisjoint(10, 10)).toBe(true);
		expect(windowsAreDisjoint(10, 5)).toBe(false);
	});
});

describe('applyFold', () => {
	it('should reorder only the window span and renumber ranks', () => {
		const order = toCandidates(makeCandidates(4));
		const next = applyFold(order, 1, [2, 0, 1]);

		expect(ids(next)).toEqual(['doc-0', 'doc-3', 'doc-1', 'doc-2']);
		expect(next.map((candidate) => candidate.rank)).toEqual([0, 1, 2, 3]);
		expect(next[1].firstStageRank).toBe(3);
	});

	it('should not modify the input order', () => {
		const order = toCandidates(makeCandidates(3));
		applyFold(order, 0, [2, 1, 0]);
		expect(ids(order)).toEqual(['doc-0', 'doc-1', 'doc-2']);
	});
});
