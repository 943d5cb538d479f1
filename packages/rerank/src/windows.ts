/**
 * Window planning and folding
 *
 * A pass sweeps a fixed-size frame over [rankStart, rankEnd) of the current
 * order. Forward sweeps start at the head and advance by stride; backward
 * sweeps start at the tail and retreat by stride. Folds are applied in plan
 * order, so where windows overlap the later window decides the shared items.
 */

import type { Candidate, FoldDirection, Permutation } from './types.js';

export type WindowPlanOptions = {
	windowSize: number;
	stride: number;
	direction: FoldDirection;
	rankStart: number;
	rankEnd: number;
};

export type PlannedSpan = {
	start: number;
	end: number;
};

/**
 * Lists the window spans of one pass, in fold order
 */
export function planWindows(options: WindowPlanOptions): PlannedSpan[] {
	const { windowSize, stride, direction, rankStart, rankEnd } = options;
	const spans: PlannedSpan[] = [];

	if (rankEnd <= rankStart) {
		return spans;
	}

	if (direction === 'forward') {
		for (let start = rankStart; ; start += stride) {
			const end = Math.min(start + windowSize, rankEnd);
			spans.push({ start, end });
			if (end >= rankEnd) break;
		}
		return spans;
	}

	for (let end = rankEnd; ; end -= stride) {
		const start = Math.max(end - windowSize, rankStart);
		spans.push({ start, end });
		if (start <= rankStart) break;
	}
	return spans;
}

/**
 * True when no two windows of a pass share a position
 */
export function windowsAreDisjoint(windowSize: number, stride: number): boolean {
	return stride >= windowSize;
}

/**
 * Reorders order[start, start + permutation.length) so that slot k holds the
 * item previously at start + permutation[k]. Positions outside the span are
 * untouched. Returns a new array; the input is not modified.
 */
export function applyFold(order: Candidate[], start: number, permutation: Permutation): Candidate[] {
	const slice = order.slice(start, start + permutation.length);
	const next = order.slice();

	permutation.forEach((from, k) => {
		next[start + k] = { ...slice[from], rank: start + k };
	});

	return next;
}
