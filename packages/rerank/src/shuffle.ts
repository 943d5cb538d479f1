/**
 * Seeded shuffling of the reranked region
 */

import type { Candidate } from './types.js';

/**
 * mulberry32: small deterministic PRNG returning floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Fisher-Yates shuffle of order[start, end); ranks are renumbered.
 * The same seed always produces the same order.
 */
export function shuffleSpan(order: Candidate[], start: number, end: number, seed: number): Candidate[] {
	const random = createRandom(seed);
	const next = order.slice();

	for (let i = end - 1; i > start; i--) {
		const j = start + Math.floor(random() * (i - start + 1));
		[next[i], next[j]] = [next[j], next[i]];
	}

	return next.map((candidate, rank) => (candidate.rank === rank ? candidate : { ...candidate, rank }));
}
