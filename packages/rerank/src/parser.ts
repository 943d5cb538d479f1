/**
 * Permutation parser
 *
 * Reads a ranked list of window labels out of free-form model output.
 * Bracketed labels ("[3] > [1] > [2]") take precedence; when none are
 * present every bare integer is read as a label. Labels are 1-based and
 * map to window-local index label - 1.
 */

import type { ParseResult } from './types.js';

const BRACKETED_LABEL = /\[\s*(\d+)\s*\]/g;
const BARE_INTEGER = /\d+/g;

function extractLabels(text: string): number[] {
	const bracketed = Array.from(text.matchAll(BRACKETED_LABEL), (match) => Number(match[1]));
	if (bracketed.length > 0) {
		return bracketed;
	}
	return Array.from(text.matchAll(BARE_INTEGER), (match) => Number(match[0]));
}

/**
 * Parses raw model text into an ordering over [0, windowSize).
 *
 * - Duplicate labels keep their first occurrence
 * - Labels outside the window are dropped
 * - No usable label at all yields unparseable
 */
export function parsePermutation(raw: string, windowSize: number): ParseResult {
	const seen = new Set<number>();
	const recognized: number[] = [];

	for (const label of extractLabels(raw)) {
		const index = label - 1;
		if (!Number.isSafeInteger(index) || index < 0 || index >= windowSize || seen.has(index)) {
			continue;
		}
		seen.add(index);
		recognized.push(index);
	}

	if (recognized.length === 0) {
		return { kind: 'unparseable' };
	}
	if (recognized.length === windowSize) {
		return { kind: 'complete', permutation: recognized };
	}
	return { kind: 'partial', recognized, missing: windowSize - recognized.length };
}
