/**
 * Rerank options: defaults and validation
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { FewShotExample } from './types.js';

export const DEFAULT_SYSTEM_MESSAGE =
	'You are a search relevance judge that ranks passages by how well they answer a search query.';

const fewShotExampleSchema = z.object({
	query: z.string().min(1),
	passages: z.array(z.string()).min(1),
	answer: z.string().min(1)
});

const rerankOptionsSchema = z
	.object({
		/** Maximum candidates judged per model call */
		windowSize: z.number().int().min(1).default(20),
		/** Distance between consecutive window starts; defaults to half the window */
		stride: z.number().int().min(1).optional(),
		passes: z.number().int().min(1).default(1),
		/** Re-prompts allowed per window, shared by backend failures and unusable output */
		retryBudget: z.number().int().min(0).default(2),
		/** Maximum missing labels completed without re-prompting */
		repairThreshold: z.number().int().min(0).default(20),
		direction: z.enum(['forward', 'backward']).default('forward'),
		/** First position (inclusive) of the reranked region */
		rankStart: z.number().int().min(0).default(0),
		/** Last position (exclusive) of the reranked region; defaults to the list length */
		rankEnd: z.number().int().min(1).optional(),
		/** Model context in tokens, shared by prompt and answer */
		contextSize: z.number().int().min(1).default(4096),
		promptStyle: z.enum(['single-turn', 'multi-turn']).default('single-turn'),
		systemMessage: z.string().default(DEFAULT_SYSTEM_MESSAGE),
		fewShotExamples: z.array(fewShotExampleSchema).default([]),
		/** Per model call */
		timeoutMs: z.number().int().min(1).default(30000),
		/** Disjoint windows judged concurrently within a pass */
		concurrency: z.number().int().min(1).default(1),
		backoff: z
			.object({
				initialDelayMs: z.number().int().min(0).default(1000),
				maxDelayMs: z.number().int().min(0).default(60000)
			})
			.default({}),
		temperature: z.number().min(0).max(2).default(0),
		/** Shuffle the reranked region before the first pass (seeded) */
		shuffle: z.boolean().default(false),
		seed: z.number().int().default(0),
		recordInvocations: z.boolean().default(false)
	})
	.strict();

type ParsedOptions = z.output<typeof rerankOptionsSchema>;

export type RerankOptions = Omit<ParsedOptions, 'stride'> & {
	stride: number;
};

export type RerankOptionsInput = z.input<typeof rerankOptionsSchema>;

/**
 * Merges option layers (later wins) and validates the result.
 *
 * @throws {InvalidInputError} If any option is out of range
 */
export function resolveOptions(...layers: Array<RerankOptionsInput | undefined>): RerankOptions {
	const merged: RerankOptionsInput = {};
	for (const layer of layers) {
		if (!layer) continue;
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) {
				Object.assign(merged, { [key]: value });
			}
		}
	}

	const result = rerankOptionsSchema.safeParse(merged);
	if (!result.success) {
		const issues = result.error.errors.map((err) => `${err.path.join('.') || 'options'}: ${err.message}`);
		throw new InvalidInputError(`Invalid rerank options: ${issues.join('; ')}`, {
			context: { issues }
		});
	}

	const parsed = result.data;
	const stride = parsed.stride ?? Math.max(1, Math.ceil(parsed.windowSize / 2));

	if (stride > parsed.windowSize) {
		throw new InvalidInputError(
			`Invalid rerank options: stride (${stride}) must not exceed windowSize (${parsed.windowSize})`,
			{ context: { stride, windowSize: parsed.windowSize } }
		);
	}

	if (parsed.rankEnd !== undefined && parsed.rankEnd <= parsed.rankStart) {
		throw new InvalidInputError(
			`Invalid rerank options: rankEnd (${parsed.rankEnd}) must be greater than rankStart (${parsed.rankStart})`,
			{ context: { rankStart: parsed.rankStart, rankEnd: parsed.rankEnd } }
		);
	}

	return { ...parsed, stride };
}

/**
 * Reads few-shot examples from a JSON file holding an array of
 * { query, passages, answer } objects
 *
 * @throws {InvalidInputError} If the file is missing, not JSON or not a valid example list
 */
export function loadFewShotExamples(path: string): FewShotExample[] {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'));
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new InvalidInputError(`Failed to read few-shot examples from ${path}: ${message}`, {
			context: { path },
			cause: error
		});
	}

	const result = z.array(fewShotExampleSchema).safeParse(raw);
	if (!result.success) {
		const issues = result.error.errors.map((err) => `${err.path.join('.') || 'examples'}: ${err.message}`);
		throw new InvalidInputError(`Invalid few-shot examples in ${path}: ${issues.join('; ')}`, {
			context: { path, issues }
		});
	}
	return result.data;
}
