/**
 * JSONL record shapes shared by the pipeline stages
 *
 * queries.jsonl   {"qid", "query"}
 * requests.jsonl  {"qid", "query", "candidates": [{"id", "text", "title"?, "score"?}]}
 * results.jsonl   {"qid", "query", "reranker", "results": [...], "windows": {...}, "model_calls", "retries"}
 * invocations.jsonl {"qid", "query", "windows": [{"pass", "start", "end", "outcome", "exchanges": [...]}]}
 */

import { z } from 'zod';
import type { RerankResult, WindowExchange, WindowOutcome } from '@listwise/rerank';

export const queryRecordSchema = z.object({
	qid: z.string().min(1),
	query: z.string().min(1)
});

export const candidateRecordSchema = z.object({
	id: z.string().min(1),
	text: z.string(),
	title: z.string().optional(),
	score: z.number().optional()
});

export const requestRecordSchema = queryRecordSchema.extend({
	candidates: z.array(candidateRecordSchema)
});

const windowCountsSchema = z.object({
	total: z.number().int(),
	complete: z.number().int(),
	repaired: z.number().int(),
	identity: z.number().int(),
	trivial: z.number().int()
});

export const resultRecordSchema = queryRecordSchema.extend({
	reranker: z.string(),
	results: z.array(
		z.object({
			id: z.string(),
			rank: z.number().int(),
			score: z.number(),
			first_stage_rank: z.number().int(),
			first_stage_score: z.number().optional()
		})
	),
	windows: windowCountsSchema,
	model_calls: z.number().int(),
	retries: z.number().int()
});

export type QueryRecord = z.infer<typeof queryRecordSchema>;
export type RequestRecord = z.infer<typeof requestRecordSchema>;
export type ResultRecord = z.infer<typeof resultRecordSchema>;
export type WindowCounts = z.infer<typeof windowCountsSchema>;

/**
 * Parses one JSONL line against schema
 *
 * @throws {Error} With the offending fields when the line is malformed
 */
export function parseRecord<T>(line: string, schema: z.ZodType<T>): T {
	let value: unknown;
	try {
		value = JSON.parse(line);
	} catch (error) {
		throw new Error(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}

	const result = schema.safeParse(value);
	if (!result.success) {
		const issues = result.error.errors.map((err) => `${err.path.join('.') || 'record'}: ${err.message}`);
		throw new Error(`Invalid record: ${issues.join('; ')}`);
	}
	return result.data;
}

export function emptyWindowCounts(): WindowCounts {
	return { total: 0, complete: 0, repaired: 0, identity: 0, trivial: 0 };
}

export function countWindows(outcomes: WindowOutcome[]): WindowCounts {
	const counts = emptyWindowCounts();
	for (const outcome of outcomes) {
		counts.total++;
		counts[outcome]++;
	}
	return counts;
}

/**
 * Output line for one reranked request. Ranks are 1-based.
 */
export function toResultRecord(qid: string, reranker: string, result: RerankResult): ResultRecord {
	return {
		qid,
		query: result.query,
		reranker,
		results: result.candidates.map((candidate) => ({
			id: candidate.id,
			rank: candidate.rank + 1,
			score: candidate.rerankScore,
			first_stage_rank: candidate.firstStageRank + 1,
			...(candidate.score !== undefined ? { first_stage_score: candidate.score } : {})
		})),
		windows: countWindows(result.windows.map((window) => window.outcome)),
		model_calls: result.stats.modelCalls,
		retries: result.stats.retries
	};
}

export type InvocationRecord = {
	qid: string;
	query: string;
	windows: Array<{
		pass: number;
		start: number;
		end: number;
		outcome: WindowOutcome;
		exchanges: WindowExchange[];
	}>;
};

/**
 * Recorded prompts and responses of one request, or null when nothing was recorded
 */
export function toInvocationRecord(qid: string, result: RerankResult): InvocationRecord | null {
	const windows = result.windows.flatMap(({ pass, start, end, outcome, exchanges }) =>
		exchanges && exchanges.length > 0 ? [{ pass, start, end, outcome, exchanges }] : []
	);
	return windows.length > 0 ? { qid, query: result.query, windows } : null;
}

export type ResultSummary = {
	requests: number;
	windows: WindowCounts;
	modelCalls: number;
	retries: number;
	/** Requests where the reranked top result differs from the first-stage top result */
	topChanged: number;
};

export function summarizeResults(records: ResultRecord[]): ResultSummary {
	const summary: ResultSummary = {
		requests: 0,
		windows: emptyWindowCounts(),
		modelCalls: 0,
		retries: 0,
		topChanged: 0
	};

	for (const record of records) {
		summary.requests++;
		summary.modelCalls += record.model_calls;
		summary.retries += record.retries;
		summary.windows.total += record.windows.total;
		summary.windows.complete += record.windows.complete;
		summary.windows.repaired += record.windows.repaired;
		summary.windows.identity += record.windows.identity;
		summary.windows.trivial += record.windows.trivial;

		const top = record.results[0];
		if (top && top.first_stage_rank !== 1) {
			summary.topChanged++;
		}
	}

	return summary;
}
