/**
 * Search API
 *
 * GET /api/search
 *
 * Query params:
 * - q (string, required): Search query
 * - limit (number): Max results, default: 10, max: 50
 * - depth (number): First-stage candidates to rerank, default: 50, max: 250
 * - rerank (true|false): Enable reranking, default: true
 *
 * POST /api/rerank
 *
 * Body: { "query": "...", "candidates": [{ "id", "text", "title"?, "score"? }] }
 * Reranks caller-supplied candidates and returns the full ranking.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import {
	isRerankError,
	type CandidateInput,
	type RerankErrorCode,
	type RerankResult,
	type Reranker,
	type Retriever
} from '@listwise/rerank';
import { candidateRecordSchema, countWindows, type WindowCounts } from '../pipeline/records.js';

export type SearchAppDeps = {
	/** null when no first-stage search is configured */
	retriever: Retriever | null;
	/** null when reranking is disabled */
	reranker: Reranker | null;
};

type SearchResult = {
	id: string;
	title?: string;
	snippet: string;
	rank: number;
	first_stage_rank: number;
	first_stage_score?: number;
	rerank_score?: number;
};

type SearchResponse = {
	query: string;
	reranker: string | null;
	rerank_applied: boolean;
	timings_ms: {
		retrieve?: number;
		rerank?: number;
		total: number;
	};
	warnings: string[];
	windows?: WindowCounts;
	results: SearchResult[];
};

type ErrorStatus = 400 | 422 | 429 | 500 | 502 | 503;

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 50;
const DEFAULT_DEPTH = 50;
// Typesense caps per_page at 250
const MAX_DEPTH = 250;
const SNIPPET_LENGTH = 240;

const rerankBodySchema = z.object({
	query: z.string().trim().min(1, 'query must not be empty'),
	candidates: z.array(candidateRecordSchema).min(1, 'candidates must not be empty')
});

const STATUS_BY_CODE: Record<RerankErrorCode, ErrorStatus> = {
	INVALID_INPUT: 400,
	CAPACITY: 422,
	RATE_LIMIT: 429,
	BACKEND_TRANSIENT: 503,
	BACKEND_FATAL: 502,
	CANCELLED: 503
};

/**
 * HTTP status for a failure surfaced by a reranker
 */
export function statusForError(error: unknown): ErrorStatus {
	return isRerankError(error) ? STATUS_BY_CODE[error.code] : 500;
}

function errorBody(error: unknown) {
	const message = error instanceof Error ? error.message : String(error);
	return {
		error: {
			code: isRerankError(error) ? error.code : 'INTERNAL',
			message,
			...(isRerankError(error) && error.span ? { span: error.span } : {})
		}
	};
}

/**
 * Parses a bounded positive integer query param
 */
function intParam(value: string | undefined, fallback: number, max: number): number | null {
	if (value === undefined || value === '') return fallback;
	if (!/^\d+$/.test(value)) return null;
	const parsed = Number(value);
	return parsed >= 1 ? Math.min(parsed, max) : null;
}

function snippet(text: string): string {
	const collapsed = text.replace(/\s+/g, ' ').trim();
	return collapsed.length > SNIPPET_LENGTH ? `${collapsed.slice(0, SNIPPET_LENGTH)}...` : collapsed;
}

function firstStageResults(candidates: CandidateInput[]): SearchResult[] {
	return candidates.map((candidate, i) => ({
		id: candidate.id,
		...(candidate.title ? { title: candidate.title } : {}),
		snippet: snippet(candidate.text),
		rank: i + 1,
		first_stage_rank: i + 1,
		...(candidate.score !== undefined ? { first_stage_score: candidate.score } : {})
	}));
}

function rerankedResults(result: RerankResult): SearchResult[] {
	return result.candidates.map((candidate) => ({
		id: candidate.id,
		...(candidate.title ? { title: candidate.title } : {}),
		snippet: snippet(candidate.text),
		rank: candidate.rank + 1,
		first_stage_rank: candidate.firstStageRank + 1,
		...(candidate.score !== undefined ? { first_stage_score: candidate.score } : {}),
		rerank_score: candidate.rerankScore
	}));
}

export function createSearchApp(deps: SearchAppDeps): Hono {
	const app = new Hono();

	app.get('/health', (c) =>
		c.json({
			status: 'ok',
			retriever: deps.retriever !== null,
			reranker: deps.reranker?.name ?? null
		})
	);

	app.get('/api/search', async (c) => {
		const startedAt = Date.now();
		const query = c.req.query('q')?.trim();
		if (!query) {
			return c.json({ error: { code: 'INVALID_INPUT', message: 'Missing required query parameter: q' } }, 400);
		}

		const limit = intParam(c.req.query('limit'), DEFAULT_LIMIT, MAX_LIMIT);
		const depth = intParam(c.req.query('depth'), DEFAULT_DEPTH, MAX_DEPTH);
		if (limit === null || depth === null) {
			return c.json(
				{ error: { code: 'INVALID_INPUT', message: 'limit and depth must be positive integers' } },
				400
			);
		}

		if (!deps.retriever) {
			return c.json(
				{ error: { code: 'UNAVAILABLE', message: 'Search is not configured. Please set TYPESENSE_HOST and TYPESENSE_API_KEY.' } },
				503
			);
		}

		let candidates: CandidateInput[];
		try {
			candidates = await deps.retriever.retrieve(query, Math.max(depth, limit));
		} catch (err) {
			console.error('Search retrieval failed:', err);
			return c.json(errorBody(err), 502);
		}
		const retrievedAt = Date.now();

		const response: SearchResponse = {
			query,
			reranker: deps.reranker?.name ?? null,
			rerank_applied: false,
			timings_ms: { retrieve: retrievedAt - startedAt, total: 0 },
			warnings: [],
			results: firstStageResults(candidates)
		};

		const rerankRequested = c.req.query('rerank') !== 'false';
		if (rerankRequested && !deps.reranker) {
			response.warnings.push('Reranking is disabled; results keep the first-stage order');
		}

		if (rerankRequested && deps.reranker && candidates.length > 0) {
			try {
				const result = await deps.reranker.rerank(query, candidates, { signal: c.req.raw.signal });
				response.results = rerankedResults(result);
				response.rerank_applied = true;
				response.windows = countWindows(result.windows.map((window) => window.outcome));
			} catch (err) {
				// Degrade to first-stage order
				const message = err instanceof Error ? err.message : String(err);
				console.error('Rerank failed, returning first-stage order:', message);
				response.warnings.push(`Rerank failed: ${message}`);
			}
			response.timings_ms.rerank = Date.now() - retrievedAt;
		}

		response.results = response.results.slice(0, limit);
		response.timings_ms.total = Date.now() - startedAt;
		return c.json(response);
	});

	app.post('/api/rerank', async (c) => {
		if (!deps.reranker) {
			return c.json(
				{ error: { code: 'UNAVAILABLE', message: 'Reranking is disabled (RERANK_PROVIDER=none)' } },
				503
			);
		}

		let body: unknown;
		try {
			body = await c.req.json();
		} catch {
			return c.json({ error: { code: 'INVALID_INPUT', message: 'Request body must be JSON' } }, 400);
		}

		const parsed = rerankBodySchema.safeParse(body);
		if (!parsed.success) {
			const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`);
			return c.json({ error: { code: 'INVALID_INPUT', message: `Invalid request: ${issues.join('; ')}` } }, 400);
		}

		const startedAt = Date.now();
		try {
			const { query, candidates } = parsed.data;
			const result = await deps.reranker.rerank(query, candidates, { signal: c.req.raw.signal });
			return c.json({
				query,
				reranker: deps.reranker.name,
				results: rerankedResults(result),
				windows: countWindows(result.windows.map((window) => window.outcome)),
				stats: result.stats,
				timings_ms: { total: Date.now() - startedAt }
			});
		} catch (err) {
			const status = statusForError(err);
			if (status >= 500) {
				console.error('Rerank request failed:', err);
			}
			return c.json(errorBody(err), status);
		}
	});

	return app;
}
