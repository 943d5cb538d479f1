/**
 * Rerank stage: listwise reranking of first-stage candidates
 *
 * Input: pipeline/out/requests.jsonl
 * Output: pipeline/out/results.jsonl
 *
 * Each output line:
 * {
 *   "qid": "q1",
 *   "query": "how do I rotate api keys",
 *   "reranker": "listwise:openai:gpt-4o-mini",
 *   "results": [{ "id": "d6ce23171c8e09b2", "rank": 1, "score": 1, "first_stage_rank": 4, "first_stage_score": 1060320051 }],
 *   "windows": { "total": 9, "complete": 8, "repaired": 1, "identity": 0, "trivial": 0 },
 *   "model_calls": 9,
 *   "retries": 0
 * }
 *
 * Every request also appends a line to logs/rerank.jsonl. With
 * RERANK_RECORD_INVOCATIONS=true the prompts and raw responses of each request
 * go to pipeline/out/invocations.jsonl.
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getConfig } from '@listwise/config';
import { IdentityReranker, getReranker, isRerankError, logRerankRun, type RerankResult } from '@listwise/rerank';
import { JsonlWriter, loadCompleted, readLines } from '../jsonl.js';
import {
	parseRecord,
	requestRecordSchema,
	toInvocationRecord,
	toResultRecord,
	type RequestRecord
} from '../records.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Paths
const INPUT_FILE = process.env.REQUESTS_FILE || resolve(__dirname, '../out/requests.jsonl');
const OUTPUT_FILE = process.env.RESULTS_FILE || resolve(__dirname, '../out/results.jsonl');
const INVOCATIONS_FILE = process.env.INVOCATIONS_FILE || resolve(__dirname, '../out/invocations.jsonl');

async function main() {
	console.log('Starting rerank stage...');
	console.log(`Input: ${INPUT_FILE}`);
	console.log(`Output: ${OUTPUT_FILE}`);

	const config = getConfig();
	const configured = getReranker(config);
	if (!configured) {
		console.warn('⚠️  Reranking is disabled (RERANK_PROVIDER=none); results keep the first-stage order');
	}
	const reranker = configured ?? new IdentityReranker();
	const { window } = config;
	console.log(`Reranker: ${reranker.name}`);
	console.log(
		`Window: size ${window.windowSize}, stride ${window.stride ?? 'half window'}, ` +
		`passes ${window.passes}, direction ${window.direction}`
	);
	if (window.topK !== undefined) {
		console.log(`Reranking the top ${window.topK} candidates of each request`);
	}

	const completed = await loadCompleted(OUTPUT_FILE);
	console.log(`Found ${completed.size} already reranked requests (will skip)`);

	const output = new JsonlWriter(OUTPUT_FILE);
	for (const line of completed.values()) {
		output.write(line);
	}

	// Invocations are only kept for the requests of this run
	const invocations = window.recordInvocations ? new JsonlWriter(INVOCATIONS_FILE) : null;
	if (invocations) {
		console.log(`Invocations: ${INVOCATIONS_FILE}`);
	}

	let totalRequests = 0;
	let skippedRequests = 0;
	let rerankedRequests = 0;
	let degradedWindows = 0;
	let errorCount = 0;

	for await (const line of readLines(INPUT_FILE)) {
		output.throwIfFailed();
		invocations?.throwIfFailed();
		totalRequests++;

		let request: RequestRecord;
		try {
			request = parseRecord(line, requestRecordSchema);
		} catch (error) {
			console.error(`Skipping request line ${totalRequests}: ${error instanceof Error ? error.message : String(error)}`);
			errorCount++;
			continue;
		}

		if (completed.has(request.qid)) {
			skippedRequests++;
			continue;
		}

		const startedAt = Date.now();
		let result: RerankResult;
		try {
			result = await reranker.rerank(request.query, request.candidates);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			const spanInfo = isRerankError(error) && error.span ? ` (window [${error.span.start}, ${error.span.end}))` : '';
			console.error(`❌ Rerank failed for ${request.qid}${spanInfo}: ${message}`);
			errorCount++;

			await logRerankRun({
				query: request.query,
				reranker: reranker.name,
				results: [],
				stats: { passes: 0, windows: 0, modelCalls: 0, retries: 0, repairedWindows: 0, identityWindows: 0 },
				durationMs: Date.now() - startedAt,
				error: {
					name: error instanceof Error ? error.name : 'Error',
					message,
					...(isRerankError(error) ? { code: error.code } : {})
				}
			});
			continue;
		}

		const record = toResultRecord(request.qid, reranker.name, result);
		output.write(JSON.stringify(record));

		if (invocations) {
			const invocation = toInvocationRecord(request.qid, result);
			if (invocation) invocations.write(JSON.stringify(invocation));
		}

		rerankedRequests++;
		degradedWindows += record.windows.identity;

		await logRerankRun({
			query: request.query,
			reranker: reranker.name,
			results: record.results.map((entry) => entry.id),
			stats: result.stats,
			durationMs: Date.now() - startedAt
		});

		if (rerankedRequests % 10 === 0) {
			console.log(`Reranked ${rerankedRequests} requests...`);
		}
	}

	await output.close();
	await invocations?.close();

	console.log('\n=== Rerank Complete ===');
	console.log(`Total requests: ${totalRequests}`);
	console.log(`Skipped (already reranked): ${skippedRequests}`);
	console.log(`Reranked: ${rerankedRequests}`);
	console.log(`Windows left in first-stage order: ${degradedWindows}`);
	console.log(`Errors: ${errorCount}`);
	console.log(`Output: ${OUTPUT_FILE}`);
}

main().catch((error) => {
	console.error('Fatal error:', error);
	process.exit(1);
});
