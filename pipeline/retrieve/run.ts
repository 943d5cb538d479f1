/**
 * Retrieval stage: first-stage candidates for each query
 *
 * Input: pipeline/out/queries.jsonl
 * Output: pipeline/out/requests.jsonl
 *
 * Each output line is a rerank request:
 * {
 *   "qid": "q1",
 *   "query": "how do I rotate api keys",
 *   "candidates": [{ "id": "d6ce23171c8e09b2", "text": "...", "title": "API keys > Security", "score": 1060320051 }]
 * }
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getConfig } from '@listwise/config';
import { JsonlWriter, loadCompleted, readLines } from '../jsonl.js';
import { parseRecord, queryRecordSchema, type RequestRecord } from '../records.js';
import { TypesenseRetriever, getTypesenseClient, typesenseSearchApi } from './typesense.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Paths
const INPUT_FILE = process.env.QUERIES_FILE || resolve(__dirname, '../out/queries.jsonl');
const OUTPUT_FILE = process.env.REQUESTS_FILE || resolve(__dirname, '../out/requests.jsonl');

// Candidates per query (Typesense caps per_page at 250)
const LIMIT = Math.min(parseInt(process.env.RETRIEVE_LIMIT || '100', 10), 250);

async function main() {
	console.log('Starting retrieval stage...');
	console.log(`Input: ${INPUT_FILE}`);
	console.log(`Output: ${OUTPUT_FILE}`);
	console.log(`Candidates per query: ${LIMIT}`);

	const config = getConfig();
	const retriever = new TypesenseRetriever(
		typesenseSearchApi(getTypesenseClient(config.typesense)),
		config.typesense
	);

	const completed = await loadCompleted(OUTPUT_FILE);
	console.log(`Found ${completed.size} already retrieved queries (will skip)`);

	const output = new JsonlWriter(OUTPUT_FILE);
	for (const line of completed.values()) {
		output.write(line);
	}

	let totalQueries = 0;
	let skippedQueries = 0;
	let retrievedQueries = 0;
	let emptyQueries = 0;
	let errorCount = 0;

	for await (const line of readLines(INPUT_FILE)) {
		output.throwIfFailed();
		totalQueries++;

		let qid: string;
		let query: string;
		try {
			({ qid, query } = parseRecord(line, queryRecordSchema));
		} catch (error) {
			console.error(`Skipping query line ${totalQueries}: ${error instanceof Error ? error.message : String(error)}`);
			errorCount++;
			continue;
		}

		if (completed.has(qid)) {
			skippedQueries++;
			continue;
		}

		let request: RequestRecord;
		try {
			request = { qid, query, candidates: await retriever.retrieve(query, LIMIT) };
		} catch (error) {
			console.error(`❌ Retrieval failed for ${qid}: ${error instanceof Error ? error.message : String(error)}`);
			errorCount++;
			continue;
		}

		if (request.candidates.length === 0) {
			console.warn(`⚠️  No candidates for ${qid}: "${query}"`);
			emptyQueries++;
			continue;
		}

		output.write(JSON.stringify(request));
		retrievedQueries++;

		if (retrievedQueries % 50 === 0) {
			console.log(`Retrieved ${retrievedQueries} queries...`);
		}
	}

	await output.close();

	console.log('\n=== Retrieval Complete ===');
	console.log(`Total queries: ${totalQueries}`);
	console.log(`Skipped (already retrieved): ${skippedQueries}`);
	console.log(`Retrieved: ${retrievedQueries}`);
	console.log(`No candidates: ${emptyQueries}`);
	console.log(`Errors: ${errorCount}`);
	console.log(`Output: ${OUTPUT_FILE}`);
}

main().catch((error) => {
	console.error('Fatal error:', error);
	process.exit(1);
});
