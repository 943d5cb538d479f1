/**
 * Script to summarize window outcomes of a rerank results file
 *
 * Usage: npx tsx scripts/window-stats.ts [pipeline/out/results.jsonl]
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { readLines } from '../pipeline/jsonl.js';
import { parseRecord, resultRecordSchema, summarizeResults, type ResultRecord } from '../pipeline/records.js';

const RESULTS_FILE = resolve(process.argv[2] || 'pipeline/out/results.jsonl');

function percent(count: number, total: number): string {
	return total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
}

async function printWindowStats(): Promise<void> {
	if (!existsSync(RESULTS_FILE)) {
		console.error(`Results file not found: ${RESULTS_FILE}`);
		process.exit(1);
	}

	const records: ResultRecord[] = [];
	let malformed = 0;
	for await (const line of readLines(RESULTS_FILE)) {
		try {
			records.push(parseRecord(line, resultRecordSchema));
		} catch {
			malformed++;
		}
	}

	console.log('='.repeat(60));
	console.log(`Window outcomes in ${RESULTS_FILE}`);
	console.log('='.repeat(60));
	console.log('');

	if (records.length === 0) {
		console.log('No result records found.');
		return;
	}

	const summary = summarizeResults(records);
	const { windows } = summary;

	for (const outcome of ['complete', 'repaired', 'identity', 'trivial'] as const) {
		console.log(
			`  ${outcome.padEnd(10)} | Count: ${String(windows[outcome]).padStart(6)} | ${percent(windows[outcome], windows.total)}%`
		);
	}

	console.log('');
	console.log('='.repeat(60));
	console.log('Summary:');
	console.log('='.repeat(60));
	console.log(`  Requests:                     ${summary.requests}`);
	console.log(`  Windows:                      ${windows.total}`);
	console.log(`  Model calls:                  ${summary.modelCalls}`);
	console.log(`  Retries:                      ${summary.retries}`);
	console.log(`  Calls per request:            ${(summary.modelCalls / summary.requests).toFixed(2)}`);
	console.log(`  Top result changed:           ${summary.topChanged} (${percent(summary.topChanged, summary.requests)}%)`);
	if (malformed > 0) {
		console.log(`  Malformed lines skipped:      ${malformed}`);
	}
	console.log('='.repeat(60));
}

printWindowStats().catch((error) => {
	console.error('Error reading results:');
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
