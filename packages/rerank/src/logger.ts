import fs from 'fs/promises';
import path from 'path';
import type { RerankResult } from './types.js';

/**
 * Rerank run log entry, one JSON object per line
 */
export type RerankLogEntry = {
	timestamp: string;
	query: string;
	reranker: string;
	results: string[]; // Candidate ids, best first
	stats: RerankResult['stats'];
	durationMs: number;
	error?: {
		name: string;
		message: string;
		code?: string;
	};
};

const LOG_DIR = 'logs';
const LOG_FILE = 'rerank.jsonl';

export function logFilePath(logDir: string = path.join(process.cwd(), LOG_DIR)): string {
	return path.join(logDir, LOG_FILE);
}

/**
 * Appends a rerank run entry to logs/rerank.jsonl.
 * Never throws; a failed write is reported on stderr.
 */
export async function logRerankRun(entry: Omit<RerankLogEntry, 'timestamp'>, logDir?: string): Promise<void> {
	try {
		const line: RerankLogEntry = { timestamp: new Date().toISOString(), ...entry };
		const logPath = logFilePath(logDir);

		await fs.mkdir(path.dirname(logPath), { recursive: true });
		await fs.appendFile(logPath, JSON.stringify(line) + '\n', 'utf-8');
	} catch (error) {
		console.error('Failed to log rerank run:', error);
	}
}
