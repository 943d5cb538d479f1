import { createReadStream, createWriteStream, existsSync, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import { createInterface } from 'readline';

/**
 * Yields the non-empty lines of a JSONL file
 */
export async function* readLines(path: string): AsyncGenerator<string> {
	const rl = createInterface({
		input: createReadStream(path),
		crlfDelay: Infinity
	});

	for await (const line of rl) {
		if (line.trim()) {
			yield line;
		}
	}
}

/**
 * Loads the qids already written to an output file (for resume support).
 * Returns the kept lines as well, so the output can be rewritten without the malformed ones.
 */
export async function loadCompleted(outputPath: string): Promise<Map<string, string>> {
	const completed = new Map<string, string>();

	if (!existsSync(outputPath)) {
		return completed;
	}

	for await (const line of readLines(outputPath)) {
		try {
			const record: unknown = JSON.parse(line);
			if (typeof record === 'object' && record !== null && 'qid' in record && typeof record.qid === 'string') {
				completed.set(record.qid, line);
			}
		} catch {
			console.warn(`Skipping malformed line in output file: ${line.substring(0, 50)}...`);
		}
	}

	return completed;
}

/**
 * Line writer for a stage output file. A stream error (disk full, permissions)
 * is kept and rethrown by the next write or by close(), so it reaches the
 * stage's main() instead of crashing the process.
 */
export class JsonlWriter {
	readonly path: string;
	private readonly stream: WriteStream;
	private failure: Error | null = null;

	constructor(path: string) {
		this.path = path;
		mkdirSync(dirname(path), { recursive: true });
		this.stream = createWriteStream(path, { flags: 'w' });
		this.stream.on('error', (error) => {
			this.failure ??= this.wrap(error);
		});
	}

	/**
	 * @throws {Error} If an earlier write failed
	 */
	write(line: string): void {
		this.throwIfFailed();
		this.stream.write(line + '\n');
	}

	throwIfFailed(): void {
		if (this.failure) {
			throw this.failure;
		}
	}

	close(): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.failure) {
				reject(this.failure);
				return;
			}
			this.stream.once('finish', resolve);
			this.stream.once('error', (error) => reject(this.failure ?? this.wrap(error)));
			this.stream.end();
		});
	}

	private wrap(error: Error): Error {
		return new Error(`Failed to write ${this.path}: ${error.message}`, { cause: error });
	}
}
