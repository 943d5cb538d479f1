/**
 * Listwise rerank engine
 *
 * Entry point of the core: validates the request, prepares the candidate
 * order and runs the sliding window scheduler over it.
 *
 * Example:
 * ```ts
 * const engine = new RerankEngine(client, { windowSize: 10, stride: 10 });
 * const result = await engine.rerank('how do I rotate api keys', candidates);
 * // result.candidates holds exactly the input candidates, best first
 * ```
 */

import { InvalidInputError } from './errors.js';
import { resolveOptions, type RerankOptions, type RerankOptionsInput } from './options.js';
import { PromptBuilder } from './prompt.js';
import { SlidingWindowScheduler, type SchedulerState } from './scheduler.js';
import { shuffleSpan } from './shuffle.js';
import type { Sleep } from './backoff.js';
import type { TokenCounter } from './tokens.js';
import type {
	Candidate,
	CandidateInput,
	ModelClient,
	RankedCandidate,
	Reranker,
	RerankCallOptions,
	RerankLogger,
	RerankResult,
	WindowSpan
} from './types.js';

export type RerankEngineDeps = {
	tokenCounter?: TokenCounter;
	logger?: RerankLogger;
	/** Replaces the back-off sleep between retries */
	sleep?: Sleep;
	onTransition?: (state: SchedulerState, span?: WindowSpan) => void;
};

/**
 * Checks query and candidates before any model call
 *
 * @throws {InvalidInputError} On empty query, empty list, blank or duplicate ids
 */
export function validateRerankInput(query: string, candidates: CandidateInput[]): void {
	if (query.trim().length === 0) {
		throw new InvalidInputError('Query must not be empty');
	}
	if (candidates.length === 0) {
		throw new InvalidInputError('Candidate list must not be empty');
	}

	const seen = new Set<string>();
	for (const candidate of candidates) {
		if (!candidate.id) {
			throw new InvalidInputError('Every candidate needs a non-empty id');
		}
		if (seen.has(candidate.id)) {
			throw new InvalidInputError(`Duplicate candidate id: ${candidate.id}`, {
				context: { id: candidate.id }
			});
		}
		seen.add(candidate.id);
	}
}

/**
 * Assigns first-stage and current ranks in input order
 */
export function toCandidates(inputs: CandidateInput[]): Candidate[] {
	return inputs.map((input, index) => ({ ...input, rank: index, firstStageRank: index }));
}

/**
 * Final ranking with rank-derived scores
 */
export function toRanked(order: Candidate[]): RankedCandidate[] {
	return order.map((candidate, rank) => ({ ...candidate, rank, rerankScore: 1 / (rank + 1) }));
}

function assertConserved(inputs: CandidateInput[], order: Candidate[]): void {
	const ids = new Set(order.map((candidate) => candidate.id));
	if (order.length !== inputs.length || ids.size !== inputs.length || inputs.some((input) => !ids.has(input.id))) {
		throw new Error(
			`Candidate set changed during rerank (${inputs.length} in, ${order.length} out, ${ids.size} unique)`
		);
	}
}

export class RerankEngine implements Reranker {
	readonly name: string;
	private readonly client: ModelClient;
	private readonly defaults: RerankOptionsInput;
	private readonly deps: RerankEngineDeps;

	constructor(client: ModelClient, defaults: RerankOptionsInput = {}, deps: RerankEngineDeps = {}) {
		this.client = client;
		this.defaults = defaults;
		this.deps = deps;
		this.name = `listwise:${client.name}`;
		// Fail at construction on invalid defaults
		resolveOptions(defaults);
	}

	/**
	 * Reranks candidates for query. Per-call options override the engine defaults.
	 *
	 * @throws {InvalidInputError} Empty query or candidates, duplicate ids, invalid options
	 * @throws {CapacityError | FatalBackendError} When a window cannot be judged at all
	 * @throws {RerankCancelledError} When options.signal aborts
	 */
	async rerank(query: string, candidates: CandidateInput[], callOptions: RerankCallOptions = {}): Promise<RerankResult> {
		const { signal, ...overrides } = callOptions;
		const options = resolveOptions(this.defaults, overrides);
		validateRerankInput(query, candidates);

		const rankStart = Math.min(options.rankStart, candidates.length);
		const rankEnd = Math.min(options.rankEnd ?? candidates.length, candidates.length);

		let order = toCandidates(candidates);
		if (options.shuffle && rankEnd - rankStart > 1) {
			order = shuffleSpan(order, rankStart, rankEnd, options.seed);
		}

		const scheduler = new SlidingWindowScheduler(
			{
				client: this.client,
				promptBuilder: this.createPromptBuilder(options),
				logger: this.deps.logger ?? console,
				sleep: this.deps.sleep,
				onTransition: this.deps.onTransition
			},
			{ ...options, rankStart, rankEnd }
		);

		const run = await scheduler.run(query, order, signal);
		assertConserved(candidates, run.order);

		return {
			query,
			candidates: toRanked(run.order),
			windows: run.windows,
			stats: run.stats
		};
	}

	private createPromptBuilder(options: RerankOptions): PromptBuilder {
		return new PromptBuilder({
			contextSize: options.contextSize,
			promptStyle: options.promptStyle,
			systemMessage: options.systemMessage,
			fewShotExamples: options.fewShotExamples,
			tokenCounter: this.deps.tokenCounter
		});
	}
}
