/**
 * Type definitions for the reranking system
 */

import type { RerankOptionsInput } from './options.js';

/**
 * Candidate as delivered by the first-stage retriever (deduplicated by id)
 */
export type CandidateInput = {
	id: string;
	text: string;
	title?: string;
	/** First-stage relevance score, if the retriever provides one */
	score?: number;
};

/**
 * Candidate inside a rerank invocation
 */
export type Candidate = CandidateInput & {
	/** Current 0-based position in the evolving order */
	rank: number;
	/** 0-based position in the retriever's order */
	firstStageRank: number;
};

/**
 * Candidate in the final ranking
 */
export type RankedCandidate = Candidate & {
	/** Rank-derived relevance: 1 / (rank + 1) */
	rerankScore: number;
};

/**
 * Half-open range [start, end) of the global order, tagged with its pass
 */
export type WindowSpan = {
	pass: number;
	start: number;
	end: number;
};

/**
 * Contiguous slice of the current order handed to the model
 */
export type Window = WindowSpan & {
	/** Position of the window within its pass */
	index: number;
	candidates: Candidate[];
};

/**
 * Window-local indices: entry k names the input position that should move to slot k
 */
export type Permutation = number[];

export type ChatMessage = {
	role: 'system' | 'user' | 'assistant';
	content: string;
};

export type Prompt = {
	messages: ChatMessage[];
	/** Measured size of the rendered prompt */
	tokenCount: number;
	/** Output budget reserved for the answer */
	maxOutputTokens: number;
};

export type RawModelOutput = {
	text: string;
	outputTokens?: number;
	model?: string;
};

export type GenerateOptions = {
	maxOutputTokens: number;
	temperature: number;
	signal?: AbortSignal;
};

/**
 * Generative backend. Implementations surface failures only as
 * TransientBackendError, RateLimitError, FatalBackendError or CapacityError
 * and never retry on their own.
 */
export interface ModelClient {
	readonly name: string;
	generate(prompt: Prompt, options: GenerateOptions): Promise<RawModelOutput>;
}

export type ParseResult =
	| { kind: 'complete'; permutation: Permutation }
	| { kind: 'partial'; recognized: number[]; missing: number }
	| { kind: 'unparseable' };

export type WindowOutcome = 'complete' | 'repaired' | 'identity' | 'trivial';

export type RepairDecision =
	| { kind: 'accept'; permutation: Permutation; outcome: Exclude<WindowOutcome, 'trivial'> }
	| { kind: 'retry'; reason: 'unparseable' | 'too-many-missing' };

export type FoldDirection = 'forward' | 'backward';

export type PromptStyle = 'single-turn' | 'multi-turn';

export type FewShotExample = {
	query: string;
	passages: string[];
	/** Expected answer, e.g. "[2] > [1] > [3]" */
	answer: string;
};

/**
 * One model call made for a window
 */
export type WindowExchange = {
	attempt: number;
	messages: ChatMessage[];
	response?: string;
	error?: string;
	parse?: ParseResult['kind'];
};

export type WindowReport = WindowSpan & {
	index: number;
	outcome: WindowOutcome;
	/** Model calls made for this window */
	attempts: number;
	exchanges?: WindowExchange[];
};

export type RerankStats = {
	passes: number;
	windows: number;
	modelCalls: number;
	retries: number;
	repairedWindows: number;
	identityWindows: number;
};

export type RerankResult = {
	query: string;
	candidates: RankedCandidate[];
	windows: WindowReport[];
	stats: RerankStats;
};

/**
 * Provider-agnostic reranker contract
 */
export interface Reranker {
	readonly name: string;
	/**
	 * Reranks candidates based on query relevance
	 *
	 * @param query - User search query
	 * @param candidates - Candidates in first-stage order
	 * @returns The same candidates in their new order
	 */
	rerank(query: string, candidates: CandidateInput[], options?: RerankCallOptions): Promise<RerankResult>;
}

/**
 * Per-call overrides accepted by Reranker.rerank
 */
export type RerankCallOptions = RerankOptionsInput & {
	signal?: AbortSignal;
};

/**
 * First-stage retriever (upstream collaborator)
 */
export interface Retriever {
	retrieve(query: string, limit: number): Promise<CandidateInput[]>;
}

/**
 * Destination for degradation and retry messages
 */
export type RerankLogger = Pick<Console, 'warn' | 'info'>;
