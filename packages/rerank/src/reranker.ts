/**
 * Reranker provider selection and factory
 *
 * getReranker() returns the Reranker for the configured provider, or null
 * when reranking is disabled.
 */

import { resolve } from 'path';
import type { Config } from '@listwise/config';
import { createOpenAIModelClient } from './clients/openai.js';
import { RerankEngine, toCandidates, toRanked, validateRerankInput, type RerankEngineDeps } from './engine.js';
import { loadFewShotExamples, resolveOptions, type RerankOptionsInput } from './options.js';
import { createTiktokenCounter, encodingForModelName } from './tokens.js';
import type { CandidateInput, Reranker, RerankCallOptions, RerankResult } from './types.js';

/**
 * Keeps the first-stage order. Used as a baseline and when no model is configured.
 */
export class IdentityReranker implements Reranker {
	readonly name = 'identity';

	async rerank(query: string, candidates: CandidateInput[], callOptions: RerankCallOptions = {}): Promise<RerankResult> {
		const { signal: _signal, ...overrides } = callOptions;
		const options = resolveOptions(overrides);
		validateRerankInput(query, candidates);

		return {
			query,
			candidates: toRanked(toCandidates(candidates)),
			windows: [],
			stats: {
				passes: options.passes,
				windows: 0,
				modelCalls: 0,
				retries: 0,
				repairedWindows: 0,
				identityWindows: 0
			}
		};
	}
}

/**
 * Engine defaults taken from configuration; per-call options still override them.
 * A configured few-shot file is read here, relative to the working directory.
 */
export function windowDefaults(config: Config): RerankOptionsInput {
	const { window, prompt } = config;
	return {
		contextSize: window.contextSize,
		windowSize: window.windowSize,
		stride: window.stride,
		passes: window.passes,
		retryBudget: window.retryBudget,
		repairThreshold: window.repairThreshold,
		direction: window.direction,
		timeoutMs: window.timeoutMs,
		concurrency: window.concurrency,
		rankEnd: window.topK,
		shuffle: window.shuffle,
		seed: window.seed,
		recordInvocations: window.recordInvocations,
		promptStyle: prompt.style,
		systemMessage: prompt.systemMessage,
		fewShotExamples: prompt.fewShotFile ? loadFewShotExamples(resolve(prompt.fewShotFile)) : undefined
	};
}

/**
 * Gets the configured reranker instance, or null if reranking is disabled
 *
 * @throws {Error} If the provider's client cannot be created
 */
export function getReranker(config: Config, deps: RerankEngineDeps = {}): Reranker | null {
	const { provider } = config.reranker;

	switch (provider) {
		case 'none':
			return null;
		case 'identity':
			return new IdentityReranker();
		case 'openai':
		case 'openrouter':
		case 'local': {
			try {
				const client = createOpenAIModelClient({
					backend: provider,
					model: config.reranker.model,
					apiKeys: config.reranker.apiKeys,
					keyStart: config.reranker.keyStart,
					baseUrl: config.reranker.baseUrl,
					proxy: config.reranker.proxy,
					openrouter: config.reranker.openrouter
				});
				return new RerankEngine(client, windowDefaults(config), {
					...deps,
					tokenCounter: deps.tokenCounter ?? createTiktokenCounter(encodingForModelName(config.reranker.model))
				});
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				throw new Error(
					`Failed to create ${provider} reranker: ${message}. ` +
					`Please check RERANK_MODEL, OPENAI_API_KEY, RERANK_FEW_SHOT_FILE and the RERANK_* window settings.`,
					{ cause: error }
				);
			}
		}
		default: {
			const unknown: never = provider;
			throw new Error(
				`Unknown rerank provider: ${String(unknown)}. ` +
				`Supported providers: 'openai', 'openrouter', 'local', 'identity', 'none'.`
			);
		}
	}
}
