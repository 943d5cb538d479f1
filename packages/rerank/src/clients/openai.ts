/**
 * OpenAI-compatible chat completions backend
 *
 * Serves hosted OpenAI, OpenRouter and local OpenAI-compatible servers
 * (Ollama, vLLM, LM Studio). The SDK's own retries are disabled; the
 * scheduler owns the retry policy.
 */

import OpenAI from 'openai';
import { HttpsProxyAgent } from 'https-proxy-agent';
import {
	CapacityError,
	FatalBackendError,
	RateLimitError,
	RerankError,
	TransientBackendError
} from '../errors.js';
import type { ChatMessage, GenerateOptions, ModelClient, Prompt, RawModelOutput } from '../types.js';

export type ChatCompletionRequest = {
	model: string;
	messages: ChatMessage[];
	temperature: number;
	max_tokens: number;
};

export type ChatCompletionReply = {
	model?: string;
	choices: Array<{ message: { content: string | null } }>;
	usage?: { completion_tokens: number } | null;
};

/**
 * The slice of the SDK this client needs
 */
export interface ChatCompletionsApi {
	create(request: ChatCompletionRequest, options: { signal?: AbortSignal }): Promise<ChatCompletionReply>;
}

export type OpenAIBackend = 'openai' | 'openrouter' | 'local';

export type OpenAIModelClientConfig = {
	backend: OpenAIBackend;
	model: string;
	/** One SDK client per key; rate limits rotate to the next key */
	apiKeys: string[];
	/** Index of the key used first */
	keyStart?: number;
	baseUrl?: string;
	/** HTTP(S) proxy URL for every backend request */
	proxy?: string;
	openrouter?: {
		siteUrl?: string;
		siteName?: string;
	};
};

export const DEFAULT_BASE_URLS: Record<Exclude<OpenAIBackend, 'openai'>, string> = {
	openrouter: 'https://openrouter.ai/api/v1',
	local: 'http://localhost:11434/v1'
};

/** Network failures worth another attempt */
const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

/** SDK error names that mean the request never got an answer */
const TRANSIENT_ERROR_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError']);

const CONTEXT_LENGTH_PATTERN = /maximum context length|context_length_exceeded|too many tokens/i;

function readNumber(source: unknown, key: string): number | undefined {
	if (typeof source === 'object' && source !== null && key in source) {
		const value: unknown = Reflect.get(source, key);
		return typeof value === 'number' ? value : undefined;
	}
	return undefined;
}

function readString(source: unknown, key: string): string | undefined {
	if (typeof source === 'object' && source !== null && key in source) {
		const value: unknown = Reflect.get(source, key);
		return typeof value === 'string' ? value : undefined;
	}
	return undefined;
}

/**
 * Reads retry-after (seconds) from a Headers instance or a plain header record
 */
function parseRetryAfter(headers: unknown): number | undefined {
	let value: string | undefined;
	if (headers instanceof Headers) {
		value = headers.get('retry-after') ?? undefined;
	} else {
		value = readString(headers, 'retry-after');
	}
	if (!value) return undefined;

	const seconds = parseInt(value, 10);
	return isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Maps an SDK or network failure onto the rerank error taxonomy
 */
export function classifyBackendError(error: unknown): RerankError {
	if (error instanceof RerankError) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);
	const status = readNumber(error, 'status');
	const code = readString(error, 'code');
	const name = error instanceof Error ? error.name : undefined;
	const context = { status, code };

	if (status === 429) {
		const retryAfterMs = parseRetryAfter(
			typeof error === 'object' && error !== null ? Reflect.get(error, 'headers') : undefined
		);
		return new RateLimitError(`Rate limited by model backend: ${message}`, { retryAfterMs, context, cause: error });
	}

	if (CONTEXT_LENGTH_PATTERN.test(message) || code === 'context_length_exceeded') {
		return new CapacityError(`Model rejected the prompt as too long: ${message}`, { context, cause: error });
	}

	if (status !== undefined && (status === 408 || status === 409 || status >= 500)) {
		return new TransientBackendError(`Model backend error (${status}): ${message}`, { context, cause: error });
	}

	if ((code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) || (name !== undefined && TRANSIENT_ERROR_NAMES.has(name))) {
		return new TransientBackendError(`Connection to model backend failed: ${message}`, { context, cause: error });
	}

	if (status === 401 || status === 403) {
		return new FatalBackendError(
			`Model backend authentication failed (${status}): ${message}. Please check your OPENAI_API_KEY.`,
			{ context, cause: error }
		);
	}

	return new FatalBackendError(
		status !== undefined ? `Model backend error (${status}): ${message}` : `Model backend failed: ${message}`,
		{ context, cause: error }
	);
}

export class OpenAIModelClient implements ModelClient {
	readonly name: string;
	private readonly apis: ChatCompletionsApi[];
	private readonly model: string;
	private keyIndex: number;

	constructor(
		api: ChatCompletionsApi | ChatCompletionsApi[],
		model: string,
		backend: OpenAIBackend = 'openai',
		keyStart = 0
	) {
		this.apis = Array.isArray(api) ? api : [api];
		if (this.apis.length === 0) {
			throw new FatalBackendError('OpenAIModelClient needs at least one API client');
		}
		this.model = model;
		this.name = `${backend}:${model}`;
		this.keyIndex = keyStart % this.apis.length;
	}

	/** Index of the key the next request uses */
	get currentKey(): number {
		return this.keyIndex;
	}

	async generate(prompt: Prompt, options: GenerateOptions): Promise<RawModelOutput> {
		const keyIndex = this.keyIndex;
		const api = this.apis[keyIndex] ?? this.apis[0];
		let reply: ChatCompletionReply;
		try {
			reply = await api.create(
				{
					model: this.model,
					messages: prompt.messages,
					temperature: options.temperature,
					max_tokens: options.maxOutputTokens
				},
				{ signal: options.signal }
			);
		} catch (error) {
			const failure = classifyBackendError(error);
			// Concurrent windows may have rotated already
			if (failure instanceof RateLimitError && this.apis.length > 1 && this.keyIndex === keyIndex) {
				this.keyIndex = (keyIndex + 1) % this.apis.length;
			}
			throw failure;
		}

		const text = reply.choices[0]?.message.content ?? '';
		if (text.length === 0) {
			throw new TransientBackendError('Model backend returned an empty completion', {
				context: { model: this.model }
			});
		}

		return {
			text,
			outputTokens: reply.usage?.completion_tokens,
			model: reply.model ?? this.model
		};
	}
}

/**
 * Creates a client for the configured backend
 */
export function createOpenAIModelClient(config: OpenAIModelClientConfig): OpenAIModelClient {
	const { backend, model } = config;

	if (backend !== 'local' && config.apiKeys.length === 0) {
		throw new FatalBackendError(`The ${backend} backend requires an API key. Please set OPENAI_API_KEY.`);
	}

	const headers: Record<string, string> = {};
	if (backend === 'openrouter') {
		if (config.openrouter?.siteUrl) headers['HTTP-Referer'] = config.openrouter.siteUrl;
		if (config.openrouter?.siteName) headers['X-Title'] = config.openrouter.siteName;
	}

	const httpAgent = config.proxy ? createProxyAgent(config.proxy) : undefined;
	const keys = config.apiKeys.length > 0 ? config.apiKeys : ['local'];

	const apis = keys.map((apiKey): ChatCompletionsApi => {
		const client = new OpenAI({
			apiKey,
			baseURL: config.baseUrl ?? (backend === 'openai' ? undefined : DEFAULT_BASE_URLS[backend]),
			defaultHeaders: headers,
			maxRetries: 0,
			httpAgent
		});
		return {
			create: (request, options) =>
				client.chat.completions.create({ ...request, stream: false }, { signal: options.signal })
		};
	});

	return new OpenAIModelClient(apis, model, backend, config.keyStart ?? 0);
}

/**
 * Agent tunnelling requests through an HTTP(S) proxy
 *
 * @throws {FatalBackendError} If the proxy URL is invalid
 */
export function createProxyAgent(proxy: string): HttpsProxyAgent<string> {
	try {
		return new HttpsProxyAgent(proxy);
	} catch (error) {
		throw new FatalBackendError(`Invalid proxy URL: ${proxy}. Please check RERANK_PROXY.`, { cause: error });
	}
}
