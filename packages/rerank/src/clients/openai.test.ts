import { describe, it, expect, vi } from 'vitest';
import {
	CapacityError,
	FatalBackendError,
	InvalidInputError,
	RateLimitError,
	TransientBackendError
} from '../errors.js';
import {
	OpenAIModelClient,
	classifyBackendError,
	createOpenAIModelClient,
	createProxyAgent,
	type ChatCompletionReply,
	type ChatCompletionsApi
} from './openai.js';
import type { Prompt } from '../types.js';

function apiError(message: string, fields: Record<string, unknown>): Error {
	return Object.assign(new Error(message), fields);
}

const prompt: Prompt = {
	messages: [{ role: 'user', content: 'Rank the 2 passages' }],
	tokenCount: 12,
	maxOutputTokens: 3
};

function fakeApi(reply: ChatCompletionReply | Error) {
	const create = vi.fn<ChatCompletionsApi['create']>(async () => {
		if (reply instanceof Error) throw reply;
		return reply;
	});
	return { api: { create }, create };
}

describe('classifyBackendError', () => {
	it('should map 429 to a rate limit with the requested delay', () => {
		const error = classifyBackendError(
			apiError('Too many requests', { status: 429, headers: { 'retry-after': '3' } })
		);

		expect(error).toBeInstanceOf(RateLimitError);
		expect(error.message).toBe('Rate limited by model backend: Too many requests');
		expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(3000);
		expect(error.retryable).toBe(true);
	});

	it('should read retry-after from a Headers instance', () => {
		const error = classifyBackendError(
			apiError('Too many requests', { status: 429, headers: new Headers({ 'retry-after': '2' }) })
		);

		expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(2000);
	});

	it('should treat server errors and timeouts as transient', () => {
		expect(classifyBackendError(apiError('Bad gateway', { status: 502 }))).toBeInstanceOf(TransientBackendError);
		expect(classifyBackendError(apiError('Request timeout', { status: 408 }))).toBeInstanceOf(TransientBackendError);
	});

	it('should treat connection failures as transient', () => {
		expect(classifyBackendError(apiError('socket hang up', { code: 'ECONNRESET' }))).toBeInstanceOf(
			TransientBackendError
		);
		expect(classifyBackendError(apiError('Connection error.', { name: 'APIConnectionError' }))).toBeInstanceOf(
			TransientBackendError
		);
	});

	it('should map context length rejections to a capacity error', () => {
		const error = classifyBackendError(
			apiError("This model's maximum context length is 4096 tokens", { status: 400 })
		);

		expect(error).toBeInstanceOf(CapacityError);
		expect(error.retryable).toBe(false);
	});

	it('should point at the API key on authentication failures', () => {
		const error = classifyBackendError(apiError('Incorrect API key provided', { status: 401 }));

		expect(error).toBeInstanceOf(FatalBackendError);
		expect(error.message).toBe(
			'Model backend authentication failed (401): Incorrect API key provided. Please check your OPENAI_API_KEY.'
		);
	});

	it('should treat other client errors as fatal', () => {
		const error = classifyBackendError(apiError('model not found', { status: 404 }));

		expect(error).toBeInstanceOf(FatalBackendError);
		expect(error.message).toBe('Model backend error (404): model not found');
		expect(error.context).toEqual({ status: 404, code: undefined });
	});

	it('should pass rerank errors through unchanged', () => {
		const original = new InvalidInputError('already classified');
		expect(classifyBackendError(original)).toBe(original);
	});

	it('should wrap non-errors', () => {
		const error = classifyBackendError('unexpected');

		expect(error).toBeInstanceOf(FatalBackendError);
		expect(error.message).toBe('Model backend failed: unexpected');
	});
});

describe('OpenAIModelClient', () => {
	it('should send the prompt and return the completion text', async () => {
		const { api, create } = fakeApi({
			model: 'gpt-4o-mini-2024-07-18',
			choices: [{ message: { content: '[2] > [1]' } }],
			usage: { completion_tokens: 5 }
		});
		const client = new OpenAIModelClient(api, 'gpt-4o-mini');
		const controller = new AbortController();

		const output = await client.generate(prompt, {
			maxOutputTokens: 3,
			temperature: 0,
			signal: controller.signal
		});

		expect(client.name).toBe('openai:gpt-4o-mini');
		expect(output).toEqual({ text: '[2] > [1]', outputTokens: 5, model: 'gpt-4o-mini-2024-07-18' });
		expect(create).toHaveBeenCalledWith(
			{ model: 'gpt-4o-mini', messages: prompt.messages, temperature: 0, max_tokens: 3 },
			{ signal: controller.signal }
		);
	});

	it('should report an empty completion as transient', async () => {
		const { api } = fakeApi({ choices: [{ message: { content: null } }] });
		const client = new OpenAIModelClient(api, 'gpt-4o-mini');

		await expect(client.generate(prompt, { maxOutputTokens: 3, temperature: 0 })).rejects.toBeInstanceOf(
			TransientBackendError
		);
	});

	it('should classify SDK failures', async () => {
		const { api } = fakeApi(apiError('Rate limit reached', { status: 429 }));
		const client = new OpenAIModelClient(api, 'llama3', 'local');

		await expect(client.generate(prompt, { maxOutputTokens: 3, temperature: 0 })).rejects.toBeInstanceOf(
			RateLimitError
		);
	});

	it('should rotate to the next key after a rate limit', async () => {
		const limited = fakeApi(apiError('Rate limit reached', { status: 429 }));
		const spare = fakeApi({ choices: [{ message: { content: '[1] > [2]' } }] });
		const client = new OpenAIModelClient([limited.api, spare.api], 'gpt-4o-mini');
		const options = { maxOutputTokens: 12, temperature: 0 };

		await expect(client.generate(prompt, options)).rejects.toBeInstanceOf(RateLimitError);
		expect(client.currentKey).toBe(1);

		const output = await client.generate(prompt, options);

		expect(output.text).toBe('[1] > [2]');
		expect(limited.create).toHaveBeenCalledTimes(1);
		expect(spare.create).toHaveBeenCalledTimes(1);
	});

	it('should start from the configured key and wrap around', async () => {
		const first = fakeApi(apiError('Rate limit reached', { status: 429 }));
		const second = fakeApi(apiError('Rate limit reached', { status: 429 }));
		const client = new OpenAIModelClient([first.api, second.api], 'gpt-4o-mini', 'openai', 1);
		const options = { maxOutputTokens: 12, temperature: 0 };

		expect(client.currentKey).toBe(1);
		await expect(client.generate(prompt, options)).rejects.toBeInstanceOf(RateLimitError);

		expect(second.create).toHaveBeenCalledTimes(1);
		expect(first.create).not.toHaveBeenCalled();
		expect(client.currentKey).toBe(0);
	});

	it('should keep the key on other failures', async () => {
		const failing = fakeApi(apiError('Bad gateway', { status: 502 }));
		const spare = fakeApi({ choices: [{ message: { content: '[1]' } }] });
		const client = new OpenAIModelClient([failing.api, spare.api], 'gpt-4o-mini');

		await expect(client.generate(prompt, { maxOutputTokens: 8, temperature: 0 })).rejects.toBeInstanceOf(
			TransientBackendError
		);
		expect(client.currentKey).toBe(0);
	});
});

describe('createOpenAIModelClient', () => {
	it('should require an API key for hosted backends', () => {
		expect(() =>
			createOpenAIModelClient({ backend: 'openrouter', model: 'openai/gpt-4o-mini', apiKeys: [] })
		).toThrow(
			'The openrouter backend requires an API key. Please set OPENAI_API_KEY.'
		);
	});

	it('should create a local client without a key', () => {
		const client = createOpenAIModelClient({ backend: 'local', model: 'llama3', apiKeys: [] });
		expect(client.name).toBe('local:llama3');
	});

	it('should create a hosted client', () => {
		const client = createOpenAIModelClient({ backend: 'openai', model: 'gpt-4o-mini', apiKeys: ['test-secret'] });
		expect(client.name).toBe('openai:gpt-4o-mini');
	});

	it('should start from the configured key', () => {
		const client = createOpenAIModelClient({
			backend: 'openai',
			model: 'gpt-4o-mini',
			apiKeys: ['test-secret-1', 'test-secret-2', 'test-secret-3'],
			keyStart: 2
		});
		expect(client.currentKey).toBe(2);
	});

	it('should accept a proxy', () => {
		const client = createOpenAIModelClient({
			backend: 'local',
			model: 'llama3',
			apiKeys: [],
			proxy: 'http://proxy.internal:3128'
		});
		expect(client.name).toBe('local:llama3');
	});
});

describe('createProxyAgent', () => {
	it('should point at the proxy host', () => {
		expect(createProxyAgent('http://proxy.internal:3128').proxy.host).toBe('proxy.internal:3128');
	});

	it('should reject an invalid proxy URL', () => {
		expect(() => createProxyAgent('not a url')).toThrow('Invalid proxy URL: not a url. Please check RERANK_PROXY.');
	});
});
