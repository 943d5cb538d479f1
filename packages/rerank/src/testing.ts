/**
 * Fakes shared by the rerank test suites
 */

import { vi } from 'vitest';
import type { Sleep } from './backoff.js';
import type { TokenCounter } from './tokens.js';
import type { CandidateInput, GenerateOptions, ModelClient, Prompt, RawModelOutput, RerankLogger } from './types.js';

export function makeCandidates(count: number): CandidateInput[] {
	return Array.from({ length: count }, (_, i) => ({ id: `doc-${i}`, text: `doc-${i}` }));
}

export function ids(candidates: Array<{ id: string }>): string[] {
	return candidates.map((candidate) => candidate.id);
}

/**
 * Number of passages announced by the final user message
 */
export function passageCount(prompt: Prompt): number {
	const last = prompt.messages[prompt.messages.length - 1];
	const match = /I will provide you with (\d+) passages/.exec(last?.content ?? '');
	if (!match) {
		throw new Error('Prompt does not announce a passage count');
	}
	return Number(match[1]);
}

/**
 * Passage lines ("[1] doc-3" -> "doc-3") of a single-turn prompt, in label order
 */
export function passagesOf(prompt: Prompt): string[] {
	const last = prompt.messages[prompt.messages.length - 1];
	return Array.from((last?.content ?? '').matchAll(/^\[\d+\] (.*)$/gm), (match) => match[1]);
}

export function reverseAnswer(size: number): string {
	return Array.from({ length: size }, (_, i) => `[${size - i}]`).join(' > ');
}

type Responder = (prompt: Prompt, options: GenerateOptions, call: number) => Promise<RawModelOutput> | RawModelOutput;

export class FakeModelClient implements ModelClient {
	readonly name = 'fake';
	readonly prompts: Prompt[] = [];
	private readonly responder: Responder;

	constructor(responder: Responder) {
		this.responder = responder;
	}

	get calls(): number {
		return this.prompts.length;
	}

	async generate(prompt: Prompt, options: GenerateOptions): Promise<RawModelOutput> {
		this.prompts.push(prompt);
		return this.responder(prompt, options, this.prompts.length);
	}
}

/**
 * Answers every window with its items in reverse order
 */
export function reversingClient(): FakeModelClient {
	return new FakeModelClient((prompt) => ({ text: reverseAnswer(passageCount(prompt)) }));
}

/**
 * Reverses every window but stops at maxOutputTokens, as a backend honouring max_tokens does
 */
export function tokenLimitedReversingClient(counter: TokenCounter): FakeModelClient {
	return new FakeModelClient((prompt, options) => ({
		text: counter.truncate(reverseAnswer(passageCount(prompt)), options.maxOutputTokens)
	}));
}

/**
 * Replies with the given texts in order, repeating the last one
 */
export function scriptedClient(...replies: string[]): FakeModelClient {
	return new FakeModelClient((_prompt, _options, call) => ({
		text: replies[Math.min(call, replies.length) - 1] ?? ''
	}));
}

export function silentLogger(): RerankLogger {
	return { warn: vi.fn(), info: vi.fn() };
}

export function instantSleep() {
	return vi.fn<Sleep>(async () => {});
}
