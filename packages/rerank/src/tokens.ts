/**
 * Token counting for prompt budgets
 */

import { getEncoding, type TiktokenEncoding } from 'js-tiktoken';
import type { ChatMessage } from './types.js';

export interface TokenCounter {
	count(text: string): number;
	/** Longest prefix of text that counts at most maxTokens */
	truncate(text: string, maxTokens: number): string;
}

/** Role and separator tokens every chat message carries */
export const TOKENS_PER_MESSAGE = 4;

/** Every reply is primed with an assistant header */
export const REPLY_PRIMING_TOKENS = 3;

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Approximate counter: ~4 UTF-16 units per token, rounded up.
 * Only a fallback for backends without a known tokenizer; CJK and digit-heavy
 * text runs several times over this estimate.
 */
export function createApproximateTokenCounter(charsPerToken = 4): TokenCounter {
	return {
		count(text: string): number {
			return Math.ceil(text.length / charsPerToken);
		},
		truncate(text: string, maxTokens: number): string {
			if (maxTokens <= 0) return '';
			const prefix = text.slice(0, maxTokens * charsPerToken);
			// Never end on half of a surrogate pair
			return isHighSurrogate(prefix.charCodeAt(prefix.length - 1)) ? prefix.slice(0, -1) : prefix;
		}
	};
}

export const approximateTokenCounter = createApproximateTokenCounter();

/**
 * Encoding used by an OpenAI model family. Unknown and non-OpenAI models get
 * cl100k_base, which is close enough for budgeting most open models.
 */
export function encodingForModelName(model: string): TiktokenEncoding {
	const name = model.toLowerCase().split('/').pop() ?? '';
	if (/^(gpt-4o|gpt-4\.1|gpt-5|o1|o3|o4|chatgpt-4o)/.test(name)) {
		return 'o200k_base';
	}
	return 'cl100k_base';
}

/**
 * Counter backed by a BPE tokenizer (js-tiktoken). Special-token text such as
 * "<|endoftext|>" in a passage is counted as plain text.
 */
export function createTiktokenCounter(encodingName: TiktokenEncoding = 'cl100k_base'): TokenCounter {
	const encoding = getEncoding(encodingName);
	const encode = (text: string) => encoding.encode(text, [], []);

	return {
		count(text: string): number {
			return encode(text).length;
		},
		truncate(text: string, maxTokens: number): string {
			if (maxTokens <= 0) return '';
			const tokens = encode(text);
			if (tokens.length <= maxTokens) return text;
			// A cut inside a multi-byte character decodes to U+FFFD
			return encoding.decode(tokens.slice(0, maxTokens)).replace(/\uFFFD+$/, '');
		}
	};
}

export function countMessageTokens(messages: ChatMessage[], counter: TokenCounter): number {
	let total = REPLY_PRIMING_TOKENS;
	for (const message of messages) {
		total += TOKENS_PER_MESSAGE + counter.count(message.content);
	}
	return total;
}
