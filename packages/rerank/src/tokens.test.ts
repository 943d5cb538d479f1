import { describe, it, expect } from 'vitest';
import {
	approximateTokenCounter,
	countMessageTokens,
	createApproximateTokenCounter,
	createTiktokenCounter,
	encodingForModelName
} from './tokens.js';

describe('approximate token counter', () => {
	it('should round partial tokens up', () => {
		expect(approximateTokenCounter.count('')).toBe(0);
		expect(approximateTokenCounter.count('abcd')).toBe(1);
		expect(approximateTokenCounter.count('abcde')).toBe(2);
	});

	it('should truncate to whole tokens', () => {
		expect(approximateTokenCounter.truncate('abcdefghij', 2)).toBe('abcdefgh');
		expect(approximateTokenCounter.truncate('abc', 0)).toBe('');
		expect(createApproximateTokenCounter(2).truncate('abcdef', 1)).toBe('ab');
	});

	it('should not split a surrogate pair when truncating', () => {
		// '😀' is two UTF-16 units
		expect(createApproximateTokenCounter(3).truncate('😀😀', 1)).toBe('😀');
	});

	it('should count message overhead', () => {
		const messages = [
			{ role: 'system' as const, content: 'abcd' },
			{ role: 'user' as const, content: 'abcdefgh' }
		];
		// 3 priming + (4 + 1) + (4 + 2)
		expect(countMessageTokens(messages, approximateTokenCounter)).toBe(14);
	});
});

describe('tiktoken counter', () => {
	const counter = createTiktokenCounter('cl100k_base');

	it('should count BPE tokens', () => {
		expect(counter.count('')).toBe(0);
		expect(counter.count('hello world')).toBe(2);
	});

	it('should truncate on token boundaries', () => {
		expect(counter.truncate('hello world', 1)).toBe('hello');
		expect(counter.truncate('hello world', 5)).toBe('hello world');
		expect(counter.truncate('hello world', 0)).toBe('');
	});

	it('should not leave a broken character at the cut', () => {
		const text = 'こんにちは世界、検索結果を並べ替えます';
		const prefix = counter.truncate(text, 3);

		expect(prefix).not.toContain('\uFFFD');
		expect(text.startsWith(prefix)).toBe(true);
		expect(counter.count(prefix)).toBeLessThanOrEqual(3);
	});

	it('should count special-token text as plain text', () => {
		expect(counter.count('<|endoftext|>')).toBeGreaterThan(1);
	});
});

describe('encodingForModelName', () => {
	it('should pick o200k_base for the gpt-4o family', () => {
		expect(encodingForModelName('gpt-4o-mini')).toBe('o200k_base');
		expect(encodingForModelName('openai/gpt-4o')).toBe('o200k_base');
	});

	it('should fall back to cl100k_base', () => {
		expect(encodingForModelName('gpt-4-turbo')).toBe('cl100k_base');
		expect(encodingForModelName('llama3.1:8b')).toBe('cl100k_base');
	});
});
