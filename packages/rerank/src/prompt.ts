/**
 * Prompt builder for listwise ranking
 *
 * Renders a window of candidates and the query into chat messages. Each
 * candidate is shown under a 1-based label ([1], [2], ...) that the model
 * uses to refer to it. Passage text is truncated so that the rendered
 * prompt plus the reserved answer never exceeds the model context.
 */

import { CapacityError } from './errors.js';
import { approximateTokenCounter, countMessageTokens, type TokenCounter } from './tokens.js';
import type { Candidate, ChatMessage, FewShotExample, Prompt, PromptStyle, Window } from './types.js';

/** "[12] > " is about four BPE tokens: "[", "12", "]", " >" */
export const MIN_TOKENS_PER_LABEL = 4;

/** Room for a trailing newline or stray whitespace in the answer */
export const ANSWER_SLACK_TOKENS = 4;

export type PromptBuilderOptions = {
	contextSize: number;
	promptStyle: PromptStyle;
	systemMessage: string;
	fewShotExamples: FewShotExample[];
	tokenCounter?: TokenCounter;
};

/**
 * Window-local label for position index (0-based)
 */
export function labelFor(index: number): string {
	return `[${index + 1}]`;
}

/**
 * Text shown to the model for a candidate: "title: text", whitespace collapsed
 */
export function passageText(candidate: Pick<Candidate, 'text' | 'title'>): string {
	const raw = candidate.title ? `${candidate.title}: ${candidate.text}` : candidate.text;
	return raw.replace(/\s+/g, ' ').trim();
}

/**
 * Splits available tokens over passages. Passages shorter than an even share
 * keep their full length and leave the remainder to longer ones.
 */
export function allocateBudget(needs: number[], available: number): number[] {
	const caps = new Array<number>(needs.length).fill(0);
	const order = needs
		.map((need, index) => ({ need, index }))
		.sort((a, b) => a.need - b.need || a.index - b.index);

	let remaining = Math.max(0, available);
	order.forEach(({ need, index }, position) => {
		const share = Math.floor(remaining / (order.length - position));
		const granted = Math.min(need, share);
		caps[index] = granted;
		remaining -= granted;
	});

	return caps;
}

export class PromptBuilder {
	private readonly options: PromptBuilderOptions;
	private readonly counter: TokenCounter;

	constructor(options: PromptBuilderOptions) {
		this.options = options;
		this.counter = options.tokenCounter ?? approximateTokenCounter;
	}

	/**
	 * Tokens reserved for a full answer "[1] > [2] > ... > [n]". Never less than
	 * MIN_TOKENS_PER_LABEL per label, whatever the counter estimates.
	 */
	maxOutputTokens(windowSize: number): number {
		const answer = Array.from({ length: windowSize }, (_, i) => labelFor(i)).join(' > ');
		const answerTokens = Math.max(this.counter.count(answer), windowSize * MIN_TOKENS_PER_LABEL);
		return answerTokens + ANSWER_SLACK_TOKENS;
	}

	/**
	 * Builds the prompt for one window.
	 *
	 * @param attempt - 0 for the first call; retries add a format reminder
	 * @throws {CapacityError} If the prompt cannot fit even with empty passages
	 */
	build(query: string, window: Window, attempt = 0): Prompt {
		const size = window.candidates.length;
		const maxOutputTokens = this.maxOutputTokens(size);
		const budget = this.options.contextSize - maxOutputTokens;
		const span = { pass: window.pass, start: window.start, end: window.end };

		const passages = window.candidates.map(passageText);
		const scaffold = this.render(query, passages.map(() => ''), attempt);
		const scaffoldTokens = countMessageTokens(scaffold, this.counter);

		if (scaffoldTokens > budget) {
			throw new CapacityError(
				`Prompt scaffold for ${size} passages needs ${scaffoldTokens} tokens but only ${budget} fit ` +
				`(context ${this.options.contextSize}, answer ${maxOutputTokens})`,
				{ span, context: { budget, scaffoldTokens, windowSize: size } }
			);
		}

		let caps = allocateBudget(
			passages.map((text) => this.counter.count(text)),
			budget - scaffoldTokens
		);

		for (;;) {
			const truncated = passages.map((text, i) => this.counter.truncate(text, caps[i]));
			const messages = this.render(query, truncated, attempt);
			const tokenCount = countMessageTokens(messages, this.counter);

			if (tokenCount <= budget) {
				return { messages, tokenCount, maxOutputTokens };
			}

			// Only reachable with counters that are not subadditive
			if (caps.every((cap) => cap === 0)) {
				throw new CapacityError(
					`Prompt for ${size} passages does not fit ${budget} tokens even with empty passages`,
					{ span, context: { budget, tokenCount, windowSize: size } }
				);
			}
			const shrink = Math.max(1, Math.ceil((tokenCount - budget) / size));
			caps = caps.map((cap) => Math.max(0, cap - shrink));
		}
	}

	private render(query: string, passages: string[], attempt: number): ChatMessage[] {
		const messages: ChatMessage[] = [];
		if (this.options.systemMessage) {
			messages.push({ role: 'system', content: this.options.systemMessage });
		}

		for (const example of this.options.fewShotExamples) {
			messages.push({ role: 'user', content: this.singleTurnContent(example.query, example.passages, 0) });
			messages.push({ role: 'assistant', content: example.answer });
		}

		if (this.options.promptStyle === 'single-turn') {
			messages.push({ role: 'user', content: this.singleTurnContent(query, passages, attempt) });
			return messages;
		}

		messages.push({ role: 'user', content: prefixInstruction(query, passages.length) });
		messages.push({ role: 'assistant', content: 'Okay, please provide the passages.' });
		passages.forEach((passage, i) => {
			messages.push({ role: 'user', content: `${labelFor(i)} ${passage}` });
			messages.push({ role: 'assistant', content: `Received passage ${labelFor(i)}.` });
		});
		messages.push({ role: 'user', content: postInstruction(query, passages.length, attempt) });
		return messages;
	}

	private singleTurnContent(query: string, passages: string[], attempt: number): string {
		const lines = passages.map((passage, i) => `${labelFor(i)} ${passage}`);
		return [
			prefixInstruction(query, passages.length),
			'',
			...lines,
			'',
			postInstruction(query, passages.length, attempt)
		].join('\n');
	}
}

function prefixInstruction(query: string, count: number): string {
	return (
		`I will provide you with ${count} passages, each indicated by a numerical identifier []. ` +
		`Rank the passages based on their relevance to the search query: ${query}.`
	);
}

function postInstruction(query: string, count: number, attempt: number): string {
	const instruction =
		`Search Query: ${query}.\n` +
		`Rank the ${count} passages above based on their relevance to the search query. ` +
		'All the passages should be included and listed using identifiers, in descending order of relevance. ' +
		'The output format should be [] > [], e.g., [2] > [1]. ' +
		'Only respond with the ranking results, do not say any word or explain.';

	if (attempt === 0) {
		return instruction;
	}
	return (
		`${instruction}\n` +
		`Your previous answer could not be used. List every identifier from [1] to [${count}] exactly once.`
	);
}
