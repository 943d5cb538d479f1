/**
 * Sliding window scheduler
 *
 * Drives every window of every pass through
 * prompting -> parsing -> repairing -> folding, and folds each window's
 * permutation back into the running order.
 *
 * Window-local problems (unusable output, transient backend failures once
 * the retry budget is spent) degrade that window to its current order.
 * Fatal backend and capacity errors abort the invocation with the window's
 * span attached.
 */

import { FatalBackendError, RateLimitError, RerankCancelledError, RerankError } from './errors.js';
import { calculateBackoffDelay, sleep as defaultSleep, withDeadline, type Sleep } from './backoff.js';
import { parsePermutation } from './parser.js';
import { identityPermutation, isPermutation, repairPermutation } from './repair.js';
import { applyFold, planWindows, windowsAreDisjoint, type PlannedSpan } from './windows.js';
import type { PromptBuilder } from './prompt.js';
import type { RerankOptions } from './options.js';
import type {
	Candidate,
	ModelClient,
	Permutation,
	RerankLogger,
	RerankStats,
	Window,
	WindowExchange,
	WindowOutcome,
	WindowReport,
	WindowSpan
} from './types.js';

export type SchedulerState = 'init' | 'window-select' | 'prompting' | 'parsing' | 'repairing' | 'folding' | 'done';

export type SchedulerOptions = Pick<
	RerankOptions,
	| 'windowSize'
	| 'stride'
	| 'passes'
	| 'retryBudget'
	| 'repairThreshold'
	| 'direction'
	| 'timeoutMs'
	| 'concurrency'
	| 'backoff'
	| 'temperature'
	| 'recordInvocations'
> & {
	rankStart: number;
	rankEnd: number;
};

export type SchedulerDeps = {
	client: ModelClient;
	promptBuilder: PromptBuilder;
	logger: RerankLogger;
	sleep?: Sleep;
	onTransition?: (state: SchedulerState, span?: WindowSpan) => void;
};

export type SchedulerRun = {
	order: Candidate[];
	windows: WindowReport[];
	stats: RerankStats;
};

type Judgment = {
	permutation: Permutation;
	outcome: WindowOutcome;
	attempts: number;
	retries: number;
	exchanges?: WindowExchange[];
};

function spanOf(window: Window): WindowSpan {
	return { pass: window.pass, start: window.start, end: window.end };
}

function spanLabel(span: WindowSpan): string {
	return `pass ${span.pass + 1} window [${span.start}, ${span.end})`;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Normalizes anything a client throws into the rerank error taxonomy
 */
function toRerankError(error: unknown): RerankError {
	if (error instanceof RerankError) {
		return error;
	}
	return new FatalBackendError(`Model client failed: ${errorMessage(error)}`, { cause: error });
}

export class SlidingWindowScheduler {
	private readonly deps: SchedulerDeps;
	private readonly options: SchedulerOptions;
	private readonly sleep: Sleep;

	constructor(deps: SchedulerDeps, options: SchedulerOptions) {
		this.deps = deps;
		this.options = options;
		this.sleep = deps.sleep ?? defaultSleep;
	}

	/**
	 * Runs every pass over initial and returns the final order.
	 *
	 * @throws {RerankCancelledError} If signal aborts; carries the order of the last completed fold
	 * @throws {FatalBackendError | CapacityError} With the failing window's span
	 */
	async run(query: string, initial: Candidate[], signal?: AbortSignal): Promise<SchedulerRun> {
		const { windowSize, stride, passes, concurrency } = this.options;
		const batchSize = windowsAreDisjoint(windowSize, stride) ? concurrency : 1;
		const windows: WindowReport[] = [];
		const stats: RerankStats = {
			passes,
			windows: 0,
			modelCalls: 0,
			retries: 0,
			repairedWindows: 0,
			identityWindows: 0
		};

		this.transition('init');
		let order = initial;

		for (let pass = 0; pass < passes; pass++) {
			const spans = planWindows(this.options);

			for (let first = 0; first < spans.length; first += batchSize) {
				if (signal?.aborted) {
					throw new RerankCancelledError('Rerank cancelled between windows', order);
				}

				const batch = spans
					.slice(first, first + batchSize)
					.map((span, offset) => this.selectWindow(order, pass, first + offset, span));

				let judgments: Judgment[];
				try {
					judgments = await this.judgeBatch(query, batch, signal);
				} catch (error) {
					if (error instanceof RerankCancelledError || signal?.aborted) {
						throw new RerankCancelledError('Rerank cancelled during a model call', order, {
							span: error instanceof RerankError ? error.span : undefined,
							cause: error
						});
					}
					throw error;
				}

				batch.forEach((window, i) => {
					const judgment = judgments[i];
					this.transition('folding', spanOf(window));
					order = applyFold(order, window.start, judgment.permutation);

					windows.push({
						...spanOf(window),
						index: window.index,
						outcome: judgment.outcome,
						attempts: judgment.attempts,
						...(judgment.exchanges ? { exchanges: judgment.exchanges } : {})
					});
					stats.windows++;
					stats.modelCalls += judgment.attempts;
					stats.retries += judgment.retries;
					if (judgment.outcome === 'repaired') stats.repairedWindows++;
					if (judgment.outcome === 'identity') stats.identityWindows++;
				});
			}
		}

		this.transition('done');
		return { order, windows, stats };
	}

	private transition(state: SchedulerState, span?: WindowSpan): void {
		this.deps.onTransition?.(state, span);
	}

	private selectWindow(order: Candidate[], pass: number, index: number, span: PlannedSpan): Window {
		const window: Window = {
			pass,
			index,
			start: span.start,
			end: span.end,
			candidates: order.slice(span.start, span.end)
		};
		this.transition('window-select', spanOf(window));
		return window;
	}

	/**
	 * Judges a batch of disjoint windows concurrently. The first failure
	 * aborts the siblings still waiting on the model.
	 */
	private async judgeBatch(query: string, batch: Window[], signal?: AbortSignal): Promise<Judgment[]> {
		if (batch.length === 1) {
			return [await this.judgeWindow(query, batch[0], signal)];
		}

		const controller = new AbortController();
		const onAbort = () => controller.abort(signal?.reason);
		signal?.addEventListener('abort', onAbort, { once: true });

		try {
			const settled = await Promise.allSettled(
				batch.map((window) =>
					this.judgeWindow(query, window, controller.signal).catch((error: unknown) => {
						controller.abort(error);
						throw error;
					})
				)
			);

			const failures = settled.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
			if (failures.length > 0) {
				throw failures.find((reason) => !(reason instanceof RerankCancelledError)) ?? failures[0];
			}

			return settled.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
		} finally {
			signal?.removeEventListener('abort', onAbort);
		}
	}

	private async judgeWindow(query: string, window: Window, signal?: AbortSignal): Promise<Judgment> {
		const size = window.candidates.length;
		const span = spanOf(window);

		if (size <= 1) {
			return { permutation: identityPermutation(size), outcome: 'trivial', attempts: 0, retries: 0 };
		}

		const { retryBudget, repairThreshold, timeoutMs, temperature, backoff, recordInvocations } = this.options;
		const exchanges: WindowExchange[] | undefined = recordInvocations ? [] : undefined;
		let attempts = 0;
		let retries = 0;

		const finish = (permutation: Permutation, outcome: WindowOutcome): Judgment => ({
			permutation,
			outcome,
			attempts,
			retries,
			...(exchanges ? { exchanges } : {})
		});

		for (let attempt = 0; ; attempt++) {
			if (signal?.aborted) {
				throw new RerankCancelledError('Rerank cancelled', [], { span });
			}

			this.transition('prompting', span);
			const prompt = this.deps.promptBuilder.build(query, window, attempt);

			let text: string;
			try {
				attempts++;
				const output = await withDeadline(
					(callSignal) =>
						this.deps.client.generate(prompt, {
							maxOutputTokens: prompt.maxOutputTokens,
							temperature,
							signal: callSignal
						}),
					{ timeoutMs, signal }
				);
				text = output.text;
			} catch (error) {
				if (signal?.aborted) {
					throw new RerankCancelledError('Rerank cancelled', [], { span, cause: error });
				}

				const failure = toRerankError(error);
				exchanges?.push({ attempt, messages: prompt.messages, error: failure.message });

				if (!failure.retryable) {
					throw failure.withSpan(span);
				}
				if (retries >= retryBudget) {
					this.deps.logger.warn(
						`${spanLabel(span)}: ${failure.message}; retry budget exhausted, keeping current order`
					);
					return finish(identityPermutation(size), 'identity');
				}

				const delay =
					failure instanceof RateLimitError && failure.retryAfterMs !== undefined
						? Math.min(failure.retryAfterMs, backoff.maxDelayMs)
						: calculateBackoffDelay(retries, backoff.initialDelayMs, backoff.maxDelayMs);
				this.deps.logger.warn(
					`${spanLabel(span)}: ${failure.message}. Retrying in ${delay}ms (retry ${retries + 1}/${retryBudget})`
				);

				try {
					await this.sleep(delay, signal);
				} catch (sleepError) {
					throw new RerankCancelledError('Rerank cancelled', [], { span, cause: sleepError });
				}
				retries++;
				continue;
			}

			this.transition('parsing', span);
			const parsed = parsePermutation(text, size);
			exchanges?.push({ attempt, messages: prompt.messages, response: text, parse: parsed.kind });

			this.transition('repairing', span);
			const decision = repairPermutation(parsed, size, {
				repairThreshold,
				retriesRemaining: retryBudget - retries
			});

			if (decision.kind === 'retry') {
				this.deps.logger.warn(
					`${spanLabel(span)}: unusable model output (${decision.reason}). ` +
					`Re-prompting (retry ${retries + 1}/${retryBudget})`
				);
				retries++;
				continue;
			}

			if (decision.outcome === 'identity') {
				this.deps.logger.warn(`${spanLabel(span)}: no usable ranking after ${attempts} calls, keeping current order`);
			}

			if (!isPermutation(decision.permutation, size)) {
				throw new Error(`Repair produced an invalid permutation for ${spanLabel(span)}`);
			}

			return finish(decision.permutation, decision.outcome);
		}
	}
}
