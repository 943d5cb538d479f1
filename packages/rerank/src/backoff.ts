/**
 * Timing helpers for model calls: back-off sleeps and per-call deadlines
 */

import { TransientBackendError } from './errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Calculate exponential backoff delay
 */
export function calculateBackoffDelay(attempt: number, initialDelay: number, maxDelay: number): number {
	const delay = initialDelay * Math.pow(2, attempt);
	return Math.min(delay, maxDelay);
}

function abortReason(signal: AbortSignal): Error {
	return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

/**
 * Sleep utility; rejects early when signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
	new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const onAbort = () => {
			clearTimeout(timeoutId);
			reject(signal ? abortReason(signal) : new Error('Operation aborted'));
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});

/**
 * Runs fn with a signal that aborts after timeoutMs or when the caller's
 * signal aborts, whichever comes first. Rejects as soon as the deadline
 * passes even if fn ignores its signal.
 */
export async function withDeadline<T>(
	fn: (signal: AbortSignal) => Promise<T>,
	options: { timeoutMs: number; signal?: AbortSignal }
): Promise<T> {
	const { timeoutMs, signal } = options;
	const controller = new AbortController();

	if (signal?.aborted) {
		throw abortReason(signal);
	}

	let rejectDeadline: (error: Error) => void = () => {};
	const deadline = new Promise<never>((_, reject) => {
		rejectDeadline = reject;
	});

	const abort = (error: Error) => {
		controller.abort(error);
		rejectDeadline(error);
	};
	const onCallerAbort = () => abort(signal ? abortReason(signal) : new Error('Operation aborted'));
	const timeoutId = setTimeout(
		() => abort(new TransientBackendError(`Model call timed out after ${timeoutMs}ms`)),
		timeoutMs
	);
	signal?.addEventListener('abort', onCallerAbort, { once: true });

	try {
		return await Promise.race([fn(controller.signal), deadline]);
	} finally {
		clearTimeout(timeoutId);
		signal?.removeEventListener('abort', onCallerAbort);
	}
}
