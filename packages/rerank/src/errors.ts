/**
 * Rerank error hierarchy
 *
 * Every failure that reaches a caller is one of these classes. Parse and repair
 * problems are never raised; they degrade the affected window instead.
 */

import type { Candidate, WindowSpan } from './types.js';

export type RerankErrorCode =
	| 'INVALID_INPUT'
	| 'CAPACITY'
	| 'BACKEND_TRANSIENT'
	| 'RATE_LIMIT'
	| 'BACKEND_FATAL'
	| 'CANCELLED';

export interface RerankErrorOptions {
	/** Window being processed when the error occurred */
	span?: WindowSpan;
	/** Additional context */
	context?: Record<string, unknown>;
	cause?: unknown;
}

export abstract class RerankError extends Error {
	abstract readonly code: RerankErrorCode;
	/** Whether the scheduler may spend retry budget on this error */
	readonly retryable: boolean = false;
	span?: WindowSpan;
	readonly context?: Record<string, unknown>;

	constructor(message: string, options: RerankErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.span = options.span;
		this.context = options.context;
	}

	/**
	 * Attaches the window span unless one is already recorded
	 */
	withSpan(span: WindowSpan): this {
		if (!this.span) {
			this.span = span;
		}
		return this;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
			span: this.span,
			context: this.context
		};
	}
}

/**
 * Empty query, empty or duplicated candidates, or invalid options. Never retried.
 */
export class InvalidInputError extends RerankError {
	readonly code = 'INVALID_INPUT';
}

/**
 * The prompt for a window cannot fit the model's context budget.
 */
export class CapacityError extends RerankError {
	readonly code = 'CAPACITY';
}

export class TransientBackendError extends RerankError {
	readonly code: RerankErrorCode = 'BACKEND_TRANSIENT';
	override readonly retryable = true;
}

export class RateLimitError extends TransientBackendError {
	override readonly code = 'RATE_LIMIT';
	/** Delay requested by the backend, if any */
	readonly retryAfterMs?: number;

	constructor(message: string, options: RerankErrorOptions & { retryAfterMs?: number } = {}) {
		super(message, options);
		this.retryAfterMs = options.retryAfterMs;
	}
}

/**
 * Backend unavailable or request rejected; aborts the whole invocation.
 */
export class FatalBackendError extends RerankError {
	readonly code = 'BACKEND_FATAL';
}

/**
 * The caller aborted the invocation. Carries the order as of the last completed fold.
 */
export class RerankCancelledError extends RerankError {
	readonly code = 'CANCELLED';
	readonly lastCompletedOrder: Candidate[];

	constructor(message: string, lastCompletedOrder: Candidate[], options: RerankErrorOptions = {}) {
		super(message, options);
		this.lastCompletedOrder = lastCompletedOrder;
	}
}

export function isRerankError(error: unknown): error is RerankError {
	return error instanceof RerankError;
}
