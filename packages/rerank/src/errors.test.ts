import { describe, it, expect } from 'vitest';
import { CapacityError, FatalBackendError, RateLimitError, RerankCancelledError, isRerankError } from './errors.js';

describe('RerankError', () => {
	it('should keep the first span attached', () => {
		const error = new FatalBackendError('down').withSpan({ pass: 0, start: 0, end: 10 });
		error.withSpan({ pass: 1, start: 5, end: 15 });

		expect(error.span).toEqual({ pass: 0, start: 0, end: 10 });
	});

	it('should serialize code, span and context', () => {
		const error = new CapacityError('too long', {
			span: { pass: 0, start: 10, end: 20 },
			context: { budget: 100 }
		});

		expect(error.toJSON()).toEqual({
			name: 'CapacityError',
			code: 'CAPACITY',
			message: 'too long',
			retryable: false,
			span: { pass: 0, start: 10, end: 20 },
			context: { budget: 100 }
		});
	});

	it('should mark rate limits as retryable', () => {
		const error = new RateLimitError('slow down', { retryAfterMs: 500 });

		expect(error.code).toBe('RATE_LIMIT');
		expect(error.retryable).toBe(true);
		expect(error.retryAfterMs).toBe(500);
	});

	it('should carry the last completed order on cancellation', () => {
		const error = new RerankCancelledError('stopped', []);

		expect(error.lastCompletedOrder).toEqual([]);
		expect(isRerankError(error)).toBe(true);
		expect(isRerankError(new Error('plain'))).toBe(false);
	});
});
