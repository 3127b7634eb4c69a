/**
 * Retry mechanism with exponential backoff
 * Used by the embedding and translation collaborators for transient API failures
 */

import { createContext, log } from '~/shared/utils/debug-logger.js';

export interface RetryOptions {
	maxRetries: number;
	baseDelay: number; // milliseconds
	maxDelay: number; // milliseconds
	exponentialFactor: number;
	jitter: boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
	maxRetries: 3,
	baseDelay: 1000,
	maxDelay: 10000,
	exponentialFactor: 2,
	jitter: true,
};

const RETRYABLE_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN'];
const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];
const RETRYABLE_MESSAGES = [
	'rate limit',
	'timeout',
	'network',
	'connection',
	'temporarily unavailable',
];

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Calculate retry delay with exponential backoff and optional +/- 20% jitter
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
	const exponentialDelay = options.baseDelay * options.exponentialFactor ** attempt;
	const clampedDelay = Math.min(exponentialDelay, options.maxDelay);

	if (options.jitter) {
		const jitterAmount = clampedDelay * 0.2;
		const jitter = (Math.random() - 0.5) * 2 * jitterAmount;
		return Math.max(0, clampedDelay + jitter);
	}

	return clampedDelay;
}

function readProperty(value: unknown, key: string): unknown {
	if (typeof value === 'object' && value !== null && key in value) {
		return Reflect.get(value, key);
	}
	return undefined;
}

/**
 * Network errors, rate limiting and temporary server errors are retryable
 */
export function isRetryableError(error: unknown): boolean {
	const code = readProperty(error, 'code');
	if (typeof code === 'string' && RETRYABLE_CODES.includes(code)) {
		return true;
	}

	const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
	if (typeof status === 'number' && RETRYABLE_STATUSES.includes(status)) {
		return true;
	}

	const message = readProperty(error, 'message');
	if (typeof message === 'string') {
		const lower = message.toLowerCase();
		return RETRYABLE_MESSAGES.some(fragment => lower.includes(fragment));
	}

	return false;
}

/**
 * Retry an async function with exponential backoff
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	operationName: string,
	options: Partial<RetryOptions> = {}
): Promise<T> {
	const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
	const context = createContext('RETRY', operationName, { maxRetries: opts.maxRetries });
	let lastError: unknown;

	for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
		try {
			return await fn();
		} catch (error) {
			lastError = error;

			if (attempt === opts.maxRetries) {
				break;
			}

			if (!isRetryableError(error)) {
				log('DEBUG', context, 'Non-retryable error', {
					attempt: attempt + 1,
					error: error instanceof Error ? error.message : String(error),
				});
				throw error;
			}

			const delay = calculateDelay(attempt, opts);
			log('DEBUG', context, 'Attempt failed, retrying', {
				attempt: attempt + 1,
				delay: Math.round(delay),
				error: error instanceof Error ? error.message : String(error),
			});

			await sleep(delay);
		}
	}

	log('WARN', context, 'All attempts failed', {
		attempts: opts.maxRetries + 1,
		error: lastError instanceof Error ? lastError.message : String(lastError),
	});
	throw lastError;
}
