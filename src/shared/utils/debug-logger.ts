/**
 * Structured logger for alignment runs and collaborator calls
 *
 * Every entry is a single JSON line carrying the component, the operation and
 * the time elapsed since the context was created, so one alignment run can be
 * followed from CSV parsing through embedding to the exported rows.
 */

import { env } from '~/shared/env.js';

// ================================================================================================
// Types
// ================================================================================================

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'TRACE';

export type LoggableValue = string | number | boolean | null | undefined;
export type LogMetadata = Record<string, LoggableValue | LoggableValue[]>;

export type AlignmentData = {
	referenceCount?: number;
	targetCount?: number;
	candidateCount?: number;
	matchedCount?: number;
	leftoverCount?: number;
	threshold?: number;
};

export type EmbeddingData = {
	batchNumber?: number;
	batchSize?: number;
	embedded?: number;
	skipped?: number;
	failed?: number;
};

export type LogData = LogMetadata | AlignmentData | EmbeddingData | Record<string, unknown>;

export interface LogContext {
	readonly component: string;
	readonly operation: string;
	readonly startTime: number;
	readonly metadata: LogMetadata;
	readonly requestId?: string;
}

export interface TimingResult<T> {
	readonly result: T;
	readonly duration: number;
	readonly context: LogContext;
}

// ================================================================================================
// Configuration
// ================================================================================================

const LOG_LEVELS = {
	ERROR: 0,
	WARN: 1,
	INFO: 2,
	DEBUG: 3,
	TRACE: 4,
} as const;

const currentLevel = LOG_LEVELS[env.LOG_LEVEL];
const isDebugEnabled = currentLevel >= LOG_LEVELS.DEBUG;

// Granular debug controls
const debugAlignment = env.DEBUG_ALIGNMENT;
const debugTiming = env.DEBUG_TIMING;

// ================================================================================================
// Core Logging Function
// ================================================================================================

/**
 * Primary logging function - all logging flows through here
 */
export function log(level: LogLevel, context: LogContext, message: string, data?: LogData): void {
	if (LOG_LEVELS[level] > currentLevel) return;

	// DEBUG and TRACE output for the matcher is opt-in on top of LOG_LEVEL
	if (level === 'DEBUG' || level === 'TRACE') {
		const comp = context.component.toLowerCase();
		if (comp.includes('align') && !debugAlignment) return;
		if (comp.includes('timing') && !debugTiming) return;
	}

	const logEntry = {
		timestamp: new Date().toISOString(),
		level,
		component: context.component,
		operation: context.operation,
		message,
		duration: Date.now() - context.startTime,
		...(context.requestId && { requestId: context.requestId }),
		...(Object.keys(context.metadata).length > 0 && { metadata: context.metadata }),
		...(data !== undefined && { data: sanitizeForLogging(data) }),
	};

	switch (level) {
		case 'ERROR':
			console.error(JSON.stringify(logEntry));
			break;
		case 'WARN':
			console.warn(JSON.stringify(logEntry));
			break;
		case 'TRACE':
			console.debug(JSON.stringify(logEntry));
			break;
		default:
			console.log(JSON.stringify(logEntry));
	}
}

// ================================================================================================
// Context Management
// ================================================================================================

export function createContext(
	component: string,
	operation: string,
	metadata: LogMetadata = {},
	requestId?: string
): LogContext {
	return {
		component,
		operation,
		startTime: Date.now(),
		metadata,
		requestId,
	};
}

/**
 * Create child context for sub-operations
 * Keeps the parent's component and request id, nests the operation name
 */
export function createChildContext(
	parent: LogContext,
	operation: string,
	metadata: LogMetadata = {}
): LogContext {
	return {
		component: parent.component,
		operation: `${parent.operation}.${operation}`,
		startTime: Date.now(),
		metadata: { ...parent.metadata, ...metadata },
		requestId: parent.requestId,
	};
}

// ================================================================================================
// Timing
// ================================================================================================

/**
 * Execute function with automatic timing logging
 */
export async function withTiming<T>(
	context: LogContext,
	fn: () => Promise<T>,
	message: string = 'Operation completed'
): Promise<TimingResult<T>> {
	const startTime = Date.now();

	try {
		const result = await fn();
		const duration = Date.now() - startTime;

		if (debugTiming) {
			log('DEBUG', context, message, { duration, success: true });
		}

		return { result, duration, context };
	} catch (error) {
		log('ERROR', context, `${message} - failed`, {
			duration: Date.now() - startTime,
			error: error instanceof Error ? error.message : String(error),
		});

		throw error;
	}
}

/**
 * Synchronous version of withTiming for the pure alignment steps
 */
export function withTimingSync<T>(
	context: LogContext,
	fn: () => T,
	message: string = 'Operation completed'
): TimingResult<T> {
	const startTime = Date.now();

	try {
		const result = fn();
		const duration = Date.now() - startTime;

		if (debugTiming) {
			log('DEBUG', context, message, { duration, success: true });
		}

		return { result, duration, context };
	} catch (error) {
		log('ERROR', context, `${message} - failed`, {
			duration: Date.now() - startTime,
			error: error instanceof Error ? error.message : String(error),
		});

		throw error;
	}
}

// ================================================================================================
// Specialized Logging Functions
// ================================================================================================

/**
 * Log errors with full context and optional stack traces
 */
export function logError(context: LogContext, error: Error | string, data?: LogData): void {
	const errorData = {
		...(typeof error === 'string'
			? { message: error }
			: {
					message: error.message,
					...(env.LOG_STACK_TRACE && { stack: error.stack }),
				}),
		...(data && { additionalData: sanitizeForLogging(data) }),
	};

	log('ERROR', context, 'Error occurred', errorData);
}

// ================================================================================================
// Data Sanitization
// ================================================================================================

/**
 * Sanitize data for logging: vectors and credentials never reach the log
 */
export function sanitizeForLogging(data: unknown): unknown {
	if (typeof data === 'string') {
		const truncated = data.length > 200 ? `${data.substring(0, 200)}...` : data;
		return truncated
			.replace(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '[EMAIL]')
			.replace(/sk-[a-zA-Z0-9_-]{20,}/g, '[API_KEY]');
	}

	if (Array.isArray(data)) {
		return {
			count: data.length,
			sample: data.slice(0, 3).map(sanitizeForLogging),
			...(data.length > 3 && { truncated: true }),
		};
	}

	if (typeof data === 'object' && data !== null) {
		const sanitized: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(data)) {
			if (
				['embedding', 'password', 'secret', 'apikey', 'token'].some(sensitive =>
					key.toLowerCase().includes(sensitive)
				)
			) {
				sanitized[key] = '[REDACTED]';
			} else {
				sanitized[key] = sanitizeForLogging(value);
			}
		}
		return sanitized;
	}

	return data;
}

/**
 * Get current logging configuration
 */
export function getLoggingConfig() {
	return {
		level: env.LOG_LEVEL,
		debugAlignment,
		debugTiming,
		isDebugEnabled,
	};
}
