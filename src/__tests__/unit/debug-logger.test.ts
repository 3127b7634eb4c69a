import { afterEach, describe, expect, it, jest } from '@jest/globals';
import {
	createChildContext,
	createContext,
	log,
	logError,
	sanitizeForLogging,
} from '~/shared/utils/debug-logger.js';

afterEach(() => {
	jest.restoreAllMocks();
});

describe('log', () => {
	it('should write one JSON line with component, operation and data', () => {
		const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

		log('INFO', createContext('CSV_IO', 'read', { filePath: 'a.csv' }), 'CSV loaded', {
			rowCount: 3,
		});

		expect(spy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
			level: 'INFO',
			component: 'CSV_IO',
			operation: 'read',
			message: 'CSV loaded',
			metadata: { filePath: 'a.csv' },
			data: { rowCount: 3 },
		});
	});

	it('should drop entries below the configured level', () => {
		const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

		log('DEBUG', createContext('CSV_IO', 'read'), 'Not shown');

		expect(spy).not.toHaveBeenCalled();
	});

	it('should send errors to console.error', () => {
		const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

		logError(createContext('HTTP', 'request'), new Error('boom'));

		expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
			level: 'ERROR',
			data: { message: 'boom' },
		});
	});
});

describe('createChildContext', () => {
	it('should nest the operation and merge metadata', () => {
		const parent = createContext('ALIGNMENT', 'align_records', { threshold: 0.5 }, 'req-1');

		const child = createChildContext(parent, 'similarity_matrix', { referenceCount: 2 });

		expect(child).toMatchObject({
			component: 'ALIGNMENT',
			operation: 'align_records.similarity_matrix',
			metadata: { threshold: 0.5, referenceCount: 2 },
			requestId: 'req-1',
		});
	});
});

describe('sanitizeForLogging', () => {
	it('should redact vectors and credentials', () => {
		expect(
			sanitizeForLogging({ embedding: [0.1, 0.2], apiKey: 'test-secret', id: 'r1' })
		).toEqual({ embedding: '[REDACTED]', apiKey: '[REDACTED]', id: 'r1' });
	});

	it('should truncate long strings and mask emails', () => {
		expect(sanitizeForLogging('a'.repeat(250))).toBe(`${'a'.repeat(200)}...`);
		expect(sanitizeForLogging('contact someone@example.com')).toBe('contact [EMAIL]');
	});

	it('should summarize arrays', () => {
		expect(sanitizeForLogging([1, 2, 3, 4])).toEqual({
			count: 4,
			sample: [1, 2, 3],
			truncated: true,
		});
		expect(sanitizeForLogging([1])).toEqual({ count: 1, sample: [1] });
	});
});
