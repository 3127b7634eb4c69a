/**
 * Test setup utilities for content alignment tests
 */

import { afterAll, beforeAll, jest } from '@jest/globals';

// Structured log lines are not part of what the tests assert
export function setupTestSuite(): void {
	beforeAll(() => {
		jest.spyOn(console, 'log').mockImplementation(() => undefined);
		jest.spyOn(console, 'warn').mockImplementation(() => undefined);
		jest.spyOn(console, 'error').mockImplementation(() => undefined);
		jest.spyOn(console, 'debug').mockImplementation(() => undefined);
	});

	afterAll(() => {
		jest.restoreAllMocks();
	});
}
