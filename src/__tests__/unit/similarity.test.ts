/**
 * Unit tests for vector similarity
 */

import { describe, expect, it } from '@jest/globals';
import {
	buildSimilarityMatrix,
	cosineSimilarity,
	DimensionMismatchError,
	withEmbeddings,
} from '~/features/alignment/similarity.js';
import { vectors } from '../fixtures/test-data.js';
import { createEmbeddedRecords } from '../helpers/mock-factories.js';

describe('cosineSimilarity', () => {
	it('should score identical directions as 1', () => {
		expect(cosineSimilarity(vectors.east, vectors.east)).toBe(1);
		expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
	});

	it('should score orthogonal vectors as 0 and opposite vectors as -1', () => {
		expect(cosineSimilarity(vectors.east, vectors.north)).toBe(0);
		expect(cosineSimilarity(vectors.east, vectors.west)).toBe(-1);
	});

	it('should ignore magnitude', () => {
		expect(cosineSimilarity(vectors.east, vectors.northEast)).toBe(0.8);
		expect(cosineSimilarity(vectors.north, vectors.northEast)).toBe(0.6);
	});

	it('should return 0 when either vector has zero magnitude', () => {
		expect(cosineSimilarity([0, 0], vectors.east)).toBe(0);
		expect(cosineSimilarity(vectors.east, [0, 0])).toBe(0);
	});

	it('should score parallel vectors as 1 at extreme magnitudes', () => {
		expect(cosineSimilarity([1e200, 1e200], [1e200, 1e200])).toBeCloseTo(1, 10);
		expect(cosineSimilarity([1e-200, 0], [1e-200, 0])).toBe(1);
		expect(cosineSimilarity([1e200, 0], [0, 1e-200])).toBe(0);
		expect(cosineSimilarity([1e-200, 0], [-1e200, 0])).toBe(-1);
	});

	it('should stay within [-1, 1]', () => {
		const a = [0.1, 0.2, 0.3];
		const score = cosineSimilarity(a, [...a]);
		expect(score).toBeLessThanOrEqual(1);
		expect(score).toBeGreaterThanOrEqual(-1);
	});

	it('should throw DimensionMismatchError for vectors of different lengths', () => {
		expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);

		try {
			cosineSimilarity([1, 0], [1, 0, 0]);
		} catch (error) {
			expect(error).toBeInstanceOf(DimensionMismatchError);
			if (error instanceof DimensionMismatchError) {
				expect(error.leftLength).toBe(2);
				expect(error.rightLength).toBe(3);
				expect(error.message).toBe('Vectors must have the same length (got 2 and 3)');
			}
		}
	});
});

describe('withEmbeddings', () => {
	it('should keep only embedded records in their original order', () => {
		const records = createEmbeddedRecords('ref', [vectors.east, null, vectors.north]);

		const embedded = withEmbeddings(records);

		expect(embedded.map(record => record.id)).toEqual(['ref-0', 'ref-2']);
	});
});

describe('buildSimilarityMatrix', () => {
	it('should compare every reference with every target', () => {
		const references = withEmbeddings(createEmbeddedRecords('ref', [vectors.east, vectors.north]));
		const targets = withEmbeddings(
			createEmbeddedRecords('tgt', [vectors.northEast, vectors.west, vectors.north])
		);

		const matrix = buildSimilarityMatrix(references, targets);

		expect(matrix).toEqual([
			[0.8, -1, 0],
			[0.6, 0, 1],
		]);
	});

	it('should return an empty matrix when there are no references', () => {
		const targets = withEmbeddings(createEmbeddedRecords('tgt', [vectors.east]));
		expect(buildSimilarityMatrix([], targets)).toEqual([]);
	});
});
