import type { ContentRecord, EmbeddedRecord } from '~/shared/types/core.js';

/**
 * Raised when two vectors of different lengths are compared.
 * Signals that the embedding provider returned vectors from different models
 * or dimensions, so it is kept distinct from ordinary failures.
 */
export class DimensionMismatchError extends Error {
	readonly leftLength: number;
	readonly rightLength: number;

	constructor(leftLength: number, rightLength: number) {
		super(`Vectors must have the same length (got ${leftLength} and ${rightLength})`);
		this.name = 'DimensionMismatchError';
		this.leftLength = leftLength;
		this.rightLength = rightLength;
	}
}

function maxAbsComponent(vector: readonly number[]): number {
	let max = 0;
	for (const value of vector) {
		max = Math.max(max, Math.abs(value));
	}
	return max;
}

/**
 * Cosine similarity of two equal-length vectors, in [-1, 1].
 * A zero-magnitude vector has no direction and scores 0 against anything.
 * Components are scaled by the largest magnitude first so very large or very
 * small values neither overflow nor underflow.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new DimensionMismatchError(a.length, b.length);
	}

	const scaleA = maxAbsComponent(a);
	const scaleB = maxAbsComponent(b);
	if (scaleA === 0 || scaleB === 0) {
		return 0;
	}

	let dotProduct = 0;
	let normA = 0;
	let normB = 0;

	for (let i = 0; i < a.length; i++) {
		const x = a[i] / scaleA;
		const y = b[i] / scaleB;
		dotProduct += x * y;
		normA += x * x;
		normB += y * y;
	}

	// Rounding can push parallel vectors a hair past 1
	return Math.max(-1, Math.min(1, dotProduct / Math.sqrt(normA * normB)));
}

export function hasEmbedding(record: ContentRecord): record is EmbeddedRecord {
	return record.embedding !== undefined;
}

/**
 * Records that can take part in scoring, in their original order
 */
export function withEmbeddings(records: readonly ContentRecord[]): EmbeddedRecord[] {
	return records.filter(hasEmbedding);
}

/**
 * Full reference x target score grid: matrix[i][j] compares references[i] with targets[j].
 *
 * This is the dominant cost of an alignment run at O(R * T * D) for D-dimensional
 * embeddings. Each run builds a fresh matrix; nothing is cached between runs.
 */
export function buildSimilarityMatrix(
	references: readonly EmbeddedRecord[],
	targets: readonly EmbeddedRecord[]
): number[][] {
	return references.map(reference =>
		targets.map(target => cosineSimilarity(reference.embedding, target.embedding))
	);
}
