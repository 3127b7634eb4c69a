import type { EmbeddedRecord } from '~/shared/types/core.js';

/**
 * A candidate pairing. Indices point into the embedding-filtered lists
 * the similarity matrix was built from.
 */
export interface ScoredPair {
	referenceIndex: number;
	targetIndex: number;
	score: number;
}

export interface AssignedMatch {
	target: EmbeddedRecord;
	targetIndex: number;
	score: number;
}

/**
 * Conflict-free pairing of filtered reference indices to targets.
 * Each reference index appears at most once in `matches` and each target
 * index at most once in `usedTargetIndices`.
 */
export interface Assignment {
	matches: Map<number, AssignedMatch>;
	usedTargetIndices: Set<number>;
}

/**
 * Anything that turns a score matrix into an Assignment can drive the assembler,
 * e.g. an optimal weighted bipartite matcher in place of the greedy one.
 */
export type AssignmentStrategy = (
	matrix: readonly (readonly number[])[],
	targets: readonly EmbeddedRecord[],
	threshold: number
) => Assignment;

/**
 * Every cell at or above the threshold, best first.
 * Equal scores keep row-major order: lower reference index, then lower target index.
 */
export function collectCandidates(
	matrix: readonly (readonly number[])[],
	threshold: number
): ScoredPair[] {
	const candidates: ScoredPair[] = [];

	for (let i = 0; i < matrix.length; i++) {
		const row = matrix[i];
		for (let j = 0; j < row.length; j++) {
			if (row[j] >= threshold) {
				candidates.push({ referenceIndex: i, targetIndex: j, score: row[j] });
			}
		}
	}

	return candidates.sort(
		(a, b) =>
			b.score - a.score || a.referenceIndex - b.referenceIndex || a.targetIndex - b.targetIndex
	);
}

/**
 * Greedy approximation of maximum-weight bipartite matching.
 *
 * Walks the candidates from the highest score down and accepts a pair only when
 * neither its reference nor its target has been taken, so a contested slot always
 * goes to the highest-scoring pair first. Runs in O(R * T * log(R * T)) and is not
 * guaranteed to maximize the total score.
 */
export const assignGreedy: AssignmentStrategy = (matrix, targets, threshold) => {
	const matches = new Map<number, AssignedMatch>();
	const usedTargetIndices = new Set<number>();

	for (const candidate of collectCandidates(matrix, threshold)) {
		if (matches.has(candidate.referenceIndex) || usedTargetIndices.has(candidate.targetIndex)) {
			continue;
		}

		matches.set(candidate.referenceIndex, {
			target: targets[candidate.targetIndex],
			targetIndex: candidate.targetIndex,
			score: candidate.score,
		});
		usedTargetIndices.add(candidate.targetIndex);
	}

	return { matches, usedTargetIndices };
};
