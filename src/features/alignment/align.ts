import type { AlignmentResult, ContentRecord } from '~/shared/types/core.js';
import type { OperationError, Result } from '~/shared/types/services.js';
import {
	createChildContext,
	createContext,
	log,
	withTimingSync,
} from '~/shared/utils/debug-logger.js';
import { assembleAlignment } from './assembler.js';
import { type AssignmentStrategy, assignGreedy } from './greedy-matcher.js';
import { buildSimilarityMatrix, DimensionMismatchError, withEmbeddings } from './similarity.js';
import { validateAlignmentInput } from './validation.js';

/**
 * Pair reference and target records by embedding similarity.
 *
 * Records without an embedding are never scored: references become gap rows and
 * targets become leftovers. Finding no match is reported in the result, not as a
 * failure; only invalid input and mismatched vector lengths fail the run.
 */
export function alignRecords(
	references: readonly ContentRecord[],
	targets: readonly ContentRecord[],
	threshold: number,
	strategy: AssignmentStrategy = assignGreedy
): Result<AlignmentResult> {
	const validationError = validateAlignmentInput(references, targets, threshold);
	if (validationError) {
		return { success: false, error: validationError };
	}

	const context = createContext('ALIGNMENT', 'align_records', {
		referenceCount: references.length,
		targetCount: targets.length,
		threshold,
	});

	try {
		const embeddedReferences = withEmbeddings(references);
		const embeddedTargets = withEmbeddings(targets);

		log('DEBUG', context, 'Filtered records with embeddings', {
			referenceCount: embeddedReferences.length,
			targetCount: embeddedTargets.length,
		});

		const { result: matrix } = withTimingSync(
			createChildContext(context, 'similarity_matrix'),
			() => buildSimilarityMatrix(embeddedReferences, embeddedTargets),
			'Similarity matrix built'
		);

		const assignment = strategy(matrix, embeddedTargets, threshold);
		const result = assembleAlignment(references, targets, embeddedReferences, assignment);

		log('DEBUG', context, 'Alignment assembled', {
			matchedCount: result.matchedCount,
			leftoverCount: result.leftoverCount,
		});

		return { success: true, data: result };
	} catch (error) {
		return { success: false, error: toAlignmentError(error, 'Failed to align records') };
	}
}

export function toAlignmentError(error: unknown, message: string): OperationError {
	if (error instanceof DimensionMismatchError) {
		return {
			type: 'DIMENSION_MISMATCH',
			message: error.message,
			cause: error,
		};
	}

	return {
		type: 'ALIGNMENT_ERROR',
		message,
		cause: error,
	};
}
