import type { ContentRecord } from '~/shared/types/core.js';
import type { OperationError } from '~/shared/types/services.js';

function findDuplicateIndex(records: readonly ContentRecord[]): number | undefined {
	const seen = new Set<number>();
	for (const record of records) {
		if (seen.has(record.originalIndex)) return record.originalIndex;
		seen.add(record.originalIndex);
	}
	return undefined;
}

/**
 * Checks shared by every matching mode. Returns the failure to report, or null.
 */
export function validateAlignmentInput(
	references: readonly ContentRecord[] | null | undefined,
	targets: readonly ContentRecord[] | null | undefined,
	threshold: number
): OperationError | null {
	if (!references || references.length === 0) {
		return {
			type: 'VALIDATION_ERROR',
			message: 'No reference records to compare',
		};
	}

	if (!targets || targets.length === 0) {
		return {
			type: 'VALIDATION_ERROR',
			message: 'No target records to compare',
		};
	}

	if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
		return {
			type: 'VALIDATION_ERROR',
			message: `Similarity threshold must be between 0.0 and 1.0 (got ${threshold})`,
		};
	}

	const duplicateReference = findDuplicateIndex(references);
	if (duplicateReference !== undefined) {
		return {
			type: 'VALIDATION_ERROR',
			message: `Duplicate originalIndex ${duplicateReference} in reference records`,
		};
	}

	const duplicateTarget = findDuplicateIndex(targets);
	if (duplicateTarget !== undefined) {
		return {
			type: 'VALIDATION_ERROR',
			message: `Duplicate originalIndex ${duplicateTarget} in target records`,
		};
	}

	return null;
}
