import { classifyQuality, countQualityBands } from '~/features/quality/classify.js';
import type {
	AlignedRow,
	AlignmentResult,
	AlignmentStatistics,
	ContentRecord,
	DisplayRow,
	EmbeddedRecord,
	TranslationResult,
} from '~/shared/types/core.js';
import type { Assignment } from './greedy-matcher.js';

export interface DisplayRowOptions {
	/** Target rows as read from disk, before any translation replaced their text */
	originalTargets?: readonly ContentRecord[];
	translations?: readonly TranslationResult[];
}

/**
 * Rebuild the alignment in reference order from an assignment over the filtered lists.
 *
 * Reference records are resolved to their filtered position by `originalIndex`,
 * and leftovers are computed from the `originalIndex` of used targets. Records are
 * frequently copied (translation, cleaning, embedding all return new objects), so
 * object identity is never consulted.
 */
export function assembleAlignment(
	references: readonly ContentRecord[],
	targets: readonly ContentRecord[],
	embeddedReferences: readonly EmbeddedRecord[],
	assignment: Assignment
): AlignmentResult {
	const filteredIndexByOriginal = new Map<number, number>();
	embeddedReferences.forEach((record, filteredIndex) => {
		filteredIndexByOriginal.set(record.originalIndex, filteredIndex);
	});

	const alignedRows = references.map((reference, referenceIndex): AlignedRow => {
		const filteredIndex = filteredIndexByOriginal.get(reference.originalIndex);
		const match = filteredIndex === undefined ? undefined : assignment.matches.get(filteredIndex);

		if (!match) {
			return {
				referenceIndex,
				targetRecord: null,
				score: null,
				hasMatch: false,
				status: 'Missing',
			};
		}

		return {
			referenceIndex,
			targetRecord: match.target,
			score: match.score,
			hasMatch: true,
			status: 'Matched',
		};
	});

	const usedTargetOriginalIndices = new Set<number>();
	for (const match of assignment.matches.values()) {
		usedTargetOriginalIndices.add(match.target.originalIndex);
	}

	const leftoverTargets = targets
		.filter(target => !usedTargetOriginalIndices.has(target.originalIndex))
		.sort((a, b) => a.originalIndex - b.originalIndex);

	const matchedCount = alignedRows.filter(row => row.hasMatch).length;

	return {
		alignedRows,
		leftoverTargets,
		totalReference: references.length,
		matchedCount,
		missingCount: alignedRows.length - matchedCount,
		leftoverCount: leftoverTargets.length,
	};
}

/**
 * Rows for both the interactive view and the CSV export.
 * Reference-aligned rows come first in reference order, then unmatched targets.
 */
export function buildDisplayRows(
	result: AlignmentResult,
	references: readonly ContentRecord[],
	options: DisplayRowOptions = {}
): DisplayRow[] {
	const originalTextById = new Map<string, string>();
	for (const record of options.originalTargets ?? []) {
		originalTextById.set(record.id, record.rawText);
	}

	const translationById = new Map<string, string>();
	for (const translation of options.translations ?? []) {
		translationById.set(translation.id, translation.translatedText);
	}

	const aligned = result.alignedRows.map((row): DisplayRow => {
		const reference = references[row.referenceIndex];
		const target = row.targetRecord;

		return {
			rowType: 'ReferenceAligned',
			referenceLineNumber: reference.originalIndex + 1,
			referenceContent: reference.rawText,
			targetLineNumber: target ? target.originalIndex + 1 : null,
			targetId: target?.id ?? '',
			targetContent: target ? (originalTextById.get(target.id) ?? target.rawText) : '',
			translatedContent: target ? (translationById.get(target.id) ?? '') : '',
			status: row.status,
			score: row.score,
			quality: classifyQuality(row.score),
		};
	});

	const unmatched = [...result.leftoverTargets]
		.sort((a, b) => a.originalIndex - b.originalIndex)
		.map((target): DisplayRow => ({
			rowType: 'UnmatchedTarget',
			referenceLineNumber: null,
			referenceContent: '',
			targetLineNumber: target.originalIndex + 1,
			targetId: target.id,
			targetContent: originalTextById.get(target.id) ?? target.rawText,
			translatedContent: translationById.get(target.id) ?? '',
			status: 'Unmatched Target',
			score: null,
			quality: 'Poor',
		}));

	return [...aligned, ...unmatched];
}

/**
 * Summary of an alignment. Band counts and the average cover matched rows only.
 */
export function computeAlignmentStatistics(result: AlignmentResult): AlignmentStatistics {
	const scores: number[] = [];
	for (const row of result.alignedRows) {
		if (row.score !== null) scores.push(row.score);
	}

	const averageScore =
		scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : 0;

	return {
		totalReference: result.totalReference,
		matchedCount: result.matchedCount,
		missingCount: result.missingCount,
		leftoverCount: result.leftoverCount,
		qualityCounts: countQualityBands(scores),
		averageScore,
		matchPercentage:
			result.totalReference > 0 ? (result.matchedCount / result.totalReference) * 100 : 0,
	};
}
