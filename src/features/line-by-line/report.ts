import { toAlignmentError } from '~/features/alignment/align.js';
import { cosineSimilarity, withEmbeddings } from '~/features/alignment/similarity.js';
import { validateAlignmentInput } from '~/features/alignment/validation.js';
import { classifyQuality, countQualityBands } from '~/features/quality/classify.js';
import type {
	ContentRecord,
	EmbeddedRecord,
	LineByLineDiagnostic,
	LineByLineStatistics,
	ReferenceSuggestion,
} from '~/shared/types/core.js';
import type { Result } from '~/shared/types/services.js';
import { createContext, log } from '~/shared/utils/debug-logger.js';

/**
 * Highest-scoring reference for a target across the whole reference list.
 * No usage tracking: the same reference may be suggested for many targets.
 * The first reference wins a tie.
 */
export function findBestReferenceMatch(
	target: ContentRecord,
	references: readonly EmbeddedRecord[]
): ReferenceSuggestion | null {
	if (target.embedding === undefined) return null;

	let best: ReferenceSuggestion | null = null;
	for (const reference of references) {
		const score = cosineSimilarity(target.embedding, reference.embedding);
		if (best === null || score > best.score) {
			best = { referenceRecord: reference, score, quality: classifyQuality(score) };
		}
	}

	return best;
}

function diagnosePair(
	reference: ContentRecord,
	target: ContentRecord,
	embeddedReferences: readonly EmbeddedRecord[],
	threshold: number
): LineByLineDiagnostic {
	if (reference.embedding === undefined || target.embedding === undefined) {
		return {
			targetRecord: target,
			referenceRecord: reference,
			score: 0,
			isGood: false,
			quality: 'Poor',
			suggestion: null,
		};
	}

	const score = cosineSimilarity(reference.embedding, target.embedding);
	const isGood = score >= threshold;

	return {
		targetRecord: target,
		referenceRecord: reference,
		score,
		isGood,
		quality: classifyQuality(score),
		suggestion: isGood ? null : findBestReferenceMatch(target, embeddedReferences),
	};
}

/**
 * Positional quick-look comparison: reference[i] against target[i].
 *
 * Weak pairs get a non-binding suggestion of the best reference anywhere in the
 * list. Targets past the end of the reference list have no positional partner and
 * are scored 0, but still get a suggestion. Produces one diagnostic per target.
 */
export function generateLineByLineReport(
	references: readonly ContentRecord[],
	targets: readonly ContentRecord[],
	threshold: number
): Result<LineByLineDiagnostic[]> {
	const validationError = validateAlignmentInput(references, targets, threshold);
	if (validationError) {
		return { success: false, error: validationError };
	}

	const context = createContext('LINE_BY_LINE', 'generate_report', {
		referenceCount: references.length,
		targetCount: targets.length,
		threshold,
	});

	if (references.length !== targets.length) {
		log('WARN', context, 'Reference and target have different row counts', {
			referenceCount: references.length,
			targetCount: targets.length,
		});
	}

	try {
		const embeddedReferences = withEmbeddings(references);
		const pairedLength = Math.min(references.length, targets.length);
		const diagnostics: LineByLineDiagnostic[] = [];

		for (let i = 0; i < pairedLength; i++) {
			diagnostics.push(diagnosePair(references[i], targets[i], embeddedReferences, threshold));
		}

		for (let i = pairedLength; i < targets.length; i++) {
			diagnostics.push({
				targetRecord: targets[i],
				referenceRecord: null,
				score: 0,
				isGood: false,
				quality: 'Poor',
				suggestion: findBestReferenceMatch(targets[i], embeddedReferences),
			});
		}

		log('INFO', context, 'Line-by-line report generated', {
			diagnosticCount: diagnostics.length,
			goodMatches: diagnostics.filter(diagnostic => diagnostic.isGood).length,
		});

		return { success: true, data: diagnostics };
	} catch (error) {
		return {
			success: false,
			error: toAlignmentError(error, 'Failed to generate line-by-line report'),
		};
	}
}

export function computeLineByLineStatistics(
	diagnostics: readonly LineByLineDiagnostic[],
	totalReference: number
): LineByLineStatistics {
	const goodMatches = diagnostics.filter(diagnostic => diagnostic.isGood).length;
	const averageScore =
		diagnostics.length > 0
			? diagnostics.reduce((sum, diagnostic) => sum + diagnostic.score, 0) / diagnostics.length
			: 0;

	return {
		totalReference,
		totalTarget: diagnostics.length,
		goodMatches,
		qualityCounts: countQualityBands(diagnostics.map(diagnostic => diagnostic.score)),
		averageScore,
		matchPercentage: totalReference > 0 ? (goodMatches / totalReference) * 100 : 0,
	};
}
