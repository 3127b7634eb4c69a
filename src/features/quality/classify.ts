import type { QualityBand, QualityCounts } from '~/shared/types/core.js';

export const QUALITY_THRESHOLDS = {
	High: 0.8,
	Medium: 0.6,
	Low: 0.4,
} as const;

export const QUALITY_BANDS: readonly QualityBand[] = ['Poor', 'Low', 'Medium', 'High'];

/**
 * Map a similarity score to its band. A missing score is Poor.
 */
export function classifyQuality(score: number | null | undefined): QualityBand {
	if (score === null || score === undefined || Number.isNaN(score)) return 'Poor';
	if (score >= QUALITY_THRESHOLDS.High) return 'High';
	if (score >= QUALITY_THRESHOLDS.Medium) return 'Medium';
	if (score >= QUALITY_THRESHOLDS.Low) return 'Low';
	return 'Poor';
}

export function emptyQualityCounts(): QualityCounts {
	return { Poor: 0, Low: 0, Medium: 0, High: 0 };
}

export function countQualityBands(scores: Iterable<number | null>): QualityCounts {
	const counts = emptyQualityCounts();
	for (const score of scores) {
		counts[classifyQuality(score)]++;
	}
	return counts;
}
