import { describe, expect, it } from '@jest/globals';
import {
	classifyQuality,
	countQualityBands,
	QUALITY_BANDS,
	QUALITY_THRESHOLDS,
} from '~/features/quality/classify.js';
import type { QualityBand } from '~/shared/types/core.js';

const bandCases: [number, QualityBand][] = [
	[1, 'High'],
	[0.8, 'High'],
	[0.79, 'Medium'],
	[0.6, 'Medium'],
	[0.59, 'Low'],
	[0.4, 'Low'],
	[0.39, 'Poor'],
	[0, 'Poor'],
	[-0.5, 'Poor'],
];

describe('classifyQuality', () => {
	it.each(bandCases)('should classify %p as %s', (score, band) => {
		expect(classifyQuality(score)).toBe(band);
	});

	it('should classify a missing score as Poor', () => {
		expect(classifyQuality(null)).toBe('Poor');
		expect(classifyQuality(undefined)).toBe('Poor');
		expect(classifyQuality(Number.NaN)).toBe('Poor');
	});

	it('should expose band boundaries in descending order', () => {
		expect(QUALITY_THRESHOLDS.High).toBeGreaterThan(QUALITY_THRESHOLDS.Medium);
		expect(QUALITY_THRESHOLDS.Medium).toBeGreaterThan(QUALITY_THRESHOLDS.Low);
		expect(QUALITY_BANDS).toEqual(['Poor', 'Low', 'Medium', 'High']);
	});
});

describe('countQualityBands', () => {
	it('should count one band per score', () => {
		expect(countQualityBands([0.9, 0.5, null, 0.65, 0.85])).toEqual({
			Poor: 1,
			Low: 1,
			Medium: 1,
			High: 2,
		});
	});
});
