// Core domain types for content alignment

/**
 * A single row of localization content.
 * `originalIndex` is the record's identity: it is assigned once from source-row
 * order and every lookup, set membership and ordering decision keys on it.
 */
export interface ContentRecord {
	id: string;
	rawText: string;
	cleanText: string;
	originalIndex: number;
	embedding?: number[];
}

/** A record known to carry an embedding vector */
export type EmbeddedRecord = ContentRecord & { embedding: number[] };

export type QualityBand = 'Poor' | 'Low' | 'Medium' | 'High';

export type AlignmentStatus = 'Matched' | 'Missing';

export type DisplayRowStatus = AlignmentStatus | 'Unmatched Target';

export interface AlignedRow {
	/** Position of the reference record in the original reference list */
	referenceIndex: number;
	targetRecord: ContentRecord | null;
	score: number | null;
	hasMatch: boolean;
	status: AlignmentStatus;
}

export interface AlignmentResult {
	alignedRows: AlignedRow[];
	leftoverTargets: ContentRecord[];
	totalReference: number;
	matchedCount: number;
	missingCount: number;
	leftoverCount: number;
}

export type QualityCounts = Record<QualityBand, number>;

export interface AlignmentStatistics {
	totalReference: number;
	matchedCount: number;
	missingCount: number;
	leftoverCount: number;
	qualityCounts: QualityCounts;
	averageScore: number;
	matchPercentage: number;
}

interface DisplayRowBase {
	targetId: string;
	targetContent: string;
	translatedContent: string;
}

export interface ReferenceAlignedRow extends DisplayRowBase {
	rowType: 'ReferenceAligned';
	referenceLineNumber: number;
	referenceContent: string;
	targetLineNumber: number | null;
	status: AlignmentStatus;
	score: number | null;
	quality: QualityBand;
}

export interface UnmatchedTargetRow extends DisplayRowBase {
	rowType: 'UnmatchedTarget';
	referenceLineNumber: null;
	referenceContent: '';
	targetLineNumber: number;
	status: 'Unmatched Target';
	score: null;
	quality: 'Poor';
}

export type DisplayRow = ReferenceAlignedRow | UnmatchedTargetRow;

export interface ReferenceSuggestion {
	referenceRecord: ContentRecord;
	score: number;
	quality: QualityBand;
}

export interface LineByLineDiagnostic {
	targetRecord: ContentRecord;
	/** Reference at the same position, null for trailing targets */
	referenceRecord: ContentRecord | null;
	score: number;
	isGood: boolean;
	quality: QualityBand;
	suggestion: ReferenceSuggestion | null;
}

export interface LineByLineStatistics {
	totalReference: number;
	totalTarget: number;
	goodMatches: number;
	qualityCounts: QualityCounts;
	averageScore: number;
	matchPercentage: number;
}

export interface TranslationResult {
	id: string;
	originalText: string;
	translatedText: string;
}
