// Re-export all types from specialized modules for convenience

export type { ToolResult } from '~/shared/types/api.js';
export type {
	ContentValidationConfig,
	EmbeddingConfig,
	TranslationConfig,
} from '~/shared/types/config.js';
export type {
	AlignedRow,
	AlignmentResult,
	AlignmentStatistics,
	AlignmentStatus,
	ContentRecord,
	DisplayRow,
	DisplayRowStatus,
	EmbeddedRecord,
	LineByLineDiagnostic,
	LineByLineStatistics,
	QualityBand,
	QualityCounts,
	ReferenceAlignedRow,
	ReferenceSuggestion,
	TranslationResult,
	UnmatchedTargetRow,
} from '~/shared/types/core.js';
export type {
	EmbeddingService,
	OperationError,
	OperationErrorType,
	Result,
	TranslationService,
} from '~/shared/types/services.js';
