// Service interface types for dependency injection

import type { ContentRecord, TranslationResult } from '~/shared/types/core.js';

// Result type for consistent error handling
export type Result<T> = { success: true; data: T } | { success: false; error: OperationError };

export type OperationErrorType =
	| 'VALIDATION_ERROR'
	| 'DIMENSION_MISMATCH'
	| 'ALIGNMENT_ERROR'
	| 'EMBEDDING_ERROR'
	| 'TRANSLATION_ERROR'
	| 'FILE_ERROR'
	| 'EXPORT_ERROR';

export interface OperationError {
	type: OperationErrorType;
	message: string;
	cause?: unknown;
}

export interface EmbeddingService {
	embed(text: string): Promise<Result<number[]>>;
	embedBatch(texts: string[]): Promise<Result<number[][]>>;
}

export interface TranslationService {
	translateBatch(
		records: ContentRecord[],
		sourceLanguage: string,
		targetLanguage: string
	): Promise<Result<TranslationResult[]>>;
}
