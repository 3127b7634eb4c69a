// Configuration types for the alignment system

export interface EmbeddingConfig {
	model: string;
	batchSize: number;
}

export interface TranslationConfig {
	model: string;
	batchSize: number;
}

export interface ContentValidationConfig {
	minLength: number;
	maxLength: number;
}
