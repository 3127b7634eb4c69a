import { createOpenAI } from '@ai-sdk/openai';
import { embed, embedMany } from 'ai';
import { env } from '~/shared/env.js';
import type { EmbeddingConfig } from '~/shared/types/config.js';
import type { EmbeddingService, Result } from '~/shared/types/services.js';
import { withRetry } from '~/shared/utils/retry-mechanism.js';

/**
 * OpenAI embedding service implementation
 * Retries and backoff live here, never in the alignment engine
 */
export function createEmbeddingService(
	config: EmbeddingConfig = { model: env.EMBEDDING_MODEL, batchSize: env.EMBEDDING_BATCH_SIZE }
): EmbeddingService {
	const openai = createOpenAI({ apiKey: env.OPENAI_API_KEY });
	const model = openai.textEmbeddingModel(config.model);

	return {
		async embed(text: string): Promise<Result<number[]>> {
			try {
				const { embedding } = await withRetry(() => embed({ model, value: text }), 'embed');

				return {
					success: true,
					data: embedding,
				};
			} catch (error) {
				return {
					success: false,
					error: {
						type: 'EMBEDDING_ERROR',
						message: 'Failed to generate embedding',
						cause: error,
					},
				};
			}
		},

		async embedBatch(texts: string[]): Promise<Result<number[][]>> {
			try {
				const embeddings: number[][] = [];

				for (let i = 0; i < texts.length; i += config.batchSize) {
					const batch = texts.slice(i, i + config.batchSize);
					const result = await withRetry(
						() => embedMany({ model, values: batch }),
						'embed_batch'
					);
					embeddings.push(...result.embeddings);

					// Small delay between batches to respect rate limits
					if (i + config.batchSize < texts.length) {
						await new Promise(resolve => setTimeout(resolve, 100));
					}
				}

				return {
					success: true,
					data: embeddings,
				};
			} catch (error) {
				return {
					success: false,
					error: {
						type: 'EMBEDDING_ERROR',
						message: 'Failed to generate batch embeddings',
						cause: error,
					},
				};
			}
		},
	};
}
