import { createOpenAI } from '@ai-sdk/openai';
import { generateObject } from 'ai';
import { z } from 'zod';
import { env } from '~/shared/env.js';
import type { TranslationConfig } from '~/shared/types/config.js';
import type { ContentRecord, TranslationResult } from '~/shared/types/core.js';
import type { Result, TranslationService } from '~/shared/types/services.js';
import { createContext, log } from '~/shared/utils/debug-logger.js';
import { withRetry } from '~/shared/utils/retry-mechanism.js';

const translationSchema = z.object({
	translations: z.array(
		z.object({
			id: z.string(),
			translatedText: z.string(),
		})
	),
});

export function buildTranslationPrompt(
	records: readonly ContentRecord[],
	sourceLanguage: string,
	targetLanguage: string
): string {
	const source = sourceLanguage === 'auto' ? 'the detected source language' : sourceLanguage;
	const items = records.map(record => ({ id: record.id, text: record.cleanText || record.rawText }));

	return [
		`Translate each item from ${source} to ${targetLanguage}.`,
		'Keep the meaning, product names and numbers. Return every id exactly once.',
		'Items:',
		JSON.stringify(items),
	].join('\n');
}

/**
 * LLM-backed translation of target content ahead of embedding
 * Items the model leaves out are simply not translated
 */
export function createTranslationService(
	config: TranslationConfig = {
		model: env.TRANSLATION_MODEL,
		batchSize: env.TRANSLATION_BATCH_SIZE,
	}
): TranslationService {
	const openai = createOpenAI({ apiKey: env.OPENAI_API_KEY });

	return {
		async translateBatch(
			records: ContentRecord[],
			sourceLanguage: string,
			targetLanguage: string
		): Promise<Result<TranslationResult[]>> {
			const context = createContext('TRANSLATION', 'translate_batch', {
				recordCount: records.length,
				targetLanguage,
			});

			try {
				const results: TranslationResult[] = [];

				for (let i = 0; i < records.length; i += config.batchSize) {
					const batch = records.slice(i, i + config.batchSize);
					const byId = new Map(batch.map(record => [record.id, record]));

					const response = await withRetry(
						() =>
							generateObject({
								model: openai(config.model),
								schema: translationSchema as z.ZodSchema, // Type assertion needed for V5 compatibility
								prompt: buildTranslationPrompt(batch, sourceLanguage, targetLanguage),
								temperature: 0,
							}),
						'translate_batch'
					);

					const { translations } = translationSchema.parse(response.object);
					for (const item of translations) {
						const record = byId.get(item.id);
						if (record) {
							results.push({
								id: item.id,
								originalText: record.rawText,
								translatedText: item.translatedText,
							});
						}
					}
				}

				log('INFO', context, 'Translation complete', {
					translated: results.length,
					untranslated: records.length - results.length,
				});

				return { success: true, data: results };
			} catch (error) {
				return {
					success: false,
					error: {
						type: 'TRANSLATION_ERROR',
						message: 'Failed to translate records',
						cause: error,
					},
				};
			}
		},
	};
}
