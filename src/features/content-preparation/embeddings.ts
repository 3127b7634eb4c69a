import { env } from '~/shared/env.js';
import type { ContentValidationConfig } from '~/shared/types/config.js';
import type { ContentRecord } from '~/shared/types/core.js';
import type { EmbeddingService } from '~/shared/types/services.js';
import { createContext, log, logError } from '~/shared/utils/debug-logger.js';
import { DEFAULT_VALIDATION, isContentValid } from './clean.js';

export interface AttachEmbeddingsOptions {
	batchSize?: number;
	validation?: ContentValidationConfig;
	/** Keep an embedding a record already carries instead of requesting a new one */
	skipEmbedded?: boolean;
}

export interface EmbeddingStats {
	embedded: number;
	skipped: number;
	failed: number;
}

export interface AttachEmbeddingsResult {
	records: ContentRecord[];
	stats: EmbeddingStats;
}

/**
 * Fill `embedding` on every record whose clean text is valid.
 *
 * A failed batch is retried one text at a time; a record whose embedding still
 * fails is returned without one and counted in `failed`. The batch as a whole
 * never fails: the alignment engine routes those records to gaps and leftovers.
 */
export async function attachEmbeddings(
	records: readonly ContentRecord[],
	embeddingService: EmbeddingService,
	options: AttachEmbeddingsOptions = {}
): Promise<AttachEmbeddingsResult> {
	const batchSize = options.batchSize ?? env.EMBEDDING_BATCH_SIZE;
	const validation = options.validation ?? DEFAULT_VALIDATION;
	const skipEmbedded = options.skipEmbedded ?? true;

	const context = createContext('EMBEDDING', 'attach_embeddings', {
		recordCount: records.length,
		batchSize,
	});

	const embeddings = new Map<number, number[]>();
	const pending: ContentRecord[] = [];
	let skipped = 0;

	for (const record of records) {
		if (skipEmbedded && record.embedding !== undefined) {
			embeddings.set(record.originalIndex, record.embedding);
		} else if (isContentValid(record.cleanText, validation)) {
			pending.push(record);
		} else {
			skipped++;
		}
	}

	let failed = 0;
	let batchNumber = 0;

	for (let i = 0; i < pending.length; i += batchSize) {
		const batch = pending.slice(i, i + batchSize);
		batchNumber++;

		const batchResult = await embeddingService.embedBatch(batch.map(record => record.cleanText));

		if (batchResult.success && batchResult.data.length === batch.length) {
			batch.forEach((record, j) => embeddings.set(record.originalIndex, batchResult.data[j]));
			log('DEBUG', context, 'Batch embedded', { batchNumber, batchSize: batch.length });
			continue;
		}

		log('WARN', context, 'Batch embedding failed, falling back to single requests', {
			batchNumber,
			batchSize: batch.length,
			error: batchResult.success ? 'embedding count mismatch' : batchResult.error.message,
		});

		for (const record of batch) {
			const single = await embeddingService.embed(record.cleanText);
			if (single.success) {
				embeddings.set(record.originalIndex, single.data);
			} else {
				failed++;
				logError(context, `Failed to embed record ${record.id}`, {
					originalIndex: record.originalIndex,
					errorType: single.error.type,
				});
			}
		}
	}

	const updated = records.map(record => {
		const { embedding: _previous, ...rest } = record;
		const embedding = embeddings.get(record.originalIndex);
		return embedding === undefined ? rest : { ...rest, embedding };
	});

	const stats = {
		embedded: pending.length - failed,
		skipped,
		failed,
	};

	log('INFO', context, 'Embeddings attached', stats);

	return { records: updated, stats };
}
