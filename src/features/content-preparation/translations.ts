import type { ContentRecord, TranslationResult } from '~/shared/types/core.js';

/**
 * New records whose text is the translation, keyed by `id`.
 * `id` and `originalIndex` are preserved; `cleanText` and `embedding` are dropped
 * because they described the text being replaced. Records without a translation
 * are copied unchanged.
 */
export function applyTranslations(
	records: readonly ContentRecord[],
	translations: readonly TranslationResult[]
): ContentRecord[] {
	const translationById = new Map<string, string>();
	for (const translation of translations) {
		translationById.set(translation.id, translation.translatedText);
	}

	return records.map(record => {
		const translated = translationById.get(record.id);
		if (translated === undefined) {
			return { ...record };
		}

		return {
			id: record.id,
			rawText: translated,
			cleanText: '',
			originalIndex: record.originalIndex,
		};
	});
}
