import type { ContentRecord } from '~/shared/types/core.js';
import { cleanContent } from './clean.js';

export interface RawContentRow {
	id: string;
	content: string;
	embedding?: number[];
}

/**
 * Records in source-row order; `originalIndex` is the row position and never changes.
 */
export function createContentRecords(rows: readonly RawContentRow[]): ContentRecord[] {
	return rows.map((row, index) => ({
		id: row.id,
		rawText: row.content,
		cleanText: '',
		originalIndex: index,
		...(row.embedding !== undefined && { embedding: row.embedding }),
	}));
}

/**
 * New records with `cleanText` filled from `rawText`
 */
export function prepareRecords(records: readonly ContentRecord[]): ContentRecord[] {
	return records.map(record => ({ ...record, cleanText: cleanContent(record.rawText) }));
}
