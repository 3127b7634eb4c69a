import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { createContentRecords } from '~/features/content-preparation/records.js';
import type { ContentRecord } from '~/shared/types/core.js';
import type { Result } from '~/shared/types/services.js';
import { createContext, log } from '~/shared/utils/debug-logger.js';

export const CONTENT_ID_COLUMN = 'ContentId';
export const CONTENT_COLUMN = 'Content';

const csvRowsSchema = z.array(z.array(z.string()));

/**
 * Parse a `ContentId,Content` CSV into records in row order.
 * Extra columns are ignored; a row missing a cell reads it as empty.
 */
export function parseContentCsv(text: string): Result<ContentRecord[]> {
	let rows: string[][];
	try {
		const parsed: unknown = parse(text, {
			bom: true,
			skip_empty_lines: true,
			trim: true,
			relax_column_count: true,
		});
		rows = csvRowsSchema.parse(parsed);
	} catch (error) {
		return {
			success: false,
			error: {
				type: 'VALIDATION_ERROR',
				message: `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
				cause: error,
			},
		};
	}

	const [header, ...body] = rows;
	const idColumn = header ? header.indexOf(CONTENT_ID_COLUMN) : -1;
	const contentColumn = header ? header.indexOf(CONTENT_COLUMN) : -1;

	if (idColumn === -1 || contentColumn === -1) {
		return {
			success: false,
			error: {
				type: 'VALIDATION_ERROR',
				message: `CSV header must contain ${CONTENT_ID_COLUMN} and ${CONTENT_COLUMN} columns`,
			},
		};
	}

	if (body.length === 0) {
		return {
			success: false,
			error: {
				type: 'VALIDATION_ERROR',
				message: 'CSV contains no content rows',
			},
		};
	}

	return {
		success: true,
		data: createContentRecords(
			body.map(row => ({
				id: row[idColumn] ?? '',
				content: row[contentColumn] ?? '',
			}))
		),
	};
}

export async function readContentCsv(filePath: string): Promise<Result<ContentRecord[]>> {
	const context = createContext('CSV_IO', 'read_content_csv', { filePath });

	let text: string;
	try {
		text = await readFile(filePath, 'utf8');
	} catch (error) {
		return {
			success: false,
			error: {
				type: 'FILE_ERROR',
				message: `Cannot read CSV file: ${filePath}`,
				cause: error,
			},
		};
	}

	const result = parseContentCsv(text);
	if (result.success) {
		log('INFO', context, 'CSV loaded', { rowCount: result.data.length });
	} else {
		log('WARN', context, 'CSV rejected', { error: result.error.message });
	}
	return result;
}
