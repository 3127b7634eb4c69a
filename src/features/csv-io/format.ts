import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import type { DisplayRow, LineByLineDiagnostic } from '~/shared/types/core.js';
import type { Result } from '~/shared/types/services.js';

export const DISPLAY_ROW_COLUMNS = [
	'ContentId',
	'Content',
	'Translation',
	'Status',
	'SimilarityScore',
	'Quality',
	'RowType',
	'ReferenceLine',
	'TargetLine',
] as const;

export const LINE_BY_LINE_COLUMNS = [
	'ContentId',
	'Content',
	'ReferenceContentId',
	'ReferenceContent',
	'Score',
	'Quality',
	'IsGood',
	'SuggestedContentId',
	'SuggestedContent',
	'SuggestedScore',
] as const;

type DisplayRowColumn = (typeof DISPLAY_ROW_COLUMNS)[number];
type LineByLineColumn = (typeof LINE_BY_LINE_COLUMNS)[number];

export function formatScore(score: number | null): string {
	return score === null ? '' : score.toFixed(4);
}

function formatLine(lineNumber: number | null): string {
	return lineNumber === null ? '' : String(lineNumber);
}

/**
 * Aligned target file: one line per display row, reference-aligned rows first.
 * Missing rows keep their place with empty target cells.
 */
export function formatDisplayRowsCsv(rows: readonly DisplayRow[]): string {
	const records = rows.map(
		(row): Record<DisplayRowColumn, string> => ({
			ContentId: row.targetId,
			Content: row.targetContent,
			Translation: row.translatedContent,
			Status: row.status,
			SimilarityScore: formatScore(row.score),
			Quality: row.quality,
			RowType: row.rowType,
			ReferenceLine: formatLine(row.referenceLineNumber),
			TargetLine: formatLine(row.targetLineNumber),
		})
	);

	return stringify(records, { header: true, columns: [...DISPLAY_ROW_COLUMNS] });
}

export function formatLineByLineCsv(diagnostics: readonly LineByLineDiagnostic[]): string {
	const records = diagnostics.map(
		(diagnostic): Record<LineByLineColumn, string> => ({
			ContentId: diagnostic.targetRecord.id,
			Content: diagnostic.targetRecord.rawText,
			ReferenceContentId: diagnostic.referenceRecord?.id ?? '',
			ReferenceContent: diagnostic.referenceRecord?.rawText ?? '',
			Score: formatScore(diagnostic.score),
			Quality: diagnostic.quality,
			IsGood: diagnostic.isGood ? 'true' : 'false',
			SuggestedContentId: diagnostic.suggestion?.referenceRecord.id ?? '',
			SuggestedContent: diagnostic.suggestion?.referenceRecord.rawText ?? '',
			SuggestedScore: formatScore(diagnostic.suggestion?.score ?? null),
		})
	);

	return stringify(records, { header: true, columns: [...LINE_BY_LINE_COLUMNS] });
}

export async function writeCsvFile(filePath: string, csv: string): Promise<Result<string>> {
	try {
		await writeFile(filePath, csv, 'utf8');
		return { success: true, data: filePath };
	} catch (error) {
		return {
			success: false,
			error: {
				type: 'EXPORT_ERROR',
				message: `Cannot write CSV file: ${filePath}`,
				cause: error,
			},
		};
	}
}
