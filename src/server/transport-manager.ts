/**
 * Transport abstraction layer for the content alignment server
 * Shared tool handling logic for the stdio and HTTP transports
 */

import { alignRecords } from '~/features/alignment/align.js';
import {
	buildDisplayRows,
	computeAlignmentStatistics,
} from '~/features/alignment/assembler.js';
import { attachEmbeddings, type EmbeddingStats } from '~/features/content-preparation/embeddings.js';
import { createContentRecords, prepareRecords } from '~/features/content-preparation/records.js';
import { formatDisplayRowsCsv, formatLineByLineCsv } from '~/features/csv-io/format.js';
import {
	computeLineByLineStatistics,
	generateLineByLineReport,
} from '~/features/line-by-line/report.js';
import type {
	AlignContentArgs,
	ContentRecordInput,
	ExportAlignmentArgs,
	LineByLineReportArgs,
} from '~/server/routes/alignment-routes.js';
import { createEmbeddingService } from '~/shared/services/embedding-service.js';
import type {
	ContentRecord,
	EmbeddingService,
	LineByLineDiagnostic,
	OperationError,
	QualityBand,
	ToolResult,
} from '~/shared/types/index.js';
import { createContext, log, logError } from '~/shared/utils/debug-logger.js';

export const SERVER_INFO = {
	name: 'content-alignment-mcp',
	version: '1.0.0',
} as const;

export interface TransportDependencies {
	/** Used only when a request sets `embed_missing`; defaults to the OpenAI service */
	embeddingService?: EmbeddingService;
}

export interface LineByLineEntry {
	targetId: string;
	targetLine: number;
	referenceId: string | null;
	score: number;
	quality: QualityBand;
	isGood: boolean;
	suggestion: { referenceId: string; referenceLine: number; score: number; quality: QualityBand } | null;
}

interface PreparedInput {
	references: ContentRecord[];
	targets: ContentRecord[];
	embedding?: { reference: EmbeddingStats; target: EmbeddingStats };
}

function toToolError(error: OperationError, operation: string): ToolResult<never> {
	return {
		success: false,
		error: {
			message: error.message,
			code: error.type,
			operation,
		},
	};
}

function unexpectedError(error: unknown, operation: string): ToolResult<never> {
	const context = createContext('TRANSPORT', operation);
	logError(context, error instanceof Error ? error : String(error));
	return {
		success: false,
		error: {
			message: error instanceof Error ? error.message : 'Unknown error occurred',
			operation,
		},
	};
}

async function prepareInput(
	reference: readonly ContentRecordInput[],
	target: readonly ContentRecordInput[],
	embedMissing: boolean,
	dependencies: TransportDependencies
): Promise<PreparedInput> {
	const references = prepareRecords(createContentRecords(reference));
	const targets = prepareRecords(createContentRecords(target));

	if (!embedMissing) {
		return { references, targets };
	}

	const service = dependencies.embeddingService ?? createEmbeddingService();
	const referenceResult = await attachEmbeddings(references, service);
	const targetResult = await attachEmbeddings(targets, service);

	return {
		references: referenceResult.records,
		targets: targetResult.records,
		embedding: { reference: referenceResult.stats, target: targetResult.stats },
	};
}

function toLineByLineEntry(diagnostic: LineByLineDiagnostic): LineByLineEntry {
	const { suggestion } = diagnostic;
	return {
		targetId: diagnostic.targetRecord.id,
		targetLine: diagnostic.targetRecord.originalIndex + 1,
		referenceId: diagnostic.referenceRecord?.id ?? null,
		score: diagnostic.score,
		quality: diagnostic.quality,
		isGood: diagnostic.isGood,
		suggestion: suggestion
			? {
					referenceId: suggestion.referenceRecord.id,
					referenceLine: suggestion.referenceRecord.originalIndex + 1,
					score: suggestion.score,
					quality: suggestion.quality,
				}
			: null,
	};
}

/**
 * Align target records to reference records and return the display rows
 */
export async function alignContent(
	args: AlignContentArgs,
	dependencies: TransportDependencies = {}
): Promise<ToolResult> {
	const operation = 'align_content';
	try {
		const input = await prepareInput(args.reference, args.target, args.embed_missing, dependencies);
		const result = alignRecords(input.references, input.targets, args.threshold);
		if (!result.success) {
			return toToolError(result.error, operation);
		}

		const statistics = computeAlignmentStatistics(result.data);
		log('INFO', createContext('TRANSPORT', operation), 'Alignment complete', {
			matchedCount: statistics.matchedCount,
			missingCount: statistics.missingCount,
			leftoverCount: statistics.leftoverCount,
		});

		return {
			success: true,
			data: {
				rows: buildDisplayRows(result.data, input.references),
				statistics,
				...(input.embedding && { embedding: input.embedding }),
			},
		};
	} catch (error) {
		return unexpectedError(error, operation);
	}
}

/**
 * Positional comparison of reference[i] against target[i]
 */
export async function lineByLineReport(
	args: LineByLineReportArgs,
	dependencies: TransportDependencies = {}
): Promise<ToolResult> {
	const operation = 'line_by_line_report';
	try {
		const input = await prepareInput(args.reference, args.target, args.embed_missing, dependencies);
		const result = generateLineByLineReport(input.references, input.targets, args.threshold);
		if (!result.success) {
			return toToolError(result.error, operation);
		}

		return {
			success: true,
			data: {
				entries: result.data.map(toLineByLineEntry),
				statistics: computeLineByLineStatistics(result.data, input.references.length),
				...(input.embedding && { embedding: input.embedding }),
			},
		};
	} catch (error) {
		return unexpectedError(error, operation);
	}
}

/**
 * Run an alignment or a line-by-line report and render it as CSV text
 */
export async function exportAlignment(
	args: ExportAlignmentArgs,
	dependencies: TransportDependencies = {}
): Promise<ToolResult<{ format: ExportAlignmentArgs['format']; rowCount: number; csv: string }>> {
	const operation = 'export_alignment_csv';
	try {
		const input = await prepareInput(args.reference, args.target, args.embed_missing, dependencies);

		if (args.format === 'line_by_line') {
			const report = generateLineByLineReport(input.references, input.targets, args.threshold);
			if (!report.success) {
				return toToolError(report.error, operation);
			}
			return {
				success: true,
				data: {
					format: args.format,
					rowCount: report.data.length,
					csv: formatLineByLineCsv(report.data),
				},
			};
		}

		const result = alignRecords(input.references, input.targets, args.threshold);
		if (!result.success) {
			return toToolError(result.error, operation);
		}
		const rows = buildDisplayRows(result.data, input.references);

		return {
			success: true,
			data: {
				format: args.format,
				rowCount: rows.length,
				csv: formatDisplayRowsCsv(rows),
			},
		};
	} catch (error) {
		return unexpectedError(error, operation);
	}
}
