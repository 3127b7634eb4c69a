#!/usr/bin/env npx tsx

/**
 * Align a target CSV to a reference CSV and write the aligned target file
 *
 * Usage:
 *   npm run align -- reference.csv target.csv [--output aligned.csv] [--threshold 0.5]
 *     [--translate-to en] [--source-language auto] [--line-by-line report.csv]
 */

import path from 'node:path';
import { z } from 'zod';
import { alignRecords } from '../src/features/alignment/align.js';
import {
	buildDisplayRows,
	computeAlignmentStatistics,
} from '../src/features/alignment/assembler.js';
import { attachEmbeddings } from '../src/features/content-preparation/embeddings.js';
import { prepareRecords } from '../src/features/content-preparation/records.js';
import { applyTranslations } from '../src/features/content-preparation/translations.js';
import {
	formatDisplayRowsCsv,
	formatLineByLineCsv,
	writeCsvFile,
} from '../src/features/csv-io/format.js';
import { readContentCsv } from '../src/features/csv-io/parse.js';
import {
	computeLineByLineStatistics,
	generateLineByLineReport,
} from '../src/features/line-by-line/report.js';
import { QUALITY_BANDS } from '../src/features/quality/classify.js';
import { env } from '../src/shared/env.js';
import { createEmbeddingService } from '../src/shared/services/embedding-service.js';
import { createTranslationService } from '../src/shared/services/translation-service.js';
import type { ContentRecord, TranslationResult } from '../src/shared/types/core.js';
import type { OperationError, Result } from '../src/shared/types/services.js';
import { createContext, log, logError, withTiming } from '../src/shared/utils/debug-logger.js';

const AlignFilesConfigSchema = z.object({
	referencePath: z.string().min(1, 'Reference CSV path is required'),
	targetPath: z.string().min(1, 'Target CSV path is required'),
	outputPath: z.string().optional(),
	threshold: z.number().min(0).max(1),
	translateTo: z.string().optional(),
	sourceLanguage: z.string(),
	lineByLinePath: z.string().optional(),
});

type AlignFilesConfig = z.infer<typeof AlignFilesConfigSchema>;

class ScriptError extends Error {
	constructor(readonly operationError: OperationError) {
		super(operationError.message);
		this.name = 'ScriptError';
	}
}

function unwrap<T>(result: Result<T>): T {
	if (!result.success) {
		throw new ScriptError(result.error);
	}
	return result.data;
}

function parseArguments(args: string[]): AlignFilesConfig {
	const positional: string[] = [];
	let outputPath: string | undefined;
	let threshold = env.SIMILARITY_THRESHOLD;
	let translateTo: string | undefined;
	let sourceLanguage = 'auto';
	let lineByLinePath: string | undefined;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === '--output') outputPath = args[++i];
		else if (arg === '--threshold') threshold = parseFloat(args[++i] ?? '');
		else if (arg === '--translate-to') translateTo = args[++i];
		else if (arg === '--source-language') sourceLanguage = args[++i] ?? sourceLanguage;
		else if (arg === '--line-by-line') lineByLinePath = args[++i];
		else positional.push(arg);
	}

	return AlignFilesConfigSchema.parse({
		referencePath: positional[0],
		targetPath: positional[1],
		outputPath,
		threshold,
		translateTo,
		sourceLanguage,
		lineByLinePath,
	});
}

function defaultOutputPath(targetPath: string): string {
	const parsed = path.parse(targetPath);
	return path.join(parsed.dir, `${parsed.name}_aligned${parsed.ext || '.csv'}`);
}

async function translateTargets(
	targets: ContentRecord[],
	config: AlignFilesConfig
): Promise<{ records: ContentRecord[]; translations: TranslationResult[] }> {
	if (!config.translateTo) {
		return { records: targets, translations: [] };
	}

	const translations = unwrap(
		await createTranslationService().translateBatch(
			targets,
			config.sourceLanguage,
			config.translateTo
		)
	);
	return { records: prepareRecords(applyTranslations(targets, translations)), translations };
}

async function alignFiles(config: AlignFilesConfig): Promise<void> {
	const context = createContext('ALIGN_FILES', 'align_files', {
		referencePath: config.referencePath,
		targetPath: config.targetPath,
		threshold: config.threshold,
	});

	const originalTargets = unwrap(await readContentCsv(config.targetPath));
	const references = prepareRecords(unwrap(await readContentCsv(config.referencePath)));
	const translated = await translateTargets(prepareRecords(originalTargets), config);

	const embeddingService = createEmbeddingService();
	const { result: embeddedReferences } = await withTiming(
		context,
		() => attachEmbeddings(references, embeddingService),
		'Reference embeddings attached'
	);
	const { result: embeddedTargets } = await withTiming(
		context,
		() => attachEmbeddings(translated.records, embeddingService),
		'Target embeddings attached'
	);

	log('INFO', context, 'Embeddings ready', {
		referenceEmbedded: embeddedReferences.stats.embedded,
		referenceFailed: embeddedReferences.stats.failed,
		targetEmbedded: embeddedTargets.stats.embedded,
		targetFailed: embeddedTargets.stats.failed,
	});

	const alignment = unwrap(
		alignRecords(embeddedReferences.records, embeddedTargets.records, config.threshold)
	);
	const rows = buildDisplayRows(alignment, embeddedReferences.records, {
		originalTargets,
		translations: translated.translations,
	});

	const outputPath = unwrap(
		await writeCsvFile(
			config.outputPath ?? defaultOutputPath(config.targetPath),
			formatDisplayRowsCsv(rows)
		)
	);

	const statistics = computeAlignmentStatistics(alignment);
	console.log(`\nAligned file written to ${outputPath}`);
	console.log(`  Reference rows:   ${statistics.totalReference}`);
	console.log(`  Matched:          ${statistics.matchedCount} (${statistics.matchPercentage.toFixed(1)}%)`);
	console.log(`  Missing:          ${statistics.missingCount}`);
	console.log(`  Unmatched target: ${statistics.leftoverCount}`);
	console.log(`  Average score:    ${statistics.averageScore.toFixed(4)}`);
	for (const band of QUALITY_BANDS) {
		console.log(`  ${band.padEnd(17)} ${statistics.qualityCounts[band]}`);
	}

	if (config.lineByLinePath) {
		const diagnostics = unwrap(
			generateLineByLineReport(embeddedReferences.records, embeddedTargets.records, config.threshold)
		);
		const reportPath = unwrap(
			await writeCsvFile(config.lineByLinePath, formatLineByLineCsv(diagnostics))
		);
		const lineStatistics = computeLineByLineStatistics(diagnostics, references.length);
		console.log(`\nLine-by-line report written to ${reportPath}`);
		console.log(
			`  Good pairs: ${lineStatistics.goodMatches}/${lineStatistics.totalTarget} (${lineStatistics.matchPercentage.toFixed(1)}%)`
		);
	}
}

async function main() {
	const context = createContext('ALIGN_FILES', 'main');

	try {
		await alignFiles(parseArguments(process.argv.slice(2)));
		process.exit(0);
	} catch (error) {
		if (error instanceof ScriptError) {
			log('ERROR', context, error.message, { errorType: error.operationError.type });
		} else {
			logError(context, error instanceof Error ? error : new Error(String(error)));
		}
		process.exit(1);
	}
}

void main();
