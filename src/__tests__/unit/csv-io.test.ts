/**
 * Unit tests for CSV reading and writing
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, describe, expect, it } from '@jest/globals';
import {
	formatDisplayRowsCsv,
	formatLineByLineCsv,
	formatScore,
	writeCsvFile,
} from '~/features/csv-io/format.js';
import { parseContentCsv, readContentCsv } from '~/features/csv-io/parse.js';
import type { DisplayRow, LineByLineDiagnostic } from '~/shared/types/core.js';
import { referenceCsv, targetCsvWithExtraColumns } from '../fixtures/test-data.js';
import { createTestRecord, expectSuccess } from '../helpers/mock-factories.js';
import { setupTestSuite } from '../helpers/test-setup.js';

setupTestSuite();

const workDir = mkdtempSync(path.join(tmpdir(), 'content-alignment-'));

afterAll(() => {
	rmSync(workDir, { recursive: true, force: true });
});

describe('parseContentCsv', () => {
	it('should read ContentId and Content in row order', () => {
		const records = expectSuccess(parseContentCsv(referenceCsv));

		expect(records).toEqual([
			{ id: 'r1', rawText: '<p>Welcome to the game</p>', cleanText: '', originalIndex: 0 },
			{ id: 'r2', rawText: 'Press start, then continue', cleanText: '', originalIndex: 1 },
			{ id: 'r3', rawText: 'Settings', cleanText: '', originalIndex: 2 },
		]);
	});

	it('should find the columns by header name', () => {
		const records = expectSuccess(parseContentCsv(targetCsvWithExtraColumns));

		expect(records.map(record => [record.id, record.rawText])).toEqual([
			['t1', 'Bienvenue'],
			['t2', 'Paramètres'],
		]);
	});

	it('should trim cells, skip empty lines and accept a byte order mark', () => {
		const records = expectSuccess(
			parseContentCsv('\uFEFFContentId,Content\n\n  a ,  Hello  \n\nb,World\n')
		);

		expect(records.map(record => [record.id, record.rawText, record.originalIndex])).toEqual([
			['a', 'Hello', 0],
			['b', 'World', 1],
		]);
	});

	it('should read a missing cell as empty content', () => {
		const records = expectSuccess(parseContentCsv('ContentId,Content\nonly-id'));

		expect(records[0]).toMatchObject({ id: 'only-id', rawText: '' });
	});

	it('should reject a file without the required header', () => {
		expect(parseContentCsv('Id,Text\n1,Hello')).toEqual({
			success: false,
			error: {
				type: 'VALIDATION_ERROR',
				message: 'CSV header must contain ContentId and Content columns',
			},
		});
		expect(parseContentCsv('')).toMatchObject({
			success: false,
			error: { type: 'VALIDATION_ERROR' },
		});
	});

	it('should reject a file with a header and no rows', () => {
		expect(parseContentCsv('ContentId,Content\n')).toEqual({
			success: false,
			error: { type: 'VALIDATION_ERROR', message: 'CSV contains no content rows' },
		});
	});

	it('should reject malformed CSV', () => {
		const result = parseContentCsv('ContentId,Content\na,"unterminated');

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.type).toBe('VALIDATION_ERROR');
			expect(result.error.message.startsWith('Invalid CSV: ')).toBe(true);
		}
	});
});

describe('readContentCsv', () => {
	it('should read records from disk', async () => {
		const filePath = path.join(workDir, 'reference.csv');
		writeFileSync(filePath, referenceCsv, 'utf8');

		const records = expectSuccess(await readContentCsv(filePath));

		expect(records.map(record => record.id)).toEqual(['r1', 'r2', 'r3']);
	});

	it('should report a missing file as FILE_ERROR', async () => {
		const filePath = path.join(workDir, 'missing.csv');

		const result = await readContentCsv(filePath);

		expect(result).toMatchObject({
			success: false,
			error: { type: 'FILE_ERROR', message: `Cannot read CSV file: ${filePath}` },
		});
	});
});

describe('formatScore', () => {
	it('should print four decimals and leave missing scores empty', () => {
		expect(formatScore(0.5)).toBe('0.5000');
		expect(formatScore(0.91234)).toBe('0.9123');
		expect(formatScore(null)).toBe('');
	});
});

describe('formatDisplayRowsCsv', () => {
	it('should write one line per display row under the fixed header', () => {
		const rows: DisplayRow[] = [
			{
				rowType: 'ReferenceAligned',
				referenceLineNumber: 1,
				referenceContent: 'Hello',
				targetLineNumber: null,
				targetId: '',
				targetContent: '',
				translatedContent: '',
				status: 'Missing',
				score: null,
				quality: 'Poor',
			},
			{
				rowType: 'ReferenceAligned',
				referenceLineNumber: 2,
				referenceContent: 'Press start',
				targetLineNumber: 1,
				targetId: 't1',
				targetContent: 'Appuyez, puis continuez',
				translatedContent: 'Press, then continue',
				status: 'Matched',
				score: 0.87654,
				quality: 'High',
			},
			{
				rowType: 'UnmatchedTarget',
				referenceLineNumber: null,
				referenceContent: '',
				targetLineNumber: 2,
				targetId: 't2',
				targetContent: 'Extra',
				translatedContent: '',
				status: 'Unmatched Target',
				score: null,
				quality: 'Poor',
			},
		];

		expect(formatDisplayRowsCsv(rows)).toBe(
			[
				'ContentId,Content,Translation,Status,SimilarityScore,Quality,RowType,ReferenceLine,TargetLine',
				',,,Missing,,Poor,ReferenceAligned,1,',
				't1,"Appuyez, puis continuez","Press, then continue",Matched,0.8765,High,ReferenceAligned,2,1',
				't2,Extra,,Unmatched Target,,Poor,UnmatchedTarget,,2',
				'',
			].join('\n')
		);
	});
});

describe('formatLineByLineCsv', () => {
	it('should write diagnostics with their suggestions', () => {
		const diagnostics: LineByLineDiagnostic[] = [
			{
				targetRecord: createTestRecord({ id: 't1', rawText: 'Hola' }),
				referenceRecord: createTestRecord({ id: 'r1', rawText: 'Hello' }),
				score: 0.25,
				isGood: false,
				quality: 'Poor',
				suggestion: {
					referenceRecord: createTestRecord({ id: 'r2', rawText: 'Goodbye' }),
					score: 0.91234,
					quality: 'High',
				},
			},
			{
				targetRecord: createTestRecord({ id: 't2', rawText: 'Extra' }),
				referenceRecord: null,
				score: 0,
				isGood: false,
				quality: 'Poor',
				suggestion: null,
			},
		];

		expect(formatLineByLineCsv(diagnostics)).toBe(
			[
				'ContentId,Content,ReferenceContentId,ReferenceContent,Score,Quality,IsGood,SuggestedContentId,SuggestedContent,SuggestedScore',
				't1,Hola,r1,Hello,0.2500,Poor,false,r2,Goodbye,0.9123',
				't2,Extra,,,0.0000,Poor,false,,,',
				'',
			].join('\n')
		);
	});
});

describe('writeCsvFile', () => {
	it('should write the CSV text and return the path', async () => {
		const filePath = path.join(workDir, 'aligned.csv');

		expect(expectSuccess(await writeCsvFile(filePath, 'a,b\n'))).toBe(filePath);
		expect(readFileSync(filePath, 'utf8')).toBe('a,b\n');
	});

	it('should report an unwritable path as EXPORT_ERROR', async () => {
		const filePath = path.join(workDir, 'no-such-dir', 'aligned.csv');

		expect(await writeCsvFile(filePath, 'a,b\n')).toMatchObject({
			success: false,
			error: { type: 'EXPORT_ERROR' },
		});
	});
});
