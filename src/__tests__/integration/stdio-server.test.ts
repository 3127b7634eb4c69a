/**
 * Integration tests for MCP tool dispatch
 */

import { describe, expect, it } from '@jest/globals';
import { handleToolCall, TOOL_DEFINITIONS } from '~/server/stdio-server.js';
import { vectors } from '../fixtures/test-data.js';
import { setupTestSuite } from '../helpers/test-setup.js';

setupTestSuite();

const args = {
	reference: [{ id: 'r1', content: 'Hello', embedding: vectors.east }],
	target: [{ id: 't1', content: 'Bonjour', embedding: vectors.east }],
};

describe('TOOL_DEFINITIONS', () => {
	it('should declare every alignment tool', () => {
		expect(TOOL_DEFINITIONS.map(tool => tool.name)).toEqual([
			'align_content',
			'line_by_line_report',
			'export_alignment_csv',
		]);
	});
});

describe('handleToolCall', () => {
	it('should return the tool result as JSON text', async () => {
		const response = await handleToolCall('align_content', args);

		expect(response.isError).toBeUndefined();
		const payload: unknown = JSON.parse(response.content[0].text);
		expect(payload).toMatchObject({
			statistics: { matchedCount: 1, averageScore: 1 },
			rows: [{ targetId: 't1', status: 'Matched' }],
		});
	});

	it('should return CSV text from the export tool', async () => {
		const response = await handleToolCall('export_alignment_csv', { ...args, format: 'aligned' });

		const payload: unknown = JSON.parse(response.content[0].text);
		expect(payload).toMatchObject({
			rowCount: 1,
			csv: 'ContentId,Content,Translation,Status,SimilarityScore,Quality,RowType,ReferenceLine,TargetLine\nt1,Bonjour,,Matched,1.0000,High,ReferenceAligned,1,1\n',
		});
	});

	it('should flag unknown tools as errors', async () => {
		expect(await handleToolCall('search_everything', {})).toEqual({
			isError: true,
			content: [{ type: 'text', text: 'Error: Unknown tool: search_everything' }],
		});
	});

	it('should flag invalid arguments as errors', async () => {
		const response = await handleToolCall('line_by_line_report', { reference: [] });

		expect(response.isError).toBe(true);
		expect(response.content[0].text).toBe('Error: Invalid arguments: target: Required');
	});

	it('should surface engine failures as errors', async () => {
		const response = await handleToolCall('align_content', { ...args, reference: [] });

		expect(response).toEqual({
			isError: true,
			content: [{ type: 'text', text: 'Error: No reference records to compare' }],
		});
	});
});
