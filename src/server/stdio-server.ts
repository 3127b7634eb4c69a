/**
 * Functional STDIO Server for the content alignment tools
 * Provides the same operations as the HTTP server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
	CallToolRequestSchema,
	ListToolsRequestSchema,
	type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

import {
	alignContentSchema,
	exportAlignmentSchema,
	lineByLineReportSchema,
} from '~/server/routes/alignment-routes.js';
import {
	alignContent,
	exportAlignment,
	lineByLineReport,
	SERVER_INFO,
	type TransportDependencies,
} from '~/server/transport-manager.js';
import { env } from '~/shared/env.js';
import type { ToolResult } from '~/shared/types/api.js';

const recordListJsonSchema = {
	type: 'array',
	items: {
		type: 'object',
		properties: {
			id: { type: 'string', description: 'Content id' },
			content: { type: 'string', description: 'Raw content, may contain HTML' },
			embedding: {
				type: 'array',
				items: { type: 'number' },
				description: 'Precomputed embedding vector',
			},
		},
		required: ['id', 'content'],
	},
};

const alignmentProperties = {
	reference: { ...recordListJsonSchema, description: 'Reference records in file order' },
	target: { ...recordListJsonSchema, description: 'Target records in file order' },
	threshold: {
		type: 'number',
		description: 'Minimum similarity for a pair to count as a match',
		default: env.SIMILARITY_THRESHOLD,
	},
	embed_missing: {
		type: 'boolean',
		description: 'Generate embeddings for records that do not carry one',
		default: false,
	},
};

export const TOOL_DEFINITIONS: Tool[] = [
	{
		name: 'align_content',
		description:
			'Align target content rows to reference content rows by embedding similarity',
		inputSchema: {
			type: 'object',
			properties: alignmentProperties,
			required: ['reference', 'target'],
		},
	},
	{
		name: 'line_by_line_report',
		description:
			'Compare reference and target rows at the same position and suggest better references',
		inputSchema: {
			type: 'object',
			properties: alignmentProperties,
			required: ['reference', 'target'],
		},
	},
	{
		name: 'export_alignment_csv',
		description: 'Render an alignment or a line-by-line report as CSV text',
		inputSchema: {
			type: 'object',
			properties: {
				...alignmentProperties,
				format: {
					type: 'string',
					enum: ['aligned', 'line_by_line'],
					default: 'aligned',
				},
			},
			required: ['reference', 'target'],
		},
	},
];

export type ToolCallResponse = {
	isError?: boolean;
	content: { type: 'text'; text: string }[];
};

function errorResponse(message: string): ToolCallResponse {
	return {
		isError: true,
		content: [{ type: 'text', text: `Error: ${message}` }],
	};
}

/**
 * Dispatch a tools/call request to the shared tool functions
 */
export async function handleToolCall(
	name: string,
	args: unknown,
	dependencies: TransportDependencies = {}
): Promise<ToolCallResponse> {
	try {
		let result: ToolResult;

		switch (name) {
			case 'align_content':
				result = await alignContent(alignContentSchema.parse(args), dependencies);
				break;
			case 'line_by_line_report':
				result = await lineByLineReport(lineByLineReportSchema.parse(args), dependencies);
				break;
			case 'export_alignment_csv':
				result = await exportAlignment(exportAlignmentSchema.parse(args), dependencies);
				break;
			default:
				return errorResponse(`Unknown tool: ${name}`);
		}

		if (!result.success) {
			return errorResponse(result.error?.message || 'Unknown error occurred');
		}

		return {
			content: [
				{
					type: 'text',
					text: JSON.stringify(result.data, null, 2),
				},
			],
		};
	} catch (error) {
		if (error instanceof ZodError) {
			return errorResponse(
				`Invalid arguments: ${error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
			);
		}
		return errorResponse(error instanceof Error ? error.message : 'Unknown error occurred');
	}
}

let server: Server | null = null;

export async function startStdioServer(): Promise<{ stop: () => Promise<void> }> {
	if (server) {
		throw new Error('STDIO server is already running');
	}

	const mcpServer = new Server(
		{ name: SERVER_INFO.name, version: SERVER_INFO.version },
		{ capabilities: { tools: {}, logging: {} } }
	);

	mcpServer.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

	mcpServer.setRequestHandler(CallToolRequestSchema, async request => {
		const { name, arguments: args } = request.params;
		return handleToolCall(name, args);
	});

	await mcpServer.connect(new StdioServerTransport());
	server = mcpServer;

	console.log('📡 STDIO server connected and ready');

	return {
		stop: async (): Promise<void> => {
			if (!server) {
				return;
			}

			try {
				await server.close();
				server = null;
				console.log('📡 STDIO server stopped');
			} catch (error) {
				console.error('Error stopping STDIO server:', error);
				throw error;
			}
		},
	};
}
