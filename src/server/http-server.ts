/**
 * Framework-Agnostic HTTP Handler for the content alignment server
 * The Express adapter in deploy-handlers.ts is one host for it
 */

import type { z } from 'zod';
import {
	alignContentSchema,
	createErrorResponse,
	createSuccessResponse,
	exportAlignmentSchema,
	lineByLineReportSchema,
} from '~/server/routes/alignment-routes.js';
import { env } from '~/shared/env.js';
import type { ToolResult } from '~/shared/types/api.js';
import { createContext, log, logError } from '~/shared/utils/debug-logger.js';
import {
	alignContent,
	exportAlignment,
	lineByLineReport,
	SERVER_INFO,
	type TransportDependencies,
} from './transport-manager.js';

export interface HttpRequest {
	method: string;
	path: string;
	body: unknown;
	headers: Record<string, string | string[] | undefined>;
}

export interface HttpResponse {
	status: number;
	body: unknown;
	headers: Record<string, string>;
}

const MCP_PROTOCOL_VERSION = '2024-11-05';

// Errors caused by the request content rather than the server
const CLIENT_ERROR_CODES = new Set(['VALIDATION_ERROR', 'DIMENSION_MISMATCH']);

function createMcpHeaders(): Record<string, string> {
	return {
		'X-MCP-Version': MCP_PROTOCOL_VERSION,
		'X-MCP-Server-Name': SERVER_INFO.name,
		'X-MCP-Capabilities': 'tools',
	};
}

function createCorsHeaders(corsOrigins: string): Record<string, string> {
	const origin = corsOrigins.split(',')[0]?.trim() || '*';
	return {
		'Access-Control-Allow-Origin': origin,
		'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
		'Access-Control-Allow-Headers':
			'Content-Type,Authorization,X-MCP-Version,X-MCP-Client-Name,X-MCP-Client-Version',
		'Access-Control-Expose-Headers': 'X-MCP-Version,X-MCP-Server-Name,X-MCP-Capabilities',
	};
}

function headerValue(value: string | string[] | undefined): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}

function toolStatus(result: ToolResult): number {
	if (result.success) return 200;
	return result.error?.code && CLIENT_ERROR_CODES.has(result.error.code) ? 400 : 500;
}

async function runTool<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	body: unknown,
	operation: string,
	tool: (args: T) => Promise<ToolResult>,
	headers: Record<string, string>
): Promise<HttpResponse> {
	const validation = schema.safeParse(body);
	if (!validation.success) {
		return {
			status: 400,
			body: {
				error: 'Validation Error',
				details: validation.error.errors,
				timestamp: new Date().toISOString(),
			},
			headers,
		};
	}

	const result = await tool(validation.data);
	const status = toolStatus(result);

	return {
		status,
		body: result.success
			? createSuccessResponse(result.data, operation)
			: createErrorResponse(
					result.error?.message ?? 'Unknown error occurred',
					operation,
					result.error?.code
				),
		headers,
	};
}

// Main framework-agnostic handler
export async function handleAlignmentRequest(
	req: HttpRequest,
	dependencies: TransportDependencies = {}
): Promise<HttpResponse> {
	const { method, path, body, headers } = req;
	const context = createContext('HTTP', 'handle_request', { method, path });

	const defaultHeaders = {
		'Content-Type': 'application/json',
		...createMcpHeaders(),
		...createCorsHeaders(env.HTTP_CORS_ORIGINS),
	};

	if (method === 'OPTIONS') {
		return { status: 200, body: {}, headers: defaultHeaders };
	}

	const clientName = headerValue(headers['x-mcp-client-name']);
	const clientVersion = headerValue(headers['x-mcp-client-version']);
	if (clientName || clientVersion) {
		log('DEBUG', context, 'MCP client', {
			clientName: clientName ?? 'unknown',
			clientVersion: clientVersion ?? 'unknown',
		});
	}

	// Remove base path from URL for routing
	const routePath =
		(path.startsWith(env.HTTP_BASE_PATH) ? path.slice(env.HTTP_BASE_PATH.length) : path) || '/';

	try {
		switch (`${method} ${routePath}`) {
			case 'GET /':
				return {
					status: 200,
					body: {
						service: 'Content Alignment MCP Server',
						version: SERVER_INFO.version,
						transports: ['http', 'stdio'],
						endpoints: {
							capabilities: `${env.HTTP_BASE_PATH}/capabilities`,
							health: `${env.HTTP_BASE_PATH}/health`,
							version: `${env.HTTP_BASE_PATH}/version`,
						},
					},
					headers: defaultHeaders,
				};

			case 'GET /health':
				return {
					status: 200,
					body: {
						status: 'healthy',
						timestamp: new Date().toISOString(),
						service: SERVER_INFO.name,
						version: SERVER_INFO.version,
						checks: {
							embeddingProvider: env.OPENAI_API_KEY
								? { status: 'healthy', model: env.EMBEDDING_MODEL }
								: {
										status: 'degraded',
										message: 'OPENAI_API_KEY not configured; requests must carry embeddings',
									},
						},
						uptime: process.uptime(),
					},
					headers: defaultHeaders,
				};

			case 'GET /version':
				return {
					status: 200,
					body: {
						service: SERVER_INFO.name,
						version: SERVER_INFO.version,
						transport: 'http',
						capabilities: ['alignment', 'line-by-line', 'csv-export'],
					},
					headers: defaultHeaders,
				};

			case 'GET /capabilities':
				return {
					status: 200,
					body: {
						protocolVersion: MCP_PROTOCOL_VERSION,
						capabilities: { tools: {} },
						serverInfo: SERVER_INFO,
						defaults: { similarityThreshold: env.SIMILARITY_THRESHOLD },
						tools: [
							{
								name: 'align_content',
								description: 'Align target content rows to reference content rows',
								endpoint: `${env.HTTP_BASE_PATH}/align`,
								method: 'POST',
							},
							{
								name: 'line_by_line_report',
								description: 'Positional comparison with suggestions for weak pairs',
								endpoint: `${env.HTTP_BASE_PATH}/line-by-line`,
								method: 'POST',
							},
							{
								name: 'export_alignment_csv',
								description: 'Alignment or line-by-line report as CSV text',
								endpoint: `${env.HTTP_BASE_PATH}/export`,
								method: 'POST',
							},
						],
					},
					headers: defaultHeaders,
				};

			case 'POST /align':
				return await runTool(
					alignContentSchema,
					body,
					'align_content',
					args => alignContent(args, dependencies),
					defaultHeaders
				);

			case 'POST /line-by-line':
				return await runTool(
					lineByLineReportSchema,
					body,
					'line_by_line_report',
					args => lineByLineReport(args, dependencies),
					defaultHeaders
				);

			case 'POST /export':
				return await runTool(
					exportAlignmentSchema,
					body,
					'export_alignment_csv',
					args => exportAlignment(args, dependencies),
					defaultHeaders
				);

			default:
				return {
					status: 404,
					body: {
						error: 'Not Found',
						message: `Endpoint ${routePath} not found`,
						availableEndpoints: `${env.HTTP_BASE_PATH}/capabilities`,
					},
					headers: defaultHeaders,
				};
		}
	} catch (error) {
		logError(context, error instanceof Error ? error : String(error));
		return {
			status: 500,
			body: {
				error: 'Internal Server Error',
				message: 'An unexpected error occurred',
				timestamp: new Date().toISOString(),
			},
			headers: defaultHeaders,
		};
	}
}
