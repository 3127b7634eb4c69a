/**
 * Request schemas shared by the MCP tools and the HTTP endpoints
 */

import { z } from 'zod';
import { env } from '~/shared/env.js';

export const contentRecordInputSchema = z.object({
	id: z.string().min(1, 'Record id is required'),
	content: z.string(),
	embedding: z
		.array(z.number())
		.nullish()
		.transform(value => value ?? undefined),
});

const recordListSchema = z.array(contentRecordInputSchema);

export const alignContentSchema = z.object({
	reference: recordListSchema,
	target: recordListSchema,
	threshold: z.number().min(0).max(1).optional().default(env.SIMILARITY_THRESHOLD),
	embed_missing: z.boolean().optional().default(false),
});

export const lineByLineReportSchema = alignContentSchema;

export const exportAlignmentSchema = alignContentSchema.extend({
	format: z.enum(['aligned', 'line_by_line']).optional().default('aligned'),
});

export type ContentRecordInput = z.infer<typeof contentRecordInputSchema>;
export type AlignContentArgs = z.infer<typeof alignContentSchema>;
export type LineByLineReportArgs = z.infer<typeof lineByLineReportSchema>;
export type ExportAlignmentArgs = z.infer<typeof exportAlignmentSchema>;

export const createErrorResponse = (message: string, operation: string, code?: string) => ({
	success: false,
	error: {
		message,
		operation,
		...(code && { code }),
		timestamp: new Date().toISOString(),
	},
});

export const createSuccessResponse = (data: unknown, operation: string) => ({
	success: true,
	data,
	operation,
	timestamp: new Date().toISOString(),
});
