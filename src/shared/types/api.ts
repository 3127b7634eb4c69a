// API and transport-related types

export interface ToolResult<T = unknown> {
	success: boolean;
	data?: T;
	error?: {
		message: string;
		code?: string;
		operation: string;
	};
}
