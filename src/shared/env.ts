import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Define the schema
const envSchema = z.object({
	// Core
	NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
	OPENAI_API_KEY: z.string().optional(),

	// Embeddings
	EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
	EMBEDDING_BATCH_SIZE: z
		.string()
		.default('50')
		.transform(val => parseInt(val))
		.pipe(z.number().int().positive()),

	// Translation
	TRANSLATION_MODEL: z.string().default('gpt-4o-mini'),
	TRANSLATION_BATCH_SIZE: z
		.string()
		.default('25')
		.transform(val => parseInt(val))
		.pipe(z.number().int().positive()),

	// Alignment
	SIMILARITY_THRESHOLD: z
		.string()
		.default('0.5')
		.transform(val => parseFloat(val))
		.pipe(z.number().min(0).max(1)),
	MIN_CONTENT_LENGTH: z
		.string()
		.default('3')
		.transform(val => parseInt(val))
		.pipe(z.number().int().nonnegative()),
	MAX_CONTENT_LENGTH: z
		.string()
		.default('8000')
		.transform(val => parseInt(val))
		.pipe(z.number().int().positive()),

	// HTTP
	HTTP_PORT: z
		.string()
		.default('3000')
		.transform(val => parseInt(val)),
	HTTP_BASE_PATH: z.string().default('/api'),
	HTTP_CORS_ORIGINS: z.string().default('*'),
	ENABLE_HTTP_TRANSPORT: z
		.string()
		.default('false')
		.transform(val => val === 'true'),
	ENABLE_STDIO_TRANSPORT: z
		.string()
		.default('false')
		.transform(val => val === 'true'),

	// Logging
	LOG_LEVEL: z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE']).default('INFO'),
	LOG_STACK_TRACE: z
		.string()
		.default('false')
		.transform(val => val === 'true'),
	DEBUG_ALIGNMENT: z
		.string()
		.default('false')
		.transform(val => val === 'true'),
	DEBUG_TIMING: z
		.string()
		.default('false')
		.transform(val => val === 'true'),
});

// Helper to process env vars
function processEnvVars() {
	const envVars: Record<string, string | undefined> = {};

	for (const [key, value] of Object.entries(process.env)) {
		// Convert empty strings to undefined
		envVars[key] = value === '' ? undefined : value;
	}

	return envVars;
}

// Parse and validate environment variables
function parseEnv() {
	try {
		return envSchema.parse(processEnvVars());
	} catch (error) {
		if (error instanceof z.ZodError) {
			const errorMessage = [
				'Invalid environment variables:',
				...error.errors.map(err => `  ${err.path.join('.')}: ${err.message}`),
			].join('\n');

			console.error(errorMessage);
			throw new Error(errorMessage);
		}
		throw error;
	}
}

export const env = parseEnv();

export type Env = z.infer<typeof envSchema>;
