/**
 * Main entry point for the Content Alignment MCP Server
 * Supports both STDIO and HTTP transports over the same tool functions
 */

import { startHttpServer } from '~/server/deploy-handlers.js';
import { startStdioServer } from '~/server/stdio-server.js';
import { env } from '~/shared/env.js';
import { redirectConsoleToFiles } from '~/shared/utils/console-redirect.js';
import { createContext, getLoggingConfig, log, logError } from '~/shared/utils/debug-logger.js';

interface ServerState {
	stdio?: { stop: () => Promise<void> };
	http?: { stop: () => Promise<void> };
}

const servers: ServerState = {};
const context = createContext('SERVER', 'lifecycle');

async function gracefulShutdown(exitCode = 0): Promise<void> {
	log('INFO', context, 'Received shutdown signal, closing servers');

	const shutdownPromises: Promise<void>[] = [];
	if (servers.stdio) shutdownPromises.push(servers.stdio.stop());
	if (servers.http) shutdownPromises.push(servers.http.stop());

	try {
		await Promise.all(shutdownPromises);
		log('INFO', context, 'All servers closed');
		process.exit(exitCode);
	} catch (error) {
		logError(context, error instanceof Error ? error : String(error));
		process.exit(1);
	}
}

process.on('SIGINT', () => void gracefulShutdown());
process.on('SIGTERM', () => void gracefulShutdown());
process.on('uncaughtException', error => {
	logError(context, error);
	void gracefulShutdown(1);
});
process.on('unhandledRejection', reason => {
	logError(context, reason instanceof Error ? reason : String(reason));
	void gracefulShutdown(1);
});

async function main(): Promise<void> {
	if (!env.ENABLE_STDIO_TRANSPORT && !env.ENABLE_HTTP_TRANSPORT) {
		throw new Error('At least one transport (STDIO or HTTP) must be enabled');
	}

	// stdout belongs to JSON-RPC once the stdio transport is up
	if (env.ENABLE_STDIO_TRANSPORT) {
		redirectConsoleToFiles('./logs');
	}

	log('INFO', context, 'Starting Content Alignment MCP Server', {
		stdio: env.ENABLE_STDIO_TRANSPORT,
		http: env.ENABLE_HTTP_TRANSPORT,
		...getLoggingConfig(),
	});

	const startupPromises: Promise<void>[] = [];

	if (env.ENABLE_STDIO_TRANSPORT) {
		startupPromises.push(
			startStdioServer().then(server => {
				servers.stdio = server;
			})
		);
	}

	if (env.ENABLE_HTTP_TRANSPORT) {
		startupPromises.push(
			startHttpServer().then(server => {
				servers.http = server;
			})
		);
	}

	await Promise.all(startupPromises);
	log('INFO', context, 'All servers started');
}

main().catch(error => {
	logError(context, error instanceof Error ? error : String(error));
	void gracefulShutdown(1);
});
