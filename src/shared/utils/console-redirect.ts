import fs from 'node:fs';
import path from 'node:path';
import { env } from '~/shared/env.js';

/**
 * Redirects console output to log files when the MCP stdio transport is active.
 * stdout carries JSON-RPC frames, so nothing else may be written to it.
 * Level filtering already happens in the debug logger; every line that reaches
 * the console here is written through.
 */
export function redirectConsoleToFiles(logDir: string = './logs'): () => void {
	fs.mkdirSync(logDir, { recursive: true });

	const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
	const infoStream = fs.createWriteStream(path.join(logDir, `alignment-${timestamp}.log`), {
		flags: 'a',
	});
	const errorStream = fs.createWriteStream(path.join(logDir, `alignment-error-${timestamp}.log`), {
		flags: 'a',
	});

	const originalConsoleLog = console.log;
	const originalConsoleError = console.error;
	const originalConsoleWarn = console.warn;
	const originalConsoleDebug = console.debug;

	const formatArgs = (args: unknown[]) =>
		args
			.map(arg => {
				if (arg instanceof Error) {
					return env.LOG_STACK_TRACE ? `${arg.message}\n${arg.stack}` : arg.message;
				}
				return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
			})
			.join(' ') + '\n';

	console.log = (...args: unknown[]) => {
		infoStream.write(formatArgs(args));
	};
	console.warn = (...args: unknown[]) => {
		infoStream.write(formatArgs(args));
	};
	console.debug = (...args: unknown[]) => {
		infoStream.write(formatArgs(args));
	};
	console.error = (...args: unknown[]) => {
		const entry = formatArgs(args);
		errorStream.write(entry);
		// stderr is not part of the protocol channel
		process.stderr.write(entry);
	};

	return () => {
		console.log = originalConsoleLog;
		console.error = originalConsoleError;
		console.warn = originalConsoleWarn;
		console.debug = originalConsoleDebug;
		infoStream.end();
		errorStream.end();
	};
}
