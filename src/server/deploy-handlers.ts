import compression from 'compression';
import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import { env } from '~/shared/env.js';
import { createContext, log } from '~/shared/utils/debug-logger.js';
import { handleAlignmentRequest } from './http-server.js';

// Express.js adapter
export function createExpressAdapter() {
	const app = express();

	// Middleware
	app.use(
		helmet({
			contentSecurityPolicy: {
				directives: {
					defaultSrc: ["'self'"],
					styleSrc: ["'self'", "'unsafe-inline'"],
					scriptSrc: ["'self'"],
					imgSrc: ["'self'", 'data:', 'https:'],
				},
			},
		})
	);

	app.use(compression());
	// Embedding vectors make request bodies large
	app.use(express.json({ limit: '50mb' }));

	// Request logging
	app.use((req, res, next) => {
		const context = createContext('HTTP', 'request', { method: req.method, path: req.path });
		res.on('finish', () => {
			log('INFO', context, 'Request completed', { statusCode: res.statusCode });
		});
		next();
	});

	// Handle all requests through the framework-agnostic handler
	app.use((req: Request, res: Response, next: NextFunction) => {
		handleAlignmentRequest({
			method: req.method,
			path: req.path,
			body: req.body,
			headers: req.headers,
		})
			.then(response => {
				for (const [key, value] of Object.entries(response.headers)) {
					res.setHeader(key, value);
				}
				res.status(response.status).json(response.body);
			})
			.catch(next);
	});

	return app;
}

export function startHttpServer(): Promise<{ stop: () => Promise<void> }> {
	const app = createExpressAdapter();
	const context = createContext('HTTP', 'server');

	return new Promise((resolve, reject) => {
		const server = app.listen(env.HTTP_PORT, () => {
			log('INFO', context, 'HTTP server started', {
				port: env.HTTP_PORT,
				capabilities: `http://localhost:${env.HTTP_PORT}${env.HTTP_BASE_PATH}/capabilities`,
			});

			resolve({
				stop: () =>
					new Promise((stopResolve, stopReject) => {
						server.close(error => {
							if (error) {
								stopReject(error);
							} else {
								log('INFO', context, 'HTTP server stopped');
								stopResolve();
							}
						});
					}),
			});
		});

		server.on('error', reject);
	});
}
