/**
 * Auxiliary HTTP Server
 *
 * Express app beside the FastMCP transport that hosts the unauthenticated
 * endpoints:
 * - GET /healthz               plain-text health check
 * - GET|OPTIONS /openapi.json  capability document, CORS enabled
 *
 * FastMCP does not expose its HTTP app for custom routes, so these live on
 * their own port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import { createLogger } from '../utils/logger.js';
import { buildOpenAPIDocument, type OpenAPIDocumentOptions } from './openapi.js';

const logger = createLogger('HTTP Server');

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, OPTIONS',
  'Access-Control-Allow-Headers': 'Authorization, Content-Type',
} as const;

export type MetadataServerOptions = OpenAPIDocumentOptions;

function withCors(_req: Request, res: Response, next: NextFunction): void {
  res.set(CORS_HEADERS);
  next();
}

export function createMetadataServer(options: MetadataServerOptions): express.Application {
  const app = express();
  const document = buildOpenAPIDocument(options);

  app.get('/healthz', (_req: Request, res: Response) => {
    res.type('text/plain').send('OK');
  });

  app.options('/openapi.json', withCors, (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.get('/openapi.json', withCors, (_req: Request, res: Response) => {
    res.json(document);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Error:', err);
    res.status(500).json({
      error: 'server_error',
      error_description: err instanceof Error ? err.message : 'Internal server error',
    });
  });

  return app;
}

/**
 * Listen on `port`.
 *
 * @throws Error if the port is already in use
 */
export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      logger.info(`Listening on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/healthz`);
      logger.info(`Capability document: http://localhost:${port}/openapi.json`);
      resolve(server);
    });
  });
}

export function stopHTTPServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
