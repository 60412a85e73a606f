#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from './cli-args.js';
import { SecretsMCPServer } from './mcp/server.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Startup');

/**
 * Start the AWS Secrets MCP server.
 *
 *   start-server            MCP over stdio
 *   start-server --http     MCP over streamable HTTP on SERVER_PORT
 *   start-server --http N   MCP over streamable HTTP on port N
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const server = new SecretsMCPServer();

  if (options.transport === 'httpStream') {
    logger.info(`Starting AWS Secrets MCP server over HTTP${options.port ? ` on port ${options.port}` : ''}...`);
  }

  await server.start(options);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
