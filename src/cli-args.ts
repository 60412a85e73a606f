import type { MCPStartOptions } from './mcp/types.js';
import { ConfigurationError } from './utils/errors.js';

/**
 * Parse CLI arguments.
 *
 * - no arguments     → stdio transport
 * - `--http`         → HTTP transport on SERVER_PORT (default 8000)
 * - `--http <port>`  → HTTP transport on `port`
 *
 * @throws {ConfigurationError} for a port that is not an integer in 1-65535
 */
export function parseArgs(argv: string[]): MCPStartOptions {
  if (argv[0] !== '--http') {
    return { transport: 'stdio' };
  }

  if (argv[1] === undefined) {
    return { transport: 'httpStream' };
  }

  const port = Number(argv[1]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${argv[1]}`);
  }

  return { transport: 'httpStream', port };
}
