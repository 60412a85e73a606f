/**
 * Error Handling Utilities for MCP Tools
 *
 * Unexpected faults are audited in full and reported to the client as a
 * generic SERVER_ERROR. Parameters are redacted before they reach the audit
 * trail: secret values never leave the handler.
 */

import type { AuditService } from '../../core/index.js';
import { sanitizeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { LLMFailureResponse, MCPContext } from '../types.js';

const logger = createLogger('ToolError');

export const SERVER_ERROR_MESSAGE =
  'An internal processing error occurred. Please contact support if this persists.';

const REDACTED_FIELDS = new Set(['secret_value', 'secretValue', 'SecretString']);

/**
 * Log and audit an unexpected tool fault; return the masked failure.
 */
export async function handleToolError(
  error: unknown,
  toolName: string,
  mcpContext: MCPContext,
  auditService: AuditService | undefined,
  params: unknown
): Promise<LLMFailureResponse> {
  logger.error(`Tool ${toolName} failed`, sanitizeError(error));

  await auditService?.log({
    timestamp: new Date(),
    source: `mcp:tool:${toolName}`,
    action: 'tool_execution_error',
    success: false,
    error: error instanceof Error ? error.message : String(error),
    metadata: {
      stack: error instanceof Error ? error.stack : undefined,
      params: sanitizeParams(params),
      errorType: error instanceof Error ? error.constructor.name : typeof error,
      authenticated: mcpContext.session?.authenticated ?? false,
    },
  });

  return {
    status: 'failure',
    code: 'SERVER_ERROR',
    message: SERVER_ERROR_MESSAGE,
  };
}

/**
 * Shallow copy of tool parameters with secret material replaced.
 */
export function sanitizeParams(params: unknown): unknown {
  if (!params || typeof params !== 'object' || Array.isArray(params)) {
    return params;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    sanitized[key] = REDACTED_FIELDS.has(key) ? '[REDACTED]' : value;
  }
  return sanitized;
}
