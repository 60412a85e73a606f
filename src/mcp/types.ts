/**
 * MCP Layer Types
 *
 * CoreContext is imported from the core layer, never defined or re-exported
 * here.
 */

import type { z } from 'zod';
import type { CoreContext } from '../core/index.js';

// ============================================================================
// LLM Response Standards
// ============================================================================

export interface LLMSuccessResponse<T = unknown> {
  status: 'success';
  data: T;
}

/**
 * Failure returned by a tool handler.
 *
 * `details` carries fields that identify the failed target (for secret
 * operations: `secret_id`, `secret_name` or `name_prefix`) and is merged into
 * the serialized failure record.
 *
 * Codes: provider error names (e.g. `ResourceNotFoundException`,
 * `AccessDenied`) for remote rejections, `SERVER_ERROR` for anything
 * unexpected.
 */
export interface LLMFailureResponse {
  status: 'failure';
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type LLMResponse<T = unknown> = LLMSuccessResponse<T> | LLMFailureResponse;

// ============================================================================
// Tool Handler Types
// ============================================================================

/**
 * Session attached by the bearer gate to HTTP connections. Type alias rather
 * than interface: FastMCP requires its session type to be a plain record.
 */
export type AuthSession = {
  authenticated: true;

  /** False when no MCP_AUTH_TOKEN is configured and any token was accepted */
  tokenVerified: boolean;

  authenticatedAt: string;
};

/**
 * Context handed to every tool handler. `session` is undefined over stdio,
 * where the bearer gate does not run.
 */
export interface MCPContext {
  session?: AuthSession;
}

export type ToolHandler<P, R = LLMResponse> = (params: P, context: MCPContext) => Promise<R>;

// ============================================================================
// Tool Registration Types
// ============================================================================

/**
 * A tool as registered with the MCP server.
 *
 * The handler takes unvalidated input; registrations built with `defineTool`
 * parse it against `schema` before the typed handler runs.
 */
export interface ToolRegistration {
  /** Tool name (wire contract) */
  name: string;

  /** Tool description for the LLM */
  description: string;

  schema: z.ZodTypeAny;

  handler: ToolHandler<unknown>;
}

/**
 * Creates a tool registration with CoreContext injected.
 */
export type ToolFactory = (context: CoreContext) => ToolRegistration;

// ============================================================================
// Server Options
// ============================================================================

export type TransportType = 'stdio' | 'httpStream';

export interface MCPStartOptions {
  /** Transport (default: stdio) */
  transport?: TransportType;

  /** MCP port for httpStream (default: SERVER_PORT) */
  port?: number;

  /** Port for /healthz and /openapi.json (default: METADATA_PORT, or port + 1) */
  metadataPort?: number;
}
