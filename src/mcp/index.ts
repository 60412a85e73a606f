/**
 * MCP Layer - Public API
 *
 * CoreContext is not re-exported here; import it from '../core/index.js'.
 */

// ============================================================================
// Types
// ============================================================================

export type {
  LLMSuccessResponse,
  LLMFailureResponse,
  LLMResponse,
  AuthSession,
  MCPContext,
  ToolHandler,
  ToolRegistration,
  ToolFactory,
  TransportType,
  MCPStartOptions,
} from './types.js';

// ============================================================================
// Middleware
// ============================================================================

export { BearerAuthMiddleware, type AuthResult } from './middleware.js';

// ============================================================================
// Orchestrator
// ============================================================================

export { ConfigOrchestrator, type OrchestratorOptions } from './orchestrator.js';

// ============================================================================
// Server
// ============================================================================

export {
  SecretsMCPServer,
  toToolResult,
  MCP_ENDPOINT,
  HEALTH_PATH,
  type SecretsMCPServerOptions,
} from './server.js';

export {
  createMetadataServer,
  startHTTPServer,
  stopHTTPServer,
  CORS_HEADERS,
  type MetadataServerOptions,
} from './http-server.js';

export { buildOpenAPIDocument, type OpenAPIDocument, type OpenAPIToolSummary } from './openapi.js';

// ============================================================================
// Tool Factories
// ============================================================================

export * from './tools/index.js';

export { handleToolError, sanitizeParams } from './utils/error-helpers.js';
