/**
 * Capability document served at /openapi.json.
 *
 * Describes the unauthenticated health check, the bearer-protected MCP endpoint and
 * the tool list, so HTTP clients can discover the server without speaking
 * MCP first.
 */

export interface OpenAPIToolSummary {
  name: string;
  description: string;
}

export interface OpenAPIDocumentOptions {
  title: string;
  version: string;
  mcpEndpoint: string;

  /** Base URL of the MCP server; the document itself is served from another port */
  serverUrl: string;

  tools: OpenAPIToolSummary[];
}

export interface OpenAPIDocument {
  openapi: '3.0.0';
  info: { title: string; version: string; description: string };
  servers: Array<{ url: string; description: string }>;
  paths: Record<string, Record<string, unknown>>;
  components: {
    securitySchemes: Record<string, { type: 'http'; scheme: 'bearer' }>;
  };
  'x-mcp-tools': OpenAPIToolSummary[];
}

export function buildOpenAPIDocument(options: OpenAPIDocumentOptions): OpenAPIDocument {
  return {
    openapi: '3.0.0',
    info: {
      title: options.title,
      version: options.version,
      description: 'Multi-account AWS Secrets Manager operations via MCP protocol',
    },
    servers: [{ url: options.serverUrl, description: 'MCP server' }],
    paths: {
      '/healthz': {
        get: {
          summary: 'Health check',
          responses: { '200': { description: 'OK' } },
        },
      },
      [options.mcpEndpoint]: {
        post: {
          summary: 'MCP streamable HTTP endpoint (JSON-RPC)',
          security: [{ bearerAuth: [] }],
          responses: {
            '200': { description: 'JSON-RPC response or event stream' },
            '401': { description: 'Missing or malformed Authorization header' },
            '403': { description: 'Invalid authentication token' },
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: { type: 'http', scheme: 'bearer' },
      },
    },
    'x-mcp-tools': options.tools,
  };
}
