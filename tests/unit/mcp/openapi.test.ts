import { describe, it, expect } from 'vitest';
import { buildOpenAPIDocument } from '../../../src/mcp/openapi.js';

describe('buildOpenAPIDocument', () => {
  const document = buildOpenAPIDocument({
    title: 'secrets',
    version: '2.0.0',
    mcpEndpoint: '/mcp',
    serverUrl: 'http://localhost:8000',
    tools: [],
  });

  it('should describe the health check and the protected MCP endpoint', () => {
    expect(Object.keys(document.paths)).toEqual(['/healthz', '/mcp']);
    expect(document.paths['/mcp'].post).toMatchObject({
      security: [{ bearerAuth: [] }],
    });
  });

  it('should point servers at the MCP server rather than the document host', () => {
    expect(document.openapi).toBe('3.0.0');
    expect(document.servers).toEqual([{ url: 'http://localhost:8000', description: 'MCP server' }]);
  });
});
