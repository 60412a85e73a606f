/**
 * MCP Middleware Tests
 *
 * Static bearer-token gate: 401 for missing or malformed headers, 403 for a
 * wrong token, any token when none is configured.
 */

import { describe, it, expect } from 'vitest';
import { IncomingMessage, type IncomingHttpHeaders } from 'http';
import { Socket } from 'net';
import { BearerAuthMiddleware } from '../../../src/mcp/middleware.js';
import { createRecordingAudit } from '../../helpers/fakes.js';

function requestWith(headers: IncomingHttpHeaders): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  request.headers = headers;
  return request;
}

describe('BearerAuthMiddleware', () => {
  describe('authenticate', () => {
    const middleware = new BearerAuthMiddleware('test-secret');

    it('should accept the configured token', async () => {
      const result = await middleware.authenticate({ authorization: 'Bearer test-secret' });

      expect(result.authenticated).toBe(true);
      expect(result.session).toMatchObject({ authenticated: true, tokenVerified: true });
    });

    it('should reject a missing header with 401', async () => {
      const result = await middleware.authenticate({});

      expect(result).toEqual({
        authenticated: false,
        code: 'MISSING_TOKEN',
        error: 'Missing Authorization header',
        statusCode: 401,
      });
    });

    it.each(['Basic dXNlcjpwYXNz', 'bearer test-secret', 'test-secret'])(
      'should reject "%s" with 401',
      async (authorization) => {
        const result = await middleware.authenticate({ authorization });

        expect(result).toEqual({
          authenticated: false,
          code: 'INVALID_TOKEN_FORMAT',
          error: 'Invalid authorization format. Use: Bearer <token>',
          statusCode: 401,
        });
      }
    );

    it('should reject a wrong token with 403', async () => {
      const result = await middleware.authenticate({ authorization: 'Bearer wrong-secret' });

      expect(result).toEqual({
        authenticated: false,
        code: 'INVALID_TOKEN',
        error: 'Invalid authentication token',
        statusCode: 403,
      });
    });

    it('should reject a token that only shares a prefix', async () => {
      const result = await middleware.authenticate({ authorization: 'Bearer test-secret-2' });

      expect(result.statusCode).toBe(403);
    });

    it('should accept any bearer token when none is configured', async () => {
      const open = new BearerAuthMiddleware(undefined);

      const result = await open.authenticate({ authorization: 'Bearer anything' });

      expect(result.authenticated).toBe(true);
      expect(result.session?.tokenVerified).toBe(false);
    });

    it('should still require the Bearer scheme when none is configured', async () => {
      const open = new BearerAuthMiddleware(undefined);

      await expect(open.authenticate({})).resolves.toMatchObject({ statusCode: 401 });
    });

    it('should audit rejections', async () => {
      const { auditService, storage } = createRecordingAudit();
      const audited = new BearerAuthMiddleware('test-secret', auditService);

      await audited.authenticate({ authorization: 'Bearer wrong-secret' });

      expect(storage.getEntries()).toEqual([
        expect.objectContaining({
          source: 'mcp:auth',
          action: 'authenticate',
          success: false,
          reason: 'INVALID_TOKEN',
        }),
      ]);
    });
  });

  describe('authenticateRequest', () => {
    const middleware = new BearerAuthMiddleware('test-secret');

    it('should return the session for a valid request', async () => {
      const session = await middleware.authenticateRequest(
        requestWith({ authorization: 'Bearer test-secret' })
      );

      expect(session.authenticated).toBe(true);
    });

    it.each([
      [{}, 401, 'Missing Authorization header'],
      [{ authorization: 'Token test-secret' }, 401, 'Invalid authorization format. Use: Bearer <token>'],
      [{ authorization: 'Bearer wrong-secret' }, 403, 'Invalid authentication token'],
    ])('should throw a Response for %j', async (headers, status, detail) => {
      const thrown = await middleware
        .authenticateRequest(requestWith(headers))
        .catch((error: unknown) => error);

      expect(thrown).toBeInstanceOf(Response);
      if (thrown instanceof Response) {
        expect(thrown.status).toBe(status);
        expect(thrown.headers.get('content-type')).toBe('application/json');
        await expect(thrown.json()).resolves.toEqual({ detail });
      }
    });
  });
});
