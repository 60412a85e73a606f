/**
 * MCP Authentication Middleware
 *
 * Static bearer-token gate for the HTTP transport:
 * - no Authorization header          → 401
 * - header not of the form `Bearer …` → 401
 * - token configured and not matched  → 403
 * - no token configured               → any bearer token is accepted
 *
 * The stdio transport never reaches this gate.
 */

import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import { timingSafeEqual } from 'crypto';
import type { AuditService } from '../core/audit-service.js';
import { AuthErrors, AuthenticationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AuthSession } from './types.js';

const logger = createLogger('BearerAuthMiddleware');

const BEARER_PREFIX = 'Bearer ';

/**
 * Outcome of one authentication attempt.
 */
export interface AuthResult {
  authenticated: boolean;
  session?: AuthSession;
  code?: string;
  error?: string;

  /** HTTP status for rejections: 401 or 403 */
  statusCode?: number;
}

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class BearerAuthMiddleware {
  constructor(
    private readonly expectedToken: string | undefined,
    private readonly auditService?: AuditService
  ) {}

  /**
   * Check the Authorization header of a request.
   */
  async authenticate(headers: IncomingHttpHeaders): Promise<AuthResult> {
    try {
      const token = this.extractToken(headers);

      if (this.expectedToken && !tokensMatch(token, this.expectedToken)) {
        throw AuthErrors.TOKEN_MISMATCH();
      }

      const session: AuthSession = {
        authenticated: true,
        tokenVerified: Boolean(this.expectedToken),
        authenticatedAt: new Date().toISOString(),
      };

      logger.debug('Request authenticated');
      return { authenticated: true, session };
    } catch (error) {
      if (error instanceof AuthenticationError) {
        logger.warn(`Authentication rejected (${error.statusCode}): ${error.message}`);
        await this.auditService?.log({
          timestamp: new Date(),
          source: 'mcp:auth',
          action: 'authenticate',
          success: false,
          reason: error.code,
          error: error.message,
        });

        return {
          authenticated: false,
          code: error.code,
          error: error.message,
          statusCode: error.statusCode,
        };
      }
      throw error;
    }
  }

  /**
   * FastMCP `authenticate` hook. Rejections are thrown as a `Response`, which
   * FastMCP sends back as the HTTP reply.
   */
  readonly authenticateRequest = async (request: IncomingMessage): Promise<AuthSession> => {
    const result = await this.authenticate(request.headers);

    if (!result.authenticated || !result.session) {
      const status = result.statusCode ?? 401;
      const detail = result.error ?? 'Unauthorized';

      throw new Response(JSON.stringify({ detail }), {
        status,
        statusText: detail,
        headers: { 'Content-Type': 'application/json' },
      });
    }

    return result.session;
  };

  /**
   * @throws {AuthenticationError} when the header is missing or not a bearer credential
   */
  private extractToken(headers: IncomingHttpHeaders): string {
    const header = headers.authorization;

    if (!header) {
      throw AuthErrors.MISSING_HEADER();
    }

    if (!header.startsWith(BEARER_PREFIX)) {
      throw AuthErrors.INVALID_FORMAT();
    }

    return header.slice(BEARER_PREFIX.length);
  }
}
