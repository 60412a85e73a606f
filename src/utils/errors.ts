import { SecretsManagerServiceException } from '@aws-sdk/client-secrets-manager';

/**
 * Base error for every classified failure raised by this server.
 *
 * Carries a machine-readable code (for AWS failures this is the provider's
 * error name, e.g. `ResourceNotFoundException`) and an HTTP-style status code.
 */
export class SecretsMcpError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SecretsMcpError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * STS refused to issue credentials for a role (bad ARN, trust policy,
 * expired caller identity, throttling) or answered without credentials.
 */
export class AssumeRoleError extends SecretsMcpError {
  constructor(
    public readonly roleArn: string,
    code: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(code, `Failed to assume role ${roleArn}: ${message}`, 403, { roleArn });
    this.name = 'AssumeRoleError';
  }
}

/**
 * Any other rejection from the remote secret store.
 */
export class RemoteCallError extends SecretsMcpError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 502, details);
    this.name = 'RemoteCallError';
  }
}

/**
 * Bearer token missing, malformed or not matching the configured secret.
 */
export class AuthenticationError extends SecretsMcpError {
  constructor(code: string, message: string, statusCode: 401 | 403) {
    super(code, message, statusCode);
    this.name = 'AuthenticationError';
  }
}

export class ConfigurationError extends SecretsMcpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500, details);
    this.name = 'ConfigurationError';
  }
}

export const AuthErrors = {
  MISSING_HEADER: () =>
    new AuthenticationError('MISSING_TOKEN', 'Missing Authorization header', 401),

  INVALID_FORMAT: () =>
    new AuthenticationError(
      'INVALID_TOKEN_FORMAT',
      'Invalid authorization format. Use: Bearer <token>',
      401
    ),

  TOKEN_MISMATCH: () =>
    new AuthenticationError('INVALID_TOKEN', 'Invalid authentication token', 403),
} as const;

/**
 * Classify an error thrown by a Secrets Manager call.
 *
 * Service exceptions and role-assumption failures become a RemoteCallError
 * carrying the provider code; anything else is returned as `undefined` so the
 * caller can let it propagate.
 */
export function toRemoteCallError(error: unknown): RemoteCallError | undefined {
  if (error instanceof RemoteCallError) {
    return error;
  }

  if (error instanceof AssumeRoleError) {
    return new RemoteCallError(error.code, error.message, { roleArn: error.roleArn });
  }

  if (error instanceof SecretsManagerServiceException) {
    return new RemoteCallError(error.name, error.message, {
      requestId: error.$metadata?.requestId,
      httpStatusCode: error.$metadata?.httpStatusCode,
    });
  }

  return undefined;
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof SecretsMcpError) {
    return {
      type: error.name,
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
