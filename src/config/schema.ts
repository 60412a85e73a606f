import { z } from 'zod';

/** MCP server version string, as FastMCP expects it */
export type SemVer = `${number}.${number}.${number}`;

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_SERVER_PORT = 8000;

const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

function isSemVer(value: string): value is SemVer {
  return SEMVER_PATTERN.test(value);
}

// Environment values are strings; "true"/"1"/"yes" (any case) enable a flag
const FlagSchema = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const PortSchema = z.coerce.number().int().min(1).max(65535);

// An exported-but-empty variable counts as unset
const OptionalStringSchema = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Server settings read from the process environment.
 *
 * Account mappings (`ACCOUNT_{NAME}_ROLE_ARN`, `ACCOUNT_{NAME}_PROFILE`) are
 * open-ended keys and are discovered by ConfigManager, not declared here.
 */
export const EnvironmentSchema = z.object({
  AWS_REGION: OptionalStringSchema,
  AWS_DEFAULT_REGION: OptionalStringSchema,

  // Resolved through the secret provider chain; this entry only documents it
  MCP_AUTH_TOKEN: z.string().optional(),

  SERVER_PORT: PortSchema.default(DEFAULT_SERVER_PORT),
  METADATA_PORT: z.preprocess((value) => (value === '' ? undefined : value), PortSchema.optional()),
  MCP_PUBLIC_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
  SECRETS_DIR: z.string().min(1).default('/run/secrets'),

  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    LogLevelSchema.default('info')
  ),
  AUDIT_ENABLED: FlagSchema,
  AWS_CREDENTIAL_EXPIRY_CHECK: FlagSchema,

  MCP_SERVER_NAME: z.string().min(1).default('aws-secrets-mcp-server'),
  MCP_SERVER_VERSION: z
    .string()
    .refine(isSemVer, { message: 'Version must be MAJOR.MINOR.PATCH' })
    .default('1.0.0'),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
