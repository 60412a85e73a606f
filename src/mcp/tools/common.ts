/**
 * Shared pieces of the secret tools: the per-call identity fields every tool
 * accepts, typed registration, and the mapping from facade results to
 * LLMResponse.
 */

import { z } from 'zod';
import type { CoreContext } from '../../core/index.js';
import type { CallTarget, OperationFailure, OperationResult } from '../../services/types.js';
import type { LLMResponse, MCPContext, ToolHandler, ToolRegistration } from '../types.js';
import { handleToolError } from '../utils/error-helpers.js';

export const targetFields = {
  role_arn: z
    .string()
    .optional()
    .describe('IAM role ARN to assume (for cross-account access)'),
  region: z.string().optional().describe('AWS region (defaults to AWS_REGION env var)'),
  profile: z
    .string()
    .optional()
    .describe('AWS profile name from ~/.aws/credentials (for local dev)'),
};

export interface TargetParams {
  role_arn?: string;
  region?: string;
  profile?: string;
}

export function toCallTarget(params: TargetParams): CallTarget {
  return { roleArn: params.role_arn, region: params.region, profile: params.profile };
}

/**
 * Build a ToolRegistration whose handler validates its input against
 * `schema` and hands the parsed value to the typed handler.
 */
export function defineTool<S extends z.ZodTypeAny>(tool: {
  name: string;
  description: string;
  schema: S;
  handler: ToolHandler<z.output<S>>;
}): ToolRegistration {
  return {
    name: tool.name,
    description: tool.description,
    schema: tool.schema,
    handler: async (params, mcpContext) => tool.handler(tool.schema.parse(params), mcpContext),
  };
}

export function isOperationFailure<T>(result: OperationResult<T>): result is OperationFailure {
  return result.success === false;
}

/**
 * Success results pass through whole; failures keep their identifier field
 * in `details` so the serialized record matches the facade's.
 */
export function fromOperationResult<T extends object>(result: OperationResult<T>): LLMResponse {
  if (!isOperationFailure(result)) {
    return { status: 'success', data: result };
  }

  const details: Record<string, unknown> = {};
  if (result.secret_name !== undefined) details.secret_name = result.secret_name;
  if (result.secret_id !== undefined) details.secret_id = result.secret_id;
  if (result.name_prefix !== undefined) details.name_prefix = result.name_prefix;

  return {
    status: 'failure',
    code: result.error_code,
    message: result.error,
    details,
  };
}

/**
 * Run one facade operation for a tool. Thrown faults are masked by
 * handleToolError.
 */
export async function invokeOperation<T extends object>(
  context: CoreContext,
  toolName: string,
  mcpContext: MCPContext,
  params: unknown,
  operation: () => Promise<OperationResult<T>>
): Promise<LLMResponse> {
  try {
    return fromOperationResult(await operation());
  } catch (error) {
    return handleToolError(error, toolName, mcpContext, context.auditService, params);
  }
}
