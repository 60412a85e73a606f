import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const getSecretValueSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  version_id: z.string().optional().describe('Specific version ID'),
  version_stage: z
    .string()
    .optional()
    .describe('Version stage (e.g., AWSCURRENT, AWSPREVIOUS)'),
  ...targetFields,
});

export const createGetSecretValueTool: ToolFactory = (context) =>
  defineTool({
    name: 'get_secret_value',
    description:
      'Retrieve the value of a secret. JSON values are returned parsed, with is_json set to true.',
    schema: getSecretValueSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'get_secret_value', mcpContext, params, () =>
        context.secretsManager.getSecretValue({
          secretId: params.secret_id,
          versionId: params.version_id,
          versionStage: params.version_stage,
          ...toCallTarget(params),
        })
      ),
  });
