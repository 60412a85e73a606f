import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const createSecretSchema = z.object({
  name: z.string().min(1).describe('Name of the secret'),
  secret_value: z.string().describe('The secret value (string or JSON)'),
  description: z.string().optional().describe('Description for the secret'),
  tags: z
    .record(z.string())
    .optional()
    .describe('Tags as key-value pairs (e.g., {"Environment": "prod"})'),
  ...targetFields,
});

export const createCreateSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'create_secret',
    description: 'Create a new secret in AWS Secrets Manager.',
    schema: createSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'create_secret', mcpContext, params, () =>
        context.secretsManager.createSecret({
          name: params.name,
          secretValue: params.secret_value,
          description: params.description,
          tags: params.tags,
          ...toCallTarget(params),
        })
      ),
  });
