import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const updateSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  secret_value: z.string().describe('New secret value (string or JSON)'),
  description: z.string().optional().describe('New description'),
  ...targetFields,
});

export const createUpdateSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'update_secret',
    description: "Update an existing secret's value.",
    schema: updateSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'update_secret', mcpContext, params, () =>
        context.secretsManager.updateSecret({
          secretId: params.secret_id,
          secretValue: params.secret_value,
          description: params.description,
          ...toCallTarget(params),
        })
      ),
  });
