import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const tagSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  tags: z
    .record(z.string())
    .describe('Tags as key-value pairs (e.g., {"Environment": "prod", "Team": "platform"})'),
  ...targetFields,
});

export const createTagSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'tag_secret',
    description: 'Add or update tags on a secret.',
    schema: tagSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'tag_secret', mcpContext, params, () =>
        context.secretsManager.tagSecret({
          secretId: params.secret_id,
          tags: params.tags,
          ...toCallTarget(params),
        })
      ),
  });
