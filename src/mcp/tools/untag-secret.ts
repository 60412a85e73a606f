import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const untagSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  tag_keys: z.array(z.string()).describe('Tag keys to remove'),
  ...targetFields,
});

export const createUntagSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'untag_secret',
    description: 'Remove tags from a secret.',
    schema: untagSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'untag_secret', mcpContext, params, () =>
        context.secretsManager.untagSecret({
          secretId: params.secret_id,
          tagKeys: params.tag_keys,
          ...toCallTarget(params),
        })
      ),
  });
