import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const restoreSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  ...targetFields,
});

export const createRestoreSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'restore_secret',
    description: 'Restore a secret that is scheduled for deletion.',
    schema: restoreSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'restore_secret', mcpContext, params, () =>
        context.secretsManager.restoreSecret({
          secretId: params.secret_id,
          ...toCallTarget(params),
        })
      ),
  });
