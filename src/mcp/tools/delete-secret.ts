import { z } from 'zod';
import { DEFAULT_RECOVERY_WINDOW_DAYS } from '../../services/secrets-manager.js';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const deleteSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  recovery_window_in_days: z
    .number()
    .int()
    .min(7)
    .max(30)
    .default(DEFAULT_RECOVERY_WINDOW_DAYS)
    .describe('Days before permanent deletion (7-30)'),
  force_delete_without_recovery: z
    .boolean()
    .default(false)
    .describe('Delete immediately without a recovery window'),
  ...targetFields,
});

export const createDeleteSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'delete_secret',
    description:
      'Delete a secret. By default deletion is scheduled after a recovery window; force_delete_without_recovery deletes immediately.',
    schema: deleteSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'delete_secret', mcpContext, params, () =>
        context.secretsManager.deleteSecret({
          secretId: params.secret_id,
          recoveryWindowInDays: params.recovery_window_in_days,
          forceDeleteWithoutRecovery: params.force_delete_without_recovery,
          ...toCallTarget(params),
        })
      ),
  });
