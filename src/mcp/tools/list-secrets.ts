import { z } from 'zod';
import { DEFAULT_LIST_MAX_RESULTS } from '../../services/secrets-manager.js';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const listSecretsSchema = z.object({
  name_prefix: z.string().optional().describe('Only list secrets whose name starts with this prefix'),
  max_results: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_LIST_MAX_RESULTS)
    .describe('Maximum number of secrets to return'),
  include_planned_deletion: z
    .boolean()
    .default(false)
    .describe('Include secrets scheduled for deletion'),
  ...targetFields,
});

export const createListSecretsTool: ToolFactory = (context) =>
  defineTool({
    name: 'list_secrets',
    description: 'List secrets in AWS Secrets Manager, optionally filtered by name prefix.',
    schema: listSecretsSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'list_secrets', mcpContext, params, () =>
        context.secretsManager.listSecrets({
          namePrefix: params.name_prefix,
          maxResults: params.max_results,
          includePlannedDeletion: params.include_planned_deletion,
          ...toCallTarget(params),
        })
      ),
  });
