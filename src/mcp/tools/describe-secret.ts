import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { defineTool, invokeOperation, targetFields, toCallTarget } from './common.js';

const describeSecretSchema = z.object({
  secret_id: z.string().min(1).describe('Secret name or ARN'),
  ...targetFields,
});

export const createDescribeSecretTool: ToolFactory = (context) =>
  defineTool({
    name: 'describe_secret',
    description: 'Get metadata about a secret (rotation, dates, tags, versions) without its value.',
    schema: describeSecretSchema,
    handler: (params, mcpContext) =>
      invokeOperation(context, 'describe_secret', mcpContext, params, () =>
        context.secretsManager.describeSecret({
          secretId: params.secret_id,
          ...toCallTarget(params),
        })
      ),
  });
