/**
 * Clear Credential Cache Tool
 *
 * Drops cached clients with the credentials behind them, so the next call
 * assumes the role again or reloads the profile. role_arn takes precedence
 * over profile; with neither, everything is cleared.
 */

import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { handleToolError } from '../utils/error-helpers.js';
import { defineTool } from './common.js';

const clearCredentialCacheSchema = z.object({
  role_arn: z.string().optional().describe('Clear credentials and clients for this role only'),
  profile: z
    .string()
    .optional()
    .describe('Clear the session and clients for this profile only (ignored when role_arn is set)'),
});

export const createClearCredentialCacheTool: ToolFactory = (context) =>
  defineTool({
    name: 'clear_credential_cache',
    description:
      'Clear cached AWS credentials and clients, for one role, one profile, or everything.',
    schema: clearCredentialCacheSchema,
    handler: async (params, mcpContext) => {
      try {
        const removed = await context.clientCache.clearCache(params.role_arn, params.profile);
        const scope = params.role_arn ? 'role' : params.profile ? 'profile' : 'all';

        return {
          status: 'success',
          data: {
            success: true,
            scope,
            ...(scope === 'role' ? { role_arn: params.role_arn } : {}),
            ...(scope === 'profile' ? { profile: params.profile } : {}),
            clients_removed: removed,
          },
        };
      } catch (error) {
        return handleToolError(
          error,
          'clear_credential_cache',
          mcpContext,
          context.auditService,
          params
        );
      }
    },
  });
