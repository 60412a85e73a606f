/**
 * List Accounts Tool
 *
 * Reports the account → role ARN and account → profile mappings configured
 * through ACCOUNT_{NAME}_ROLE_ARN / ACCOUNT_{NAME}_PROFILE. Makes no remote
 * call.
 */

import { z } from 'zod';
import type { ToolFactory } from '../types.js';
import { handleToolError } from '../utils/error-helpers.js';
import { defineTool } from './common.js';

const listAccountsSchema = z.object({
  region: z.string().optional().describe('AWS region to report as default (defaults to AWS_REGION env var)'),
});

export const createListAccountsTool: ToolFactory = (context) =>
  defineTool({
    name: 'list_accounts',
    description:
      'List all pre-configured AWS accounts with their role ARNs and profiles, and the default region.',
    schema: listAccountsSchema,
    handler: async (params, mcpContext) => {
      try {
        const { configManager } = context;
        const accounts = configManager.listConfiguredAccounts();
        const profiles = configManager.listConfiguredProfiles();

        return {
          status: 'success',
          data: {
            success: true,
            accounts,
            profiles,
            accounts_count: Object.keys(accounts).length,
            profiles_count: Object.keys(profiles).length,
            default_region: params.region || configManager.getDefaultRegion(),
          },
        };
      } catch (error) {
        return handleToolError(error, 'list_accounts', mcpContext, context.auditService, params);
      }
    },
  });
