/**
 * MCP Tool Factories
 *
 * Exports every tool factory for registration with the MCP server.
 */

import type { ToolFactory } from '../types.js';
import { createClearCredentialCacheTool } from './clear-credential-cache.js';
import { createCreateSecretTool } from './create-secret.js';
import { createDeleteSecretTool } from './delete-secret.js';
import { createDescribeSecretTool } from './describe-secret.js';
import { createGetSecretValueTool } from './get-secret-value.js';
import { createListAccountsTool } from './list-accounts.js';
import { createListSecretsTool } from './list-secrets.js';
import { createRestoreSecretTool } from './restore-secret.js';
import { createTagSecretTool } from './tag-secret.js';
import { createUntagSecretTool } from './untag-secret.js';
import { createUpdateSecretTool } from './update-secret.js';

export { createClearCredentialCacheTool } from './clear-credential-cache.js';
export { createCreateSecretTool } from './create-secret.js';
export { createDeleteSecretTool } from './delete-secret.js';
export { createDescribeSecretTool } from './describe-secret.js';
export { createGetSecretValueTool } from './get-secret-value.js';
export { createListAccountsTool } from './list-accounts.js';
export { createListSecretsTool } from './list-secrets.js';
export { createRestoreSecretTool } from './restore-secret.js';
export { createTagSecretTool } from './tag-secret.js';
export { createUntagSecretTool } from './untag-secret.js';
export { createUpdateSecretTool } from './update-secret.js';

export {
  defineTool,
  fromOperationResult,
  invokeOperation,
  isOperationFailure,
  targetFields,
  toCallTarget,
} from './common.js';

/**
 * Every tool the server exposes, in registration order.
 */
export function getAllToolFactories(): ToolFactory[] {
  return [
    createListAccountsTool,
    createCreateSecretTool,
    createGetSecretValueTool,
    createUpdateSecretTool,
    createDeleteSecretTool,
    createListSecretsTool,
    createDescribeSecretTool,
    createRestoreSecretTool,
    createTagSecretTool,
    createUntagSecretTool,
    createClearCredentialCacheTool,
  ];
}
