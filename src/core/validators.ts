/**
 * Core Validators
 *
 * CoreContext is defined in the core layer; this validator imports it from
 * './types.js' so core never depends on the MCP layer.
 */

import type { CoreContext } from './types.js';

export class CoreContextValidator {
  /**
   * Check that every service the tools depend on is present.
   *
   * Called by the server after the orchestrator has built the context and
   * before any tool is registered.
   *
   * @throws {Error} naming the first missing field
   */
  static validate(context: Partial<CoreContext>): asserts context is CoreContext {
    if (!context || typeof context !== 'object') {
      throw new Error('CoreContext missing required field: context must be a valid object');
    }

    const required: Array<keyof CoreContext> = [
      'configManager',
      'auditService',
      'clientCache',
      'secretsManager',
    ];

    for (const field of required) {
      if (!context[field]) {
        throw new Error(
          `CoreContext missing required field: ${field}. ` +
            'Build the context with ConfigOrchestrator.buildCoreContext().'
        );
      }
    }
  }
}
