/**
 * Secrets MCP Server
 *
 * Wraps FastMCP with the multi-account Secrets Manager tools:
 * - loads and validates configuration
 * - builds and validates the CoreContext
 * - gates the HTTP transport with the bearer middleware
 * - registers every tool with CoreContext injected
 * - starts the auxiliary /healthz + /openapi.json server over HTTP
 *
 * @example
 * ```typescript
 * const server = new SecretsMCPServer();
 * await server.start({ transport: 'httpStream', port: 8000 });
 * ```
 */

import type { Server } from 'http';
import { FastMCP } from 'fastmcp';
import { ConfigManager } from '../config/manager.js';
import type { CoreContext } from '../core/index.js';
import { setLogLevel, createLogger } from '../utils/logger.js';
import { createMetadataServer, startHTTPServer, stopHTTPServer } from './http-server.js';
import { BearerAuthMiddleware } from './middleware.js';
import { ConfigOrchestrator, type OrchestratorOptions } from './orchestrator.js';
import { getAllToolFactories } from './tools/index.js';
import type {
  AuthSession,
  LLMResponse,
  MCPStartOptions,
  ToolRegistration,
  TransportType,
} from './types.js';

const logger = createLogger('Secrets MCP Server');

export const MCP_ENDPOINT = '/mcp';
export const HEALTH_PATH = '/healthz';

export type SecretsMCPServerOptions = Omit<OrchestratorOptions, 'configManager'> & {
  configManager?: ConfigManager;
};

interface TextToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Serialize a handler's LLMResponse as MCP text content. Failures become the
 * `{ success: false, error, error_code, ...details }` record with `isError`.
 */
export function toToolResult(result: LLMResponse): TextToolResult {
  if (result.status === 'success') {
    return {
      content: [{ type: 'text', text: JSON.stringify(result.data, null, 2) }],
    };
  }

  const failure = {
    success: false,
    error: result.message,
    error_code: result.code,
    ...result.details,
  };

  return {
    content: [{ type: 'text', text: JSON.stringify(failure, null, 2) }],
    isError: true,
  };
}

export class SecretsMCPServer {
  private readonly configManager: ConfigManager;
  private readonly orchestrator: ConfigOrchestrator;
  private coreContext?: CoreContext;
  private mcpServer?: FastMCP<AuthSession>;
  private metadataServer?: Server;
  private registeredTools: ToolRegistration[] = [];
  private isRunning = false;

  constructor(options: SecretsMCPServerOptions = {}) {
    this.configManager = options.configManager ?? new ConfigManager();
    this.orchestrator = new ConfigOrchestrator({
      ...options,
      configManager: this.configManager,
      onAuditOverflow:
        options.onAuditOverflow ??
        ((entries) => {
          logger.warn(`Audit overflow: ${entries.length} entries in buffer, oldest discarded`);
        }),
    });
  }

  /**
   * Register a tool with the running FastMCP instance.
   *
   * @throws {Error} if the server has not been initialized
   */
  registerTool(tool: ToolRegistration): void {
    if (!this.mcpServer) {
      throw new Error('Cannot register tool before server initialization. Call initialize() first.');
    }

    logger.debug(`Registering tool: ${tool.name}`);
    this.registeredTools.push(tool);

    this.mcpServer.addTool({
      name: tool.name,
      description: tool.description,
      parameters: tool.schema,
      execute: async (args, context) => {
        const result = await tool.handler(args, { session: context.session });
        return toToolResult(result);
      },
    });
  }

  /**
   * Load configuration, build the CoreContext and register every tool.
   * Called by start(); exposed so the server can be assembled without
   * opening a transport.
   */
  async initialize(): Promise<FastMCP<AuthSession>> {
    if (this.mcpServer) {
      return this.mcpServer;
    }

    await this.configManager.load();
    setLogLevel(this.configManager.getLogLevel());

    this.coreContext = this.orchestrator.buildCoreContext();
    ConfigOrchestrator.validateCoreContext(this.coreContext);

    const authMiddleware = new BearerAuthMiddleware(
      this.configManager.getAuthToken(),
      this.coreContext.auditService
    );

    const { name, version } = this.configManager.getServerInfo();
    logger.info(`Creating FastMCP server: ${name} v${version}`);

    this.mcpServer = new FastMCP<AuthSession>({
      name,
      version,
      authenticate: authMiddleware.authenticateRequest,
      health: {
        enabled: true,
        message: 'OK',
        path: HEALTH_PATH,
        status: 200,
      },
    });

    const factories = getAllToolFactories();
    for (const factory of factories) {
      this.registerTool(factory(this.coreContext));
    }
    logger.info(`Registered ${factories.length} tools`);

    return this.mcpServer;
  }

  async start(options: MCPStartOptions = {}): Promise<void> {
    if (this.isRunning) {
      throw new Error('Server is already running. Call stop() first.');
    }

    const mcpServer = await this.initialize();
    const transport: TransportType = options.transport ?? 'stdio';

    if (transport === 'stdio') {
      await mcpServer.start({ transportType: 'stdio' });
      this.isRunning = true;
      logger.info('Server started on stdio');
      return;
    }

    const port = options.port ?? this.configManager.getServerPort();
    const metadataPort = options.metadataPort ?? this.configManager.getMetadataPort(port);

    await mcpServer.start({
      transportType: 'httpStream',
      httpStream: {
        port,
        endpoint: MCP_ENDPOINT,
      },
    });

    const { name, version } = this.configManager.getServerInfo();
    const serverUrl = this.configManager.getPublicUrl(port);
    const app = createMetadataServer({
      title: name,
      version,
      mcpEndpoint: MCP_ENDPOINT,
      serverUrl,
      tools: this.registeredTools.map(({ name, description }) => ({ name, description })),
    });
    this.metadataServer = await startHTTPServer(app, metadataPort);

    this.isRunning = true;

    logger.info('Server started successfully');
    logger.info(`  Transport:       httpStream`);
    logger.info(`  MCP endpoint:    ${serverUrl}${MCP_ENDPOINT}`);
    logger.info(`  Health:          ${serverUrl}${HEALTH_PATH}`);
    logger.info(`  Metadata server: http://localhost:${metadataPort}`);
    logger.info(
      `  Authentication:  ${this.configManager.getAuthToken() ? 'static bearer token' : 'any bearer token (MCP_AUTH_TOKEN not set)'}`
    );
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      logger.info('Server is not running');
      return;
    }

    logger.info('Stopping server...');

    if (this.metadataServer) {
      await stopHTTPServer(this.metadataServer);
    }

    if (this.mcpServer) {
      await this.mcpServer.stop();
    }

    this.metadataServer = undefined;
    this.mcpServer = undefined;
    this.coreContext = undefined;
    this.registeredTools = [];
    this.isRunning = false;

    logger.info('Server stopped');
  }

  /**
   * @throws {Error} if the server has not been initialized
   */
  getCoreContext(): CoreContext {
    if (!this.coreContext) {
      throw new Error('CoreContext not initialized. Call start() first.');
    }
    return this.coreContext;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }

  getConfigManager(): ConfigManager {
    return this.configManager;
  }
}
