// Main export file - re-exports all public APIs from modular architecture

// Core layer exports
export * from './core/index.js';

// Service layer exports
export * from './services/index.js';

// MCP layer exports
export * from './mcp/index.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, type Logger } from './utils/logger.js';
