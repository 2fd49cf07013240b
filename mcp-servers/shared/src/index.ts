/**
 * @issue-delegate/shared
 * Shared utilities and types for MCP servers
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  getEnvOrThrow,
  type EnvLoaderOptions,
} from './env-loader.js';

// Types
export {
  // Config types
  type GitHubConfig,
  type AgentApiConfig,
  // MCP types
  type MCPResponse,
  // Response helpers
  createTextResponse,
  createJsonResponse,
} from './types.js';

// Error handling
export {
  MCPServerError,
  ValidationError,
  ApiError,
  NotFoundError,
  ConfigurationError,
  DecodeError,
  SessionFailedError,
  SessionTimeoutError,
  MethodNotFoundError,
  getErrorMessage,
  extractApiErrorDetails,
  createApiError,
  toMcpError,
} from './errors.js';

// Logging
export { createLogger, silentLogger, type Logger } from './logger.js';
