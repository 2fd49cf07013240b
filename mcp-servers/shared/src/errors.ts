/**
 * Shared error handling utilities for MCP servers
 * Every failure a service can raise maps onto one of these classes
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

/**
 * Base error class for MCP server operations
 */
export class MCPServerError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'MCPServerError';
  }

  /**
   * Convert to MCP SDK error format
   */
  toMcpError(): McpError {
    return new McpError(ErrorCode.InternalError, this.message);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends MCPServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.InvalidParams, this.message);
  }
}

/**
 * Error for API communication failures
 */
export class ApiError extends MCPServerError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseData?: unknown,
    cause?: Error
  ) {
    super(message, 'API_ERROR', cause);
    this.name = 'ApiError';
  }
}

/**
 * A resource the API reported as missing (HTTP 404)
 */
export class NotFoundError extends ApiError {
  constructor(message: string, responseData?: unknown, cause?: Error) {
    super(message, 404, responseData, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for configuration issues, raised before any network call
 */
export class ConfigurationError extends MCPServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Structured data was missing or could not be decoded
 */
export class DecodeError extends MCPServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'DECODE_ERROR', cause);
    this.name = 'DecodeError';
  }
}

/**
 * A remote session ended without a usable result
 */
export class SessionFailedError extends MCPServerError {
  constructor(
    message: string,
    public readonly reason: string,
    public readonly sessionId?: string,
    cause?: Error
  ) {
    super(message, 'SESSION_FAILED', cause);
    this.name = 'SessionFailedError';
  }
}

/**
 * A remote session did not reach a terminal state within its wait budget
 */
export class SessionTimeoutError extends MCPServerError {
  constructor(
    message: string,
    public readonly sessionId: string,
    public readonly maxWaitMs: number
  ) {
    super(message, 'SESSION_TIMEOUT');
    this.name = 'SessionTimeoutError';
  }
}

/**
 * Error for method not found
 */
export class MethodNotFoundError extends MCPServerError {
  constructor(methodName: string) {
    super(`Unknown method: ${methodName}`, 'METHOD_NOT_FOUND');
    this.name = 'MethodNotFoundError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.MethodNotFound, this.message);
  }
}

// ============================================
// Error Handling Utilities
// ============================================

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Extract API error details from axios-like error responses
 * GitHub reports `{ message }`, the agent API `{ detail }`
 */
export function extractApiErrorDetails(error: unknown): {
  message: string;
  statusCode?: number;
  data?: unknown;
} {
  const baseMessage = getErrorMessage(error);

  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object') {
      const statusCode =
        'status' in response && typeof response.status === 'number' ? response.status : undefined;
      const data = 'data' in response ? response.data : undefined;

      let apiMessage = baseMessage;
      if (data && typeof data === 'object') {
        if ('message' in data && typeof data.message === 'string') {
          apiMessage = data.message;
        } else if ('detail' in data && typeof data.detail === 'string') {
          apiMessage = data.detail;
        }
      }

      return { message: apiMessage, statusCode, data };
    }
  }

  return { message: baseMessage };
}

/**
 * Create an API error from an axios-like error
 */
export function createApiError(error: unknown, context: string): ApiError {
  const details = extractApiErrorDetails(error);
  const cause = error instanceof Error ? error : undefined;

  if (details.statusCode === 404) {
    return new NotFoundError(`${context}: ${details.message}`, details.data, cause);
  }

  return new ApiError(`${context}: ${details.message}`, details.statusCode, details.data, cause);
}

/**
 * Convert any thrown value into an McpError, keeping the operation in the message
 */
export function toMcpError(error: unknown, operation: string): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof ValidationError || error instanceof MethodNotFoundError) {
    return error.toMcpError();
  }
  return new McpError(ErrorCode.InternalError, `Failed to ${operation}: ${getErrorMessage(error)}`);
}
