/**
 * Shared type definitions for MCP servers
 * Contains common interfaces used across multiple servers
 */

// ============================================
// API Configuration Types
// ============================================

/**
 * GitHub REST API configuration
 */
export interface GitHubConfig {
  baseUrl: string;
  /** Personal access token; anonymous requests are allowed for reads */
  token?: string;
}

/**
 * Remote coding agent API configuration
 */
export interface AgentApiConfig {
  baseUrl: string;
  /** Web app origin used to build session links */
  appUrl: string;
  apiToken: string;
}

// ============================================
// MCP Response Types
// ============================================

/**
 * Standard MCP text content item
 */
type MCPTextContent = {
  type: 'text';
  text: string;
};

/**
 * Standard MCP response structure
 */
export type MCPResponse = {
  content: MCPTextContent[];
};

// ============================================
// Common Response Formatting Utilities
// ============================================

/**
 * Create a standard MCP text response
 */
export function createTextResponse(text: string): MCPResponse {
  return {
    content: [{ type: 'text', text }]
  };
}

/**
 * Create a JSON response, pretty-printed for readability in clients
 */
export function createJsonResponse(data: unknown): MCPResponse {
  return createTextResponse(JSON.stringify(data, null, 2));
}
