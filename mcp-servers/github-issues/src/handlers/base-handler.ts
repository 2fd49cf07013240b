/**
 * Base Handler for Common MCP Tool Operations
 */

import { MCPResponse, ValidationError, createTextResponse, toMcpError } from '@issue-delegate/shared';
import { RepoRef } from '../types/index.js';

const REPO_SLUG = /^([\w.-]+)\/([\w.-]+)$/;

export abstract class BaseHandler {

  /**
   * Validate required parameters
   */
  protected validateRequired<T extends object>(params: T, required: Array<keyof T & string>): void {
    for (const param of required) {
      const value = params[param];
      if (value === undefined || value === null || value === '') {
        throw new ValidationError(`${param} is required`);
      }
    }
  }

  /**
   * Split an `owner/name` slug
   */
  protected parseRepo(repo: string | undefined): RepoRef {
    const match = (repo ?? '').trim().match(REPO_SLUG);
    if (!match) {
      throw new ValidationError(`repo must be in the form owner/name, got "${repo ?? ''}"`);
    }
    return { owner: match[1], repo: match[2] };
  }

  protected requireIssueNumber(value: number | undefined): number {
    if (value === undefined || !Number.isInteger(value) || value <= 0) {
      throw new ValidationError('issue_number must be a positive integer');
    }
    return value;
  }

  /**
   * Handle errors consistently
   */
  protected handleError(error: unknown, operation: string): never {
    throw toMcpError(error, operation);
  }

  /**
   * Format success response
   */
  protected formatResponse(text: string): MCPResponse {
    return createTextResponse(text);
  }
}
