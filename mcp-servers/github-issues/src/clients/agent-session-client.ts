/**
 * Remote coding agent session API client
 * POST /v1/sessions creates a session, GET /v1/session/{id} reports its status
 */

import axios, { AxiosInstance } from 'axios';
import { AgentApiConfig, ApiError, createApiError } from '@issue-delegate/shared';
import { IAgentSessionApi } from '../models/service-interfaces.js';
import { SessionStatus } from '../types/index.js';

interface CreateSessionResponse {
  session_id?: string;
  url?: string;
}

interface SessionResponse {
  session_id?: string;
  status_enum?: string | null;
  structured_output?: unknown;
}

export class AgentSessionClient implements IAgentSessionApi {
  private client: AxiosInstance;
  private appUrl: string;

  constructor(config: AgentApiConfig, http?: AxiosInstance) {
    this.appUrl = config.appUrl.replace(/\/+$/, '');
    this.client = http ?? axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Authorization': `Bearer ${config.apiToken}`,
        'Content-Type': 'application/json'
      },
      timeout: 30000
    });
  }

  async createSession(prompt: string): Promise<string> {
    let data: CreateSessionResponse;
    try {
      // Unlisted keeps issue analyses out of the shared session list
      const response = await this.client.post<CreateSessionResponse>('/v1/sessions', {
        prompt,
        unlisted: true
      });
      data = response.data;
    } catch (error) {
      throw createApiError(error, 'Failed to create agent session');
    }

    if (!data.session_id) {
      throw new ApiError('Failed to create agent session: response did not include a session_id', undefined, data);
    }
    return data.session_id;
  }

  async getSession(sessionId: string): Promise<SessionStatus> {
    try {
      const response = await this.client.get<SessionResponse>(`/v1/session/${sessionId}`);
      return {
        statusEnum: response.data.status_enum ?? '',
        structuredOutput: response.data.structured_output
      };
    } catch (error) {
      throw createApiError(error, `Failed to get status of session ${sessionId}`);
    }
  }

  sessionUrl(sessionId: string): string {
    return `${this.appUrl}/sessions/${sessionId}`;
  }
}
