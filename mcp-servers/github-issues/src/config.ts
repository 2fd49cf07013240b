/**
 * Runtime configuration, read from the environment after loadEnv()
 */

import { AgentApiConfig, ConfigurationError, GitHubConfig, getEnv } from '@issue-delegate/shared';
import { ANALYSIS_BUDGET, PollingBudget, RESOLUTION_BUDGET } from './services/agent-session-orchestrator.js';

export interface ServerConfig {
  github: GitHubConfig;
  /** apiToken is empty when no agent credential is configured */
  agent: AgentApiConfig;
  analysisBudget: PollingBudget;
  resolutionBudget: PollingBudget;
}

function readSeconds(name: string, defaultMs: number): number {
  const raw = getEnv(name);
  if (raw === '') return defaultMs;

  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`${name} must be a positive number of seconds, got "${raw}"`);
  }
  return Math.round(seconds * 1000);
}

export function loadConfig(): ServerConfig {
  const githubToken = getEnv('GITHUB_TOKEN');

  return {
    github: {
      baseUrl: getEnv('GITHUB_API_URL', 'https://api.github.com'),
      token: githubToken || undefined,
    },
    agent: {
      baseUrl: getEnv('AGENT_API_URL', 'https://api.devin.ai'),
      appUrl: getEnv('AGENT_APP_URL', 'https://app.devin.ai'),
      apiToken: getEnv('AGENT_API_TOKEN'),
    },
    analysisBudget: {
      maxWaitMs: readSeconds('ANALYSIS_MAX_WAIT_SECONDS', ANALYSIS_BUDGET.maxWaitMs),
      pollIntervalMs: readSeconds('ANALYSIS_POLL_INTERVAL_SECONDS', ANALYSIS_BUDGET.pollIntervalMs),
    },
    resolutionBudget: {
      maxWaitMs: readSeconds('RESOLUTION_MAX_WAIT_SECONDS', RESOLUTION_BUDGET.maxWaitMs),
      pollIntervalMs: readSeconds('RESOLUTION_POLL_INTERVAL_SECONDS', RESOLUTION_BUDGET.pollIntervalMs),
    },
  };
}
