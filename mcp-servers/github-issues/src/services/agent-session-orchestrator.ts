/**
 * Agent Session Orchestrator
 * created → polling → finished | blocked | expired | timed_out
 *
 * Fixed poll interval, no retries. Failures come back as a SessionOutcome,
 * never as a throw.
 */

import {
  ApiError,
  Logger,
  MCPServerError,
  SessionFailedError,
  SessionTimeoutError,
  createLogger,
  getErrorMessage,
} from '@issue-delegate/shared';
import { IAgentSessionApi } from '../models/service-interfaces.js';
import { SessionFailureReason, SessionLifecycleState, SessionOutcome } from '../types/index.js';

export const TERMINAL_STATUSES = ['finished', 'blocked'] as const;
export const EXPIRED_STATUSES: readonly string[] = ['expired'];

type TerminalStatus = (typeof TERMINAL_STATUSES)[number];

function isTerminal(statusEnum: string): statusEnum is TerminalStatus {
  return TERMINAL_STATUSES.some(status => status === statusEnum);
}

export interface PollingBudget {
  maxWaitMs: number;
  pollIntervalMs: number;
}

export const ANALYSIS_BUDGET: PollingBudget = { maxWaitMs: 300_000, pollIntervalMs: 10_000 };
export const RESOLUTION_BUDGET: PollingBudget = { maxWaitMs: 1_800_000, pollIntervalMs: 30_000 };

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
};

/** Empty strings, objects and arrays count as "no structured output" */
export function hasPayload(payload: unknown): boolean {
  if (payload === undefined || payload === null) return false;
  if (typeof payload === 'string') return payload.trim().length > 0;
  if (Array.isArray(payload)) return payload.length > 0;
  if (typeof payload === 'object') return Object.keys(payload).length > 0;
  return true;
}

export class AgentSessionOrchestrator {
  constructor(
    private api: IAgentSessionApi,
    private logger: Logger = createLogger('AgentSession'),
    private clock: Clock = systemClock
  ) {}

  sessionUrl(sessionId: string): string {
    return this.api.sessionUrl(sessionId);
  }

  async run(prompt: string, budget: PollingBudget): Promise<SessionOutcome> {
    let sessionId: string;
    try {
      sessionId = await this.api.createSession(prompt);
    } catch (error) {
      this.logger.error('Failed to create session', getErrorMessage(error));
      return this.fail('create_failed', getErrorMessage(error));
    }

    this.transition(sessionId, 'created');
    const startedAt = this.clock.now();
    this.transition(sessionId, 'polling');

    while (true) {
      const elapsed = this.clock.now() - startedAt;
      if (elapsed >= budget.maxWaitMs) {
        this.transition(sessionId, 'timed_out');
        return this.fail(
          'timed_out',
          `Session ${sessionId} timed out after ${Math.round(budget.maxWaitMs / 1000)} seconds`,
          sessionId
        );
      }

      let statusEnum: string;
      let structuredOutput: unknown;
      try {
        ({ statusEnum, structuredOutput } = await this.api.getSession(sessionId));
      } catch (error) {
        this.logger.error(`Failed to check session ${sessionId}`, getErrorMessage(error));
        return this.fail('transport', getErrorMessage(error), sessionId);
      }

      this.logger.info(`Session ${sessionId} status: ${statusEnum || 'unknown'}`);

      if (isTerminal(statusEnum)) {
        this.transition(sessionId, statusEnum);
        if (!hasPayload(structuredOutput)) {
          return this.fail('no_output', `Session ${sessionId} ended (${statusEnum}) without structured output`, sessionId);
        }
        return { ok: true, sessionId, state: statusEnum, payload: structuredOutput };
      }

      if (EXPIRED_STATUSES.includes(statusEnum)) {
        this.transition(sessionId, 'expired');
        return this.fail('expired', `Session ${sessionId} ended with status: ${statusEnum}`, sessionId);
      }

      await this.clock.sleep(budget.pollIntervalMs);
    }
  }

  private transition(sessionId: string, state: SessionLifecycleState): void {
    this.logger.info(`Session ${sessionId} → ${state}`);
  }

  private fail(reason: SessionFailureReason, message: string, sessionId?: string): SessionOutcome {
    return { ok: false, reason, message, sessionId };
  }
}

/**
 * Map a failed outcome onto the shared error taxonomy
 */
export function sessionFailureToError(
  outcome: Extract<SessionOutcome, { ok: false }>,
  budget: PollingBudget
): MCPServerError {
  switch (outcome.reason) {
    case 'timed_out':
      return new SessionTimeoutError(outcome.message, outcome.sessionId ?? 'unknown', budget.maxWaitMs);
    case 'create_failed':
    case 'transport':
      return new ApiError(outcome.message);
    case 'expired':
    case 'no_output':
      return new SessionFailedError(outcome.message, outcome.reason, outcome.sessionId);
  }
}
