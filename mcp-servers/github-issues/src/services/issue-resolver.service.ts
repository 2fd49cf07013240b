/**
 * Issue Resolver Service
 * Hands an issue and its prior analysis to the agent under the long polling
 * budget. There is no heuristic fallback for resolution.
 */

import {
  ConfigurationError,
  DecodeError,
  Logger,
  ValidationError,
  createLogger,
} from '@issue-delegate/shared';
import { IIssueSource } from '../models/service-interfaces.js';
import { Analysis, IssueRecord, RepoRef, ResolutionResult } from '../types/index.js';
import { decodeResolutionResult, fromAnalysisRecord } from '../decoding/payload-decoder.js';
import { isPlainObject } from '../decoding/json-extract.js';
import { findLatestAnalysis } from '../formatting/analysis-comment.js';
import {
  AgentSessionOrchestrator,
  PollingBudget,
  RESOLUTION_BUDGET,
  sessionFailureToError,
} from './agent-session-orchestrator.js';
import { buildResolutionPrompt } from './prompt-builder.js';

export interface ResolveOptions {
  /** Prior analysis as a flat AnalysisRecord JSON string */
  analysisJson?: string;
}

export class IssueResolverService {
  constructor(
    private issues: IIssueSource,
    private orchestrator: AgentSessionOrchestrator | null,
    private budget: PollingBudget = RESOLUTION_BUDGET,
    private logger: Logger = createLogger('IssueResolver')
  ) {}

  async resolveIssue(ref: RepoRef, issueNumber: number, options: ResolveOptions = {}): Promise<ResolutionResult> {
    const orchestrator = this.orchestrator;
    if (!orchestrator) {
      throw new ConfigurationError('Resolving issues requires an agent API token. Set AGENT_API_TOKEN.');
    }

    const issue = await this.issues.getIssue(ref.owner, ref.repo, issueNumber);
    const analysis = this.priorAnalysis(issue, options.analysisJson);

    this.logger.info(`Starting resolution session for ${ref.owner}/${ref.repo}#${issue.number}`);
    const outcome = await orchestrator.run(buildResolutionPrompt(issue, ref, analysis), this.budget);
    if (!outcome.ok) {
      throw sessionFailureToError(outcome, this.budget);
    }

    const result = decodeResolutionResult(
      outcome.payload,
      issue,
      orchestrator.sessionUrl(outcome.sessionId)
    );
    if (!result) {
      throw new DecodeError(`Session ${outcome.sessionId} returned a resolution summary that could not be decoded`);
    }
    return result;
  }

  private priorAnalysis(issue: IssueRecord, analysisJson?: string): Analysis {
    if (analysisJson !== undefined && analysisJson.trim() !== '') {
      let parsed: unknown;
      try {
        parsed = JSON.parse(analysisJson);
      } catch (error) {
        throw new ValidationError(
          'analysis_json is not valid JSON',
          error instanceof Error ? error : undefined
        );
      }
      if (!isPlainObject(parsed)) {
        throw new ValidationError('analysis_json must be a JSON object');
      }
      return fromAnalysisRecord(parsed, issue);
    }

    const posted = findLatestAnalysis(issue.comments, issue);
    if (!posted) {
      throw new ValidationError(
        `No prior analysis found for issue #${issue.number}. Run analyze_issue with post_comment, or pass analysis_json.`
      );
    }
    return posted;
  }
}
