/**
 * Issue Analyzer Service
 * Agent first when a credential is configured, heuristic classifier otherwise.
 * An undecodable or empty agent answer falls back to the heuristic; session
 * failures (timeout, expiry, transport) are raised to the caller.
 */

import { ConfigurationError, Logger, createLogger } from '@issue-delegate/shared';
import { ICommentPublisher, IIssueSource } from '../models/service-interfaces.js';
import { Analysis, AnalysisOutcome, IssueRecord, RepoRef } from '../types/index.js';
import { decodeAnalysisResult } from '../decoding/payload-decoder.js';
import { buildAnalysisComment, findLatestAnalysis } from '../formatting/analysis-comment.js';
import { HeuristicClassifierService } from './heuristic-classifier.service.js';
import {
  ANALYSIS_BUDGET,
  AgentSessionOrchestrator,
  PollingBudget,
  sessionFailureToError,
} from './agent-session-orchestrator.js';
import { buildAnalysisPrompt } from './prompt-builder.js';

export interface AnalyzeOptions {
  /** Post the rendered analysis back to the issue */
  postComment?: boolean;
}

export class IssueAnalyzerService {
  constructor(
    private issues: IIssueSource,
    private classifier: HeuristicClassifierService,
    private orchestrator: AgentSessionOrchestrator | null,
    private publisher: ICommentPublisher,
    private budget: PollingBudget = ANALYSIS_BUDGET,
    private logger: Logger = createLogger('IssueAnalyzer')
  ) {}

  async analyzeIssue(ref: RepoRef, issueNumber: number, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    if (options.postComment && !this.publisher.canPost()) {
      throw new ConfigurationError('Posting the analysis requires a GitHub token. Set GITHUB_TOKEN.');
    }

    const issue = await this.issues.getIssue(ref.owner, ref.repo, issueNumber);
    const outcome = await this.analyze(issue, ref);

    if (options.postComment) {
      const commentUrl = await this.publishAnalysis(ref, outcome.analysis);
      return { ...outcome, commentUrl };
    }
    return outcome;
  }

  async analyze(issue: IssueRecord, ref: RepoRef): Promise<AnalysisOutcome> {
    const orchestrator = this.orchestrator;
    if (!orchestrator) {
      this.logger.info(`No agent credential configured, classifying #${issue.number} heuristically`);
      return this.heuristic(issue, 'No agent API token configured');
    }

    const outcome = await orchestrator.run(buildAnalysisPrompt(issue, ref), this.budget);

    if (!outcome.ok) {
      if (outcome.reason === 'no_output') {
        this.logger.info(`${outcome.message}; falling back to heuristic analysis`);
        return this.heuristic(issue, outcome.message, outcome.sessionId);
      }
      throw sessionFailureToError(outcome, this.budget);
    }

    const analysis = decodeAnalysisResult(outcome.payload, issue);
    if (!analysis) {
      const reason = `Session ${outcome.sessionId} returned output that could not be decoded`;
      this.logger.info(`${reason}; falling back to heuristic analysis`);
      return this.heuristic(issue, reason, outcome.sessionId);
    }

    return {
      analysis,
      source: 'agent',
      sessionId: outcome.sessionId,
      sessionUrl: orchestrator.sessionUrl(outcome.sessionId),
    };
  }

  /**
   * @returns the URL of the posted comment
   */
  async publishAnalysis(ref: RepoRef, analysis: Analysis): Promise<string> {
    const url = await this.publisher.postComment(
      ref.owner,
      ref.repo,
      analysis.issueNumber,
      buildAnalysisComment(analysis)
    );
    this.logger.info(`Posted analysis for ${ref.owner}/${ref.repo}#${analysis.issueNumber}`);
    return url;
  }

  /**
   * Latest analysis previously posted to the issue, or null
   */
  async getPostedAnalysis(ref: RepoRef, issueNumber: number): Promise<Analysis | null> {
    const issue = await this.issues.getIssue(ref.owner, ref.repo, issueNumber);
    return findLatestAnalysis(issue.comments, issue);
  }

  private heuristic(issue: IssueRecord, fallbackReason: string, sessionId?: string): AnalysisOutcome {
    const outcome: AnalysisOutcome = {
      analysis: this.classifier.classify(issue),
      source: 'heuristic',
      fallbackReason,
    };
    if (sessionId && this.orchestrator) {
      outcome.sessionId = sessionId;
      outcome.sessionUrl = this.orchestrator.sessionUrl(sessionId);
    }
    return outcome;
  }
}
