/**
 * Issue Operations Handler
 * Handles list_issues, analyze_issue, get_issue_analysis, resolve_issue
 */

import { MCPResponse, createJsonResponse } from '@issue-delegate/shared';
import { BaseHandler } from './base-handler.js';
import { IIssueSource } from '../models/service-interfaces.js';
import { IssueAnalyzerService } from '../services/issue-analyzer.service.js';
import { IssueResolverService } from '../services/issue-resolver.service.js';
import { AnalysisOutcome, ToolArgs } from '../types/index.js';
import { toAnalysisRecord, toResolutionRecord } from '../decoding/payload-decoder.js';
import { renderAnalysis } from '../formatting/analysis-comment.js';
import { formatIssueList, formatResolution } from '../formatting/resolution-report.js';

const DEFAULT_LIST_LIMIT = 30;
const MAX_LIST_LIMIT = 100;

export class IssueHandler extends BaseHandler {
  constructor(
    private issues: IIssueSource,
    private analyzer: IssueAnalyzerService,
    private resolver: IssueResolverService
  ) {
    super();
  }

  async listIssues(args: ToolArgs): Promise<MCPResponse> {
    try {
      this.validateRequired(args, ['repo']);
      const ref = this.parseRepo(args.repo);
      const limit = Math.min(Math.max(Math.trunc(args.limit ?? DEFAULT_LIST_LIMIT), 1), MAX_LIST_LIMIT);

      const issues = await this.issues.listIssues(ref.owner, ref.repo, {
        state: args.state ?? 'open',
        labels: args.labels,
        assignee: args.assignee,
        limit,
      });

      if (args.format === 'json') {
        return createJsonResponse(issues);
      }
      return this.formatResponse(formatIssueList(`${ref.owner}/${ref.repo}`, issues));
    } catch (error) {
      this.handleError(error, 'list issues');
    }
  }

  async analyzeIssue(args: ToolArgs): Promise<MCPResponse> {
    try {
      this.validateRequired(args, ['repo', 'issue_number']);
      const ref = this.parseRepo(args.repo);
      const issueNumber = this.requireIssueNumber(args.issue_number);

      const outcome = await this.analyzer.analyzeIssue(ref, issueNumber, {
        postComment: args.post_comment === true,
      });

      if (args.format === 'json') {
        return createJsonResponse(this.outcomeRecord(outcome));
      }
      return this.formatResponse(`${renderAnalysis(outcome.analysis)}\n\n${this.outcomeFooter(outcome)}`);
    } catch (error) {
      this.handleError(error, 'analyze issue');
    }
  }

  async getIssueAnalysis(args: ToolArgs): Promise<MCPResponse> {
    try {
      this.validateRequired(args, ['repo', 'issue_number']);
      const ref = this.parseRepo(args.repo);
      const issueNumber = this.requireIssueNumber(args.issue_number);

      const analysis = await this.analyzer.getPostedAnalysis(ref, issueNumber);
      if (!analysis) {
        return this.formatResponse(`No posted analysis found on ${ref.owner}/${ref.repo}#${issueNumber}`);
      }

      if (args.format === 'json') {
        return createJsonResponse(toAnalysisRecord(analysis));
      }
      return this.formatResponse(renderAnalysis(analysis));
    } catch (error) {
      this.handleError(error, 'get issue analysis');
    }
  }

  async resolveIssue(args: ToolArgs): Promise<MCPResponse> {
    try {
      this.validateRequired(args, ['repo', 'issue_number']);
      const ref = this.parseRepo(args.repo);
      const issueNumber = this.requireIssueNumber(args.issue_number);

      const result = await this.resolver.resolveIssue(ref, issueNumber, { analysisJson: args.analysis_json });

      if (args.format === 'json') {
        return createJsonResponse(toResolutionRecord(result));
      }
      return this.formatResponse(formatResolution(result));
    } catch (error) {
      this.handleError(error, 'resolve issue');
    }
  }

  private outcomeRecord(outcome: AnalysisOutcome): Record<string, unknown> {
    return {
      ...toAnalysisRecord(outcome.analysis),
      source: outcome.source,
      session_url: outcome.sessionUrl ?? null,
      fallback_reason: outcome.fallbackReason ?? null,
      comment_url: outcome.commentUrl ?? null,
    };
  }

  private outcomeFooter(outcome: AnalysisOutcome): string {
    const lines = outcome.source === 'agent'
      ? [`Source: remote agent session ${outcome.sessionUrl ?? outcome.sessionId ?? ''}`.trimEnd()]
      : [`Source: heuristic classifier (${outcome.fallbackReason ?? 'no agent result'})`];
    if (outcome.commentUrl) {
      lines.push(`Posted: ${outcome.commentUrl}`);
    }
    return lines.join('\n');
  }
}
