/**
 * Type definitions for the GitHub Issues MCP Server
 */

// ============================================
// Closed sets
// ============================================

export const ISSUE_CATEGORIES = [
  'bug',
  'feature',
  'documentation',
  'enhancement',
  'question',
  'maintenance',
  'security',
  'performance',
  'unknown',
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export const COMPLEXITY_NAMES = ['trivial', 'simple', 'moderate', 'complex', 'very_complex'] as const;

export type ComplexityName = (typeof COMPLEXITY_NAMES)[number];

export type ComplexityValue = 1 | 2 | 3 | 4 | 5;

export interface ComplexityLevel {
  level: ComplexityName;
  value: ComplexityValue;
}

export const COMPLEXITY_LEVELS: Readonly<Record<ComplexityName, ComplexityLevel>> = {
  trivial: { level: 'trivial', value: 1 },
  simple: { level: 'simple', value: 2 },
  moderate: { level: 'moderate', value: 3 },
  complex: { level: 'complex', value: 4 },
  very_complex: { level: 'very_complex', value: 5 },
};

export const EXECUTION_STATUSES = ['success', 'partial_success', 'failed', 'blocked', 'in_progress'] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

// ============================================
// Issue data
// ============================================

export interface IssueComment {
  author: string;
  body: string;
  createdAt: string;
}

/** Normalized issue as fetched for one analysis or resolution call */
export interface IssueRecord {
  readonly number: number;
  readonly title: string;
  readonly body: string | null;
  readonly labels: readonly string[];
  readonly comments: readonly IssueComment[];
  readonly url?: string;
  readonly state?: string;
}

export interface IssueSummary {
  number: number;
  title: string;
  state: string;
  author: string;
  createdAt: string;
  labels: string[];
  assignees: string[];
}

export interface ListIssuesOptions {
  state?: 'open' | 'closed' | 'all';
  labels?: string;
  assignee?: string;
  limit?: number;
}

export interface RepoRef {
  owner: string;
  repo: string;
}

// ============================================
// Analysis and resolution results
// ============================================

export interface Analysis {
  issueNumber: number;
  title: string;
  category: IssueCategory;
  complexity: ComplexityLevel;
  /** Always within [1.0, 10.0], one decimal */
  confidenceScore: number;
  estimatedEffortHours: number;
  keyFactors: string[];
  blockers: string[];
  dependencies: string[];
  reasoning: string;
}

export interface AnalysisOutcome {
  analysis: Analysis;
  source: 'agent' | 'heuristic';
  sessionId?: string;
  sessionUrl?: string;
  /** Why the agent result was not used, when the heuristic answered instead */
  fallbackReason?: string;
  /** Set when the analysis was posted to the issue */
  commentUrl?: string;
}

export interface ResolutionResult {
  issueNumber: number;
  title: string;
  executionStatus: ExecutionStatus;
  successScore: number;
  actionPlan: string[];
  changesMade: string[];
  prCreated: boolean;
  prUrl?: string;
  blockersEncountered: string[];
  sessionUrl: string;
  summary: string;
}

/** Flat, snake_case form of an Analysis for JSON output and `analysis_json` input */
export interface AnalysisRecord {
  issue_number: number;
  title: string;
  category: IssueCategory;
  complexity: ComplexityLevel;
  confidence_score: number;
  estimated_effort_hours: number;
  key_factors: string[];
  blockers: string[];
  dependencies: string[];
  reasoning: string;
}

export interface ResolutionRecord {
  issue_number: number;
  title: string;
  execution_status: ExecutionStatus;
  success_score: number;
  action_plan: string[];
  changes_made: string[];
  pr_created: boolean;
  pr_url: string | null;
  blockers_encountered: string[];
  session_url: string;
  summary: string;
}

// ============================================
// Remote sessions
// ============================================

export type SessionLifecycleState = 'created' | 'polling' | 'finished' | 'blocked' | 'expired' | 'timed_out';

export interface SessionStatus {
  statusEnum: string;
  structuredOutput?: unknown;
}

export type SessionFailureReason = 'create_failed' | 'transport' | 'no_output' | 'expired' | 'timed_out';

export type SessionOutcome =
  | {
      ok: true;
      sessionId: string;
      state: 'finished' | 'blocked';
      payload: unknown;
    }
  | {
      ok: false;
      reason: SessionFailureReason;
      sessionId?: string;
      message: string;
    };

// ============================================
// Tool arguments
// ============================================

export type OutputFormat = 'text' | 'json';

export interface ToolArgs {
  repo?: string;
  issue_number?: number;
  state?: 'open' | 'closed' | 'all';
  labels?: string;
  assignee?: string;
  limit?: number;
  post_comment?: boolean;
  format?: OutputFormat;
  analysis_json?: string;
}
