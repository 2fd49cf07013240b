/**
 * Decoders from agent payloads and flat records into Analysis / ResolutionResult
 * Every enum crossing a JSON or comment boundary goes through one of the decode* functions
 */

import {
  Analysis,
  AnalysisRecord,
  COMPLEXITY_LEVELS,
  COMPLEXITY_NAMES,
  ComplexityLevel,
  EXECUTION_STATUSES,
  ExecutionStatus,
  ISSUE_CATEGORIES,
  IssueCategory,
  ResolutionRecord,
  ResolutionResult,
} from '../types/index.js';
import { normalizeScore } from '../utils/scores.js';
import { extractJsonObject, isPlainObject } from './json-extract.js';

export const DEFAULT_CONFIDENCE_SCORE = 5.0;
export const DEFAULT_EFFORT_HOURS = 8;
export const DEFAULT_SUCCESS_SCORE = 5.0;

/** Issue identity the payload is about; the agent's own copy is not trusted */
export interface IssueIdentity {
  number: number;
  title: string;
}

// ============================================
// Enums
// ============================================

function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function decodeCategory(value: unknown): IssueCategory {
  if (typeof value !== 'string') return 'unknown';
  const token = normalizeToken(value);
  return ISSUE_CATEGORIES.find(category => category === token) ?? 'unknown';
}

/**
 * Accepts a level name, a 1–5 value, or a `{ level, value }` object
 */
export function decodeComplexity(value: unknown): ComplexityLevel {
  if (typeof value === 'string') {
    const token = normalizeToken(value);
    const name = COMPLEXITY_NAMES.find(candidate => candidate === token);
    return name ? COMPLEXITY_LEVELS[name] : COMPLEXITY_LEVELS.moderate;
  }
  if (typeof value === 'number') {
    const name = COMPLEXITY_NAMES[value - 1];
    return Number.isInteger(value) && name ? COMPLEXITY_LEVELS[name] : COMPLEXITY_LEVELS.moderate;
  }
  if (isPlainObject(value)) {
    return value.level !== undefined ? decodeComplexity(value.level) : decodeComplexity(value.value);
  }
  return COMPLEXITY_LEVELS.moderate;
}

export function decodeExecutionStatus(value: unknown): ExecutionStatus {
  if (typeof value !== 'string') return 'failed';
  const token = normalizeToken(value);
  return EXECUTION_STATUSES.find(status => status === token) ?? 'failed';
}

// ============================================
// Primitives
// ============================================

export function toFloat(value: unknown, fallback: number): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number.parseFloat(value) : NaN;
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function toInt(value: unknown, fallback: number): number {
  const parsed = toFloat(value, NaN);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
}

export function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
    .map(item => String(item).trim())
    .filter(item => item.length > 0);
}

function toText(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function toBoolean(value: unknown): boolean {
  return value === true || (typeof value === 'string' && value.trim().toLowerCase() === 'true');
}

// ============================================
// Analysis
// ============================================

/**
 * Strict path: the payload is already key/value data
 */
export function decodeAnalysisPayload(payload: Record<string, unknown>, issue: IssueIdentity): Analysis {
  return {
    issueNumber: issue.number,
    title: issue.title,
    category: decodeCategory(payload.category),
    complexity: decodeComplexity(payload.complexity),
    confidenceScore: normalizeScore(toFloat(payload.confidence_score, DEFAULT_CONFIDENCE_SCORE)),
    estimatedEffortHours: Math.max(0, toInt(payload.estimated_effort_hours, DEFAULT_EFFORT_HOURS)),
    keyFactors: toStringList(payload.key_factors),
    blockers: toStringList(payload.blockers),
    dependencies: toStringList(payload.dependencies),
    reasoning: toText(payload.reasoning, 'Analysis completed by the remote agent'),
  };
}

/**
 * Strict path first; free-form text goes through JSON extraction.
 * Returns null when nothing usable was found so the caller can fall back.
 */
export function decodeAnalysisResult(payload: unknown, issue: IssueIdentity): Analysis | null {
  if (isPlainObject(payload)) {
    return decodeAnalysisPayload(payload, issue);
  }
  if (typeof payload === 'string') {
    const embedded = extractJsonObject(payload);
    return embedded ? decodeAnalysisPayload(embedded, issue) : null;
  }
  return null;
}

export function toAnalysisRecord(analysis: Analysis): AnalysisRecord {
  return {
    issue_number: analysis.issueNumber,
    title: analysis.title,
    category: analysis.category,
    complexity: { level: analysis.complexity.level, value: analysis.complexity.value },
    confidence_score: analysis.confidenceScore,
    estimated_effort_hours: analysis.estimatedEffortHours,
    key_factors: [...analysis.keyFactors],
    blockers: [...analysis.blockers],
    dependencies: [...analysis.dependencies],
    reasoning: analysis.reasoning,
  };
}

/**
 * Decode a flat record (e.g. from `analysis_json`); the record's own number/title
 * are used when present
 */
export function fromAnalysisRecord(record: Record<string, unknown>, issue: IssueIdentity): Analysis {
  const number = toInt(record.issue_number, issue.number);
  const title = toText(record.title, issue.title);
  return decodeAnalysisPayload(record, { number, title });
}

// ============================================
// Resolution
// ============================================

export function decodeResolutionPayload(
  payload: Record<string, unknown>,
  issue: IssueIdentity,
  sessionUrl: string
): ResolutionResult {
  const prUrl = toText(payload.pr_url, '');
  return {
    issueNumber: issue.number,
    title: issue.title,
    executionStatus: decodeExecutionStatus(payload.execution_status),
    successScore: normalizeScore(toFloat(payload.success_score, DEFAULT_SUCCESS_SCORE)),
    actionPlan: toStringList(payload.action_plan),
    changesMade: toStringList(payload.changes_made),
    prCreated: toBoolean(payload.pr_created),
    prUrl: prUrl.length > 0 ? prUrl : undefined,
    blockersEncountered: toStringList(payload.blockers_encountered),
    sessionUrl,
    summary: toText(payload.summary, 'Resolution completed by the remote agent'),
  };
}

export function decodeResolutionResult(
  payload: unknown,
  issue: IssueIdentity,
  sessionUrl: string
): ResolutionResult | null {
  if (isPlainObject(payload)) {
    return decodeResolutionPayload(payload, issue, sessionUrl);
  }
  if (typeof payload === 'string') {
    const embedded = extractJsonObject(payload);
    return embedded ? decodeResolutionPayload(embedded, issue, sessionUrl) : null;
  }
  return null;
}

export function toResolutionRecord(result: ResolutionResult): ResolutionRecord {
  return {
    issue_number: result.issueNumber,
    title: result.title,
    execution_status: result.executionStatus,
    success_score: result.successScore,
    action_plan: [...result.actionPlan],
    changes_made: [...result.changesMade],
    pr_created: result.prCreated,
    pr_url: result.prUrl ?? null,
    blockers_encountered: [...result.blockersEncountered],
    session_url: result.sessionUrl,
    summary: result.summary,
  };
}
