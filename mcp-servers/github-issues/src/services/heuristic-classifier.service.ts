/**
 * Heuristic Classifier Service
 * Scores an issue from text signals alone, used when no agent is configured
 * or the agent's answer cannot be decoded. Pure: no I/O, never throws.
 */

import {
  Analysis,
  COMPLEXITY_LEVELS,
  ComplexityLevel,
  IssueCategory,
  IssueRecord,
} from '../types/index.js';
import {
  ACTIVE_THREAD_COMMENTS,
  BASE_CONFIDENCE,
  BASE_EFFORT_HOURS,
  BLOCKER_SCAN_COMMENTS,
  BUSY_THREAD_COMMENTS,
  CATEGORY_CONFIDENCE_ADJUSTMENTS,
  COMPLEXITY_CONFIDENCE_ADJUSTMENTS,
  COMPLEXITY_SCORE_THRESHOLDS,
  DETAILED_BODY_CHARS,
  HEURISTIC_RULES,
  HeuristicRules,
  KeywordRule,
  LONG_BODY_CHARS,
  MAX_ISSUE_REFERENCES,
  SHORT_BODY_CHARS,
} from './heuristic-rules.js';
import { normalizeScore } from '../utils/scores.js';

const ISSUE_REFERENCE = /#(\d+)/g;

export class HeuristicClassifierService {
  constructor(private rules: HeuristicRules = HEURISTIC_RULES) {}

  classify(issue: IssueRecord): Analysis {
    const body = issue.body ?? '';
    const text = `${issue.title} ${body}`.toLowerCase();
    const discussion = [body, ...issue.comments.slice(0, BLOCKER_SCAN_COMMENTS).map(c => c.body)].join('\n');
    const discussionLower = discussion.toLowerCase();

    const category = this.categorize(issue.labels, text);
    const complexity = this.complexityForScore(this.scoreComplexity(issue, text));
    const confidenceScore = this.scoreConfidence(category, complexity, body, issue.comments.length);
    const estimatedEffortHours = this.estimateEffort(category, complexity, issue.comments.length);

    const keyFactors = this.matchRules(this.rules.factorRules, text);
    const blockers = this.matchRules(this.rules.blockerRules, discussionLower);
    const dependencies = [
      ...this.matchRules(this.rules.dependencyRules, discussionLower),
      ...this.extractIssueReferences(discussion),
    ];

    return {
      issueNumber: issue.number,
      title: issue.title,
      category,
      complexity,
      confidenceScore,
      estimatedEffortHours,
      keyFactors,
      blockers,
      dependencies,
      reasoning: this.buildReasoning(category, complexity, confidenceScore, keyFactors, blockers),
    };
  }

  /**
   * Labels win over text; within each, the first category in table order wins
   */
  categorize(labels: readonly string[], text: string): IssueCategory {
    for (const label of labels) {
      const lower = label.toLowerCase();
      const match = this.rules.labelCategoryKeywords.find(entry =>
        entry.keywords.some(keyword => lower.includes(keyword))
      );
      if (match) return match.category;
    }

    const textMatch = this.rules.textCategoryKeywords.find(entry =>
      entry.keywords.some(keyword => text.includes(keyword))
    );
    return textMatch ? textMatch.category : 'unknown';
  }

  scoreComplexity(issue: IssueRecord, text: string): number {
    let score = 0;

    if ((issue.body ?? '').length > LONG_BODY_CHARS) score += 1;
    if (issue.comments.length > BUSY_THREAD_COMMENTS) score += 1;

    // each keyword counts once however often it appears
    score += this.rules.complexityKeywords.filter(keyword => text.includes(keyword)).length;

    for (const label of issue.labels) {
      const lower = label.toLowerCase();
      if (this.rules.majorChangeLabelKeywords.some(keyword => lower.includes(keyword))) {
        score += 2;
      }
    }

    return score;
  }

  complexityForScore(score: number): ComplexityLevel {
    for (const [maxScore, name] of COMPLEXITY_SCORE_THRESHOLDS) {
      if (score <= maxScore) return COMPLEXITY_LEVELS[name];
    }
    return COMPLEXITY_LEVELS.very_complex;
  }

  scoreConfidence(
    category: IssueCategory,
    complexity: ComplexityLevel,
    body: string,
    commentCount: number
  ): number {
    const lowerBody = body.toLowerCase();
    let score = BASE_CONFIDENCE;

    score += CATEGORY_CONFIDENCE_ADJUSTMENTS[category];
    score += COMPLEXITY_CONFIDENCE_ADJUSTMENTS[complexity.level];

    if (body.length > DETAILED_BODY_CHARS) score += 0.5;
    else if (body.length < SHORT_BODY_CHARS) score -= 1.0;

    if (commentCount > ACTIVE_THREAD_COMMENTS) score -= 0.3;
    if (this.rules.reproductionKeywords.some(keyword => lowerBody.includes(keyword))) score += 0.8;
    if (this.rules.errorKeywords.some(keyword => lowerBody.includes(keyword))) score += 0.5;

    return normalizeScore(score);
  }

  estimateEffort(category: IssueCategory, complexity: ComplexityLevel, commentCount: number): number {
    let hours = BASE_EFFORT_HOURS[complexity.level];

    if (category === 'documentation') {
      hours = Math.max(1, Math.floor(hours / 2));
    } else if (category === 'security') {
      hours = Math.trunc(hours * 1.5);
    } else if (category === 'feature') {
      hours = Math.trunc(hours * 1.2);
    }

    if (commentCount > BUSY_THREAD_COMMENTS) {
      hours = Math.trunc(hours * 1.3);
    }

    return hours;
  }

  private matchRules(rules: readonly KeywordRule[], text: string): string[] {
    return rules
      .filter(rule => rule.keywords.some(keyword => text.includes(keyword)))
      .map(rule => rule.label);
  }

  private extractIssueReferences(text: string): string[] {
    return Array.from(text.matchAll(ISSUE_REFERENCE))
      .slice(0, MAX_ISSUE_REFERENCES)
      .map(match => `Issue #${match[1]}`);
  }

  private buildReasoning(
    category: IssueCategory,
    complexity: ComplexityLevel,
    confidenceScore: number,
    keyFactors: string[],
    blockers: string[]
  ): string {
    const parts = [
      `Heuristic analysis classifies this issue as ${category} with ${complexity.level.replace('_', ' ')} complexity.`,
    ];

    if (confidenceScore >= 8) {
      parts.push('High confidence in successful resolution.');
    } else if (confidenceScore >= 6) {
      parts.push('Moderate confidence in successful resolution.');
    } else {
      parts.push('Low confidence in successful resolution; manual review recommended.');
    }

    if (keyFactors.length > 0) parts.push(`Key factors: ${keyFactors.join(', ')}.`);
    if (blockers.length > 0) parts.push(`Potential blockers: ${blockers.join(', ')}.`);

    return parts.join(' ');
  }
}
