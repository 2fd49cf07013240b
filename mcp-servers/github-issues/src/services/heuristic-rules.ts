/**
 * Rule tables for the heuristic classifier
 * Keyword lists come from data/heuristic-rules.json; numeric weights live here
 */

import rawRules from '../data/heuristic-rules.json';
import { ComplexityName, ISSUE_CATEGORIES, IssueCategory } from '../types/index.js';

export interface CategoryKeywords {
  readonly category: IssueCategory;
  readonly keywords: readonly string[];
}

export interface KeywordRule {
  readonly label: string;
  readonly keywords: readonly string[];
}

export interface HeuristicRules {
  readonly labelCategoryKeywords: readonly CategoryKeywords[];
  readonly textCategoryKeywords: readonly CategoryKeywords[];
  readonly complexityKeywords: readonly string[];
  readonly majorChangeLabelKeywords: readonly string[];
  readonly reproductionKeywords: readonly string[];
  readonly errorKeywords: readonly string[];
  readonly factorRules: readonly KeywordRule[];
  readonly blockerRules: readonly KeywordRule[];
  readonly dependencyRules: readonly KeywordRule[];
}

function isIssueCategory(value: string): value is IssueCategory {
  return ISSUE_CATEGORIES.some(category => category === value);
}

function toCategoryKeywords(entries: Array<{ category: string; keywords: string[] }>): CategoryKeywords[] {
  return entries.map(entry => {
    if (!isIssueCategory(entry.category)) {
      throw new Error(`heuristic-rules.json: unknown category "${entry.category}"`);
    }
    return Object.freeze({ category: entry.category, keywords: Object.freeze([...entry.keywords]) });
  });
}

function freezeRules(rules: KeywordRule[]): readonly KeywordRule[] {
  return Object.freeze(rules.map(rule => Object.freeze({ label: rule.label, keywords: Object.freeze([...rule.keywords]) })));
}

export const HEURISTIC_RULES: HeuristicRules = Object.freeze({
  labelCategoryKeywords: Object.freeze(toCategoryKeywords(rawRules.labelCategoryKeywords)),
  textCategoryKeywords: Object.freeze(toCategoryKeywords(rawRules.textCategoryKeywords)),
  complexityKeywords: Object.freeze([...rawRules.complexityKeywords]),
  majorChangeLabelKeywords: Object.freeze([...rawRules.majorChangeLabelKeywords]),
  reproductionKeywords: Object.freeze([...rawRules.reproductionKeywords]),
  errorKeywords: Object.freeze([...rawRules.errorKeywords]),
  factorRules: freezeRules(rawRules.factorRules),
  blockerRules: freezeRules(rawRules.blockerRules),
  dependencyRules: freezeRules(rawRules.dependencyRules),
});

// ============================================
// Weights
// ============================================

export const BASE_CONFIDENCE = 7.0;

export const CATEGORY_CONFIDENCE_ADJUSTMENTS: Readonly<Record<IssueCategory, number>> = {
  bug: 0.5,
  feature: -0.5,
  enhancement: 0,
  documentation: 1.5,
  question: 1.0,
  maintenance: 0,
  security: -1.5,
  performance: -0.5,
  unknown: -1.0,
};

export const COMPLEXITY_CONFIDENCE_ADJUSTMENTS: Readonly<Record<ComplexityName, number>> = {
  trivial: 2.0,
  simple: 1.0,
  moderate: 0,
  complex: -1.5,
  very_complex: -3.0,
};

/** Inclusive upper bounds of the complexity score per level; above the last is very_complex */
export const COMPLEXITY_SCORE_THRESHOLDS: ReadonlyArray<readonly [number, ComplexityName]> = [
  [1, 'trivial'],
  [2, 'simple'],
  [4, 'moderate'],
  [6, 'complex'],
];

export const BASE_EFFORT_HOURS: Readonly<Record<ComplexityName, number>> = {
  trivial: 1,
  simple: 3,
  moderate: 8,
  complex: 20,
  very_complex: 40,
};

export const LONG_BODY_CHARS = 1000;
export const DETAILED_BODY_CHARS = 200;
export const SHORT_BODY_CHARS = 50;
export const BUSY_THREAD_COMMENTS = 10;
export const ACTIVE_THREAD_COMMENTS = 5;
export const BLOCKER_SCAN_COMMENTS = 3;
export const MAX_ISSUE_REFERENCES = 3;
