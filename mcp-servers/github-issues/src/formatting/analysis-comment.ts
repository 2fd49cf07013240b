/**
 * Analysis comment template and its inverse.
 *
 * renderAnalysis() produces the human-readable block that is posted to the issue;
 * decodeAnalysisComment() reads it back. The anchors below are shared by both,
 * so any template change has to keep the contract tests in
 * __tests__/analysis-comment.test.ts passing.
 */

import { Analysis, COMPLEXITY_NAMES, IssueComment } from '../types/index.js';
import {
  DEFAULT_CONFIDENCE_SCORE,
  DEFAULT_EFFORT_HOURS,
  IssueIdentity,
  decodeCategory,
  decodeComplexity,
  toFloat,
  toInt,
} from '../decoding/payload-decoder.js';
import { normalizeScore } from '../utils/scores.js';

export const ANALYSIS_COMMENT_MARKER = '🤖 Agent Analysis Results';

const RESULTS_HEADING = '📊 Analysis Results:';
const FACTORS_HEADING = '🔍 Key Factors:';
const BLOCKERS_HEADING = '⚠️  Potential Blockers:';
const DEPENDENCIES_HEADING = '🔗 Dependencies:';
const REASONING_HEADING = '💭 Reasoning:';
const EMPTY_SENTINEL = 'None identified';
const BULLET = '•';
const INDENT = '   ';

const COMMENT_FOOTER = '*This analysis was generated automatically by the issue-delegate MCP server.*';

const RULE = '---';

// Applied line by line: the header above the results heading, the values below it
const PATTERNS = {
  header: /Issue #(\d+):[ \t]*(.*)$/,
  category: /^\s*Category:[ \t]*(.+)$/,
  complexity: /^\s*Complexity:[ \t]*(\w+)[ \t]*\((\d)\/5\)/,
  confidence: /^\s*Confidence Score:[ \t]*([\d.]+)\/10/,
  effort: /^\s*Estimated Effort:[ \t]*(\d+)[ \t]*hours?/,
};

const SECTION_HEADINGS = [FACTORS_HEADING, BLOCKERS_HEADING, DEPENDENCIES_HEADING, REASONING_HEADING] as const;

type SectionHeading = (typeof SECTION_HEADINGS)[number];

// ============================================
// Rendering
// ============================================

function titleCase(value: string): string {
  return value
    .split('_')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('_');
}

function bulletList(items: readonly string[]): string[] {
  const cleaned = items.map(item => item.replace(/\s+/g, ' ').trim()).filter(item => item.length > 0);
  if (cleaned.length === 0) return [`${INDENT}${BULLET} ${EMPTY_SENTINEL}`];
  return cleaned.map(item => `${INDENT}${BULLET} ${item}`);
}

function confidenceMarker(score: number): string {
  if (score >= 7) return '🟢';
  if (score >= 5) return '🟡';
  return '🔴';
}

export function renderAnalysis(analysis: Analysis): string {
  const reasoning = analysis.reasoning
    .split('\n')
    .map(line => `${INDENT}${line.trim()}`)
    .join('\n');

  return [
    `${confidenceMarker(analysis.confidenceScore)} Issue #${analysis.issueNumber}: ${analysis.title}`,
    '',
    RESULTS_HEADING,
    `${INDENT}Category: ${titleCase(analysis.category)}`,
    `${INDENT}Complexity: ${titleCase(analysis.complexity.level)} (${analysis.complexity.value}/5)`,
    `${INDENT}Confidence Score: ${analysis.confidenceScore.toFixed(1)}/10`,
    `${INDENT}Estimated Effort: ${analysis.estimatedEffortHours} hours`,
    '',
    FACTORS_HEADING,
    ...bulletList(analysis.keyFactors),
    '',
    BLOCKERS_HEADING,
    ...bulletList(analysis.blockers),
    '',
    DEPENDENCIES_HEADING,
    ...bulletList(analysis.dependencies),
    '',
    REASONING_HEADING,
    reasoning,
  ].join('\n');
}

/**
 * Full markdown body posted to the issue
 */
export function buildAnalysisComment(analysis: Analysis): string {
  return `## ${ANALYSIS_COMMENT_MARKER}\n\n${renderAnalysis(analysis)}\n\n${RULE}\n${COMMENT_FOOTER}`;
}

// ============================================
// Decoding
// ============================================

// Heading lines are never indented; rendered items and reasoning always are
function isHeadingLine(line: string, heading: string): boolean {
  return line.trimEnd() === heading;
}

/**
 * Split the lines after the results heading into the values block and one slice per section
 */
function splitSections(lines: readonly string[]): { values: string[]; sections: Map<SectionHeading, string[]> } {
  const found: Array<{ heading: SectionHeading; index: number }> = [];
  let cursor = 0;
  for (const heading of SECTION_HEADINGS) {
    const index = lines.findIndex((line, i) => i >= cursor && isHeadingLine(line, heading));
    if (index !== -1) {
      found.push({ heading, index });
      cursor = index + 1;
    }
  }

  const sections = new Map<SectionHeading, string[]>();
  found.forEach((entry, i) => {
    const end = i + 1 < found.length ? found[i + 1].index : lines.length;
    sections.set(entry.heading, lines.slice(entry.index + 1, end));
  });

  const valuesEnd = found.length > 0 ? found[0].index : lines.length;
  return { values: lines.slice(0, valuesEnd), sections };
}

function matchLine(lines: readonly string[], pattern: RegExp): RegExpMatchArray | null {
  for (const line of lines) {
    const match = line.match(pattern);
    if (match) return match;
  }
  return null;
}

function parseBullets(section: readonly string[] | undefined): string[] {
  if (section === undefined) return [];
  return section
    .map(line => line.trimStart())
    .filter(line => line.startsWith(BULLET))
    .map(line => line.slice(BULLET.length).trim())
    .filter(item => item.length > 0 && item !== EMPTY_SENTINEL);
}

/** Reasoning runs until the unindented rule above the footer, or the end of the text */
function parseReasoning(section: readonly string[] | undefined): string {
  if (section === undefined) return '';
  const rule = section.findIndex(line => line.trimEnd() === RULE);
  const lines = rule === -1 ? section : section.slice(0, rule);
  return lines.map(line => line.trim()).join('\n').trim();
}

function decodeComplexityAnchor(match: RegExpMatchArray | null): Analysis['complexity'] {
  if (!match) return decodeComplexity(undefined);
  const name = match[1].toLowerCase();
  if (COMPLEXITY_NAMES.some(candidate => candidate === name)) {
    return decodeComplexity(name);
  }
  return decodeComplexity(Number(match[2]));
}

/**
 * Recover an Analysis from a rendered analysis (or a full comment body).
 * Returns null when the text does not contain the results block.
 *
 * @param issue - identity to use instead of the rendered `Issue #n: title` header
 */
export function decodeAnalysisComment(body: string, issue?: IssueIdentity): Analysis | null {
  const lines = body.split(/\r?\n/);
  const start = lines.findIndex(line => isHeadingLine(line.trimStart(), RESULTS_HEADING));
  if (start === -1) return null;

  const header = matchLine(lines.slice(0, start).reverse(), PATTERNS.header);
  const { values, sections } = splitSections(lines.slice(start + 1));
  const category = matchLine(values, PATTERNS.category);
  const confidence = matchLine(values, PATTERNS.confidence);
  const effort = matchLine(values, PATTERNS.effort);

  return {
    issueNumber: issue?.number ?? (header ? Number(header[1]) : 0),
    title: issue?.title ?? (header ? header[2].trim() : ''),
    category: decodeCategory(category ? category[1] : undefined),
    complexity: decodeComplexityAnchor(matchLine(values, PATTERNS.complexity)),
    confidenceScore: normalizeScore(toFloat(confidence ? confidence[1] : undefined, DEFAULT_CONFIDENCE_SCORE)),
    estimatedEffortHours: toInt(effort ? effort[1] : undefined, DEFAULT_EFFORT_HOURS),
    keyFactors: parseBullets(sections.get(FACTORS_HEADING)),
    blockers: parseBullets(sections.get(BLOCKERS_HEADING)),
    dependencies: parseBullets(sections.get(DEPENDENCIES_HEADING)),
    reasoning: parseReasoning(sections.get(REASONING_HEADING)),
  };
}

/**
 * Most recent posted analysis among an issue's comments
 */
export function findLatestAnalysis(comments: readonly IssueComment[], issue: IssueIdentity): Analysis | null {
  for (let i = comments.length - 1; i >= 0; i--) {
    const comment = comments[i];
    if (comment.body.includes(ANALYSIS_COMMENT_MARKER)) {
      const analysis = decodeAnalysisComment(comment.body, issue);
      if (analysis) return analysis;
    }
  }
  return null;
}
