/**
 * Plain-text reports for resolve_issue and list_issues
 */

import { ExecutionStatus, IssueSummary, ResolutionResult } from '../types/index.js';

const STATUS_MARKERS: Record<ExecutionStatus, string> = {
  success: '🟢',
  partial_success: '🟡',
  failed: '🔴',
  blocked: '⚠️',
  in_progress: '🔄',
};

const INDENT = '   ';

function humanize(value: string): string {
  return value
    .split('_')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

function bullets(items: readonly string[], empty: string): string[] {
  if (items.length === 0) return [`${INDENT}• ${empty}`];
  return items.map(item => `${INDENT}• ${item}`);
}

export function formatResolution(result: ResolutionResult): string {
  const actionPlan = result.actionPlan.length > 0
    ? result.actionPlan.map((step, i) => `${INDENT}${i + 1}. ${step}`)
    : [`${INDENT}• No action plan provided`];

  const lines = [
    `${STATUS_MARKERS[result.executionStatus]} Issue #${result.issueNumber}: ${result.title}`,
    '',
    '🎯 Resolution Results:',
    `${INDENT}Status: ${humanize(result.executionStatus)}`,
    `${INDENT}Success Score: ${result.successScore.toFixed(1)}/10`,
    `${INDENT}PR Created: ${result.prCreated ? 'Yes' : 'No'}`,
  ];
  if (result.prUrl) {
    lines.push(`${INDENT}PR URL: ${result.prUrl}`);
  }

  lines.push(
    '',
    '📋 Action Plan:',
    ...actionPlan,
    '',
    '✅ Changes Made:',
    ...bullets(result.changesMade, 'No changes documented'),
    '',
    '⚠️  Blockers Encountered:',
    ...bullets(result.blockersEncountered, 'None'),
    '',
    `🔗 Session URL: ${result.sessionUrl}`,
    '',
    '📝 Summary:',
    `${INDENT}${result.summary}`
  );

  return lines.join('\n');
}

export function formatIssueSummary(issue: IssueSummary): string {
  const marker = issue.state === 'open' ? '🟢' : '🔴';
  const labels = issue.labels.length > 0 ? ` [${issue.labels.join(', ')}]` : '';
  const assignees = issue.assignees.length > 0 ? ` (assigned to: ${issue.assignees.join(', ')})` : '';

  return `${marker} #${issue.number}: ${issue.title}${labels}${assignees}
${INDENT}Author: ${issue.author} | Created: ${issue.createdAt.substring(0, 10)}`;
}

export function formatIssueList(repo: string, issues: readonly IssueSummary[]): string {
  if (issues.length === 0) {
    return `No issues found in ${repo}`;
  }
  return `Found ${issues.length} issue(s) in ${repo}:\n\n${issues.map(formatIssueSummary).join('\n\n')}`;
}
