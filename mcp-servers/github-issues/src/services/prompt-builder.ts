/**
 * Prompts sent to the remote agent
 * Pure functions of the issue and, for resolution, the prior analysis
 */

import { Analysis, IssueComment, IssueRecord, RepoRef } from '../types/index.js';

export const MAX_BODY_CHARS = 1000;
export const MAX_COMMENT_CHARS = 200;
export const MAX_PROMPT_COMMENTS = 5;

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.substring(0, maxChars)}...` : text;
}

/**
 * Up to five comments, newest first; ties keep the later-listed comment first
 */
export function recentComments(comments: readonly IssueComment[]): IssueComment[] {
  return comments
    .map((comment, index) => ({ comment, index }))
    .sort((a, b) => {
      if (a.comment.createdAt !== b.comment.createdAt) {
        return a.comment.createdAt < b.comment.createdAt ? 1 : -1;
      }
      return b.index - a.index;
    })
    .slice(0, MAX_PROMPT_COMMENTS)
    .map(entry => entry.comment);
}

function issueContext(issue: IssueRecord, ref: RepoRef): string {
  const labels = issue.labels.length > 0 ? issue.labels.join(', ') : 'None';
  const comments = recentComments(issue.comments);
  const commentsText = comments.length > 0
    ? '\n\nComments (most recent first):\n' +
      comments.map(c => `- ${c.author}: ${truncate(c.body, MAX_COMMENT_CHARS)}`).join('\n')
    : '';

  return `Issue #${issue.number} in ${ref.owner}/${ref.repo}: ${issue.title}

Labels: ${labels}

Description:
${truncate(issue.body ?? '', MAX_BODY_CHARS) || '(no description)'}${commentsText}`;
}

export function buildAnalysisPrompt(issue: IssueRecord, ref: RepoRef): string {
  return `Please analyze this GitHub issue and provide a structured assessment.

${issueContext(issue, ref)}

Please provide your analysis in the following JSON format:
{
    "category": "bug|feature|documentation|enhancement|question|maintenance|security|performance|unknown",
    "complexity": "trivial|simple|moderate|complex|very_complex",
    "confidence_score": <float between 1.0 and 10.0>,
    "estimated_effort_hours": <integer>,
    "key_factors": ["factor1", "factor2", ...],
    "blockers": ["blocker1", "blocker2", ...],
    "dependencies": ["dep1", "dep2", ...],
    "reasoning": "Detailed explanation of your analysis and confidence score"
}

Focus on:
1. Categorizing the issue type accurately
2. Assessing complexity based on technical requirements
3. Providing a realistic confidence score for successful resolution
4. Identifying key factors that affect implementation
5. Noting any blockers or dependencies
6. Explaining your reasoning clearly

Be thorough but concise in your analysis.`;
}

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : 'None';
}

export function buildResolutionPrompt(issue: IssueRecord, ref: RepoRef, analysis: Analysis): string {
  return `You are tasked with resolving this GitHub issue. A previous analysis has been completed; use it to guide your resolution approach.

${issueContext(issue, ref)}

Previous Analysis Results:
- Category: ${analysis.category}
- Complexity: ${analysis.complexity.level} (${analysis.complexity.value}/5)
- Confidence Score: ${analysis.confidenceScore}/10
- Estimated Effort: ${analysis.estimatedEffortHours} hours
- Key Factors: ${listOrNone(analysis.keyFactors)}
- Potential Blockers: ${listOrNone(analysis.blockers)}
- Dependencies: ${listOrNone(analysis.dependencies)}
- Analysis Reasoning: ${analysis.reasoning}

Please follow these steps:
1. REVIEW THE ANALYSIS: use it to understand the issue scope and approach
2. EXECUTE THE RESOLUTION: implement the necessary changes
3. ADDRESS KEY FACTORS: pay special attention to the identified key factors
4. HANDLE BLOCKERS: work around or resolve any identified blockers
5. MANAGE DEPENDENCIES: make sure dependencies are handled
6. CREATE PULL REQUEST: if code changes were made, open a PR with them
7. REPORT RESULTS: summarize what was accomplished

At the end of your session, provide a structured summary in this JSON format:
{
    "execution_status": "success|partial_success|failed|blocked",
    "success_score": <float between 1.0 and 10.0>,
    "action_plan": ["step1", "step2", ...],
    "changes_made": ["change1", "change2", ...],
    "pr_created": true|false,
    "pr_url": "https://github.com/${ref.owner}/${ref.repo}/pull/<number>" or null,
    "blockers_encountered": ["blocker1", ...],
    "summary": "What was accomplished and any remaining work"
}

Focus on execution rather than re-analysis, test your changes, and report clearly on success, failure and remaining blockers.`;
}
