/**
 * Resolution and issue list report tests
 */

import { formatIssueList, formatResolution } from '../resolution-report';
import { ResolutionResult } from '../../types';

const RESULT: ResolutionResult = {
  issueNumber: 42,
  title: 'Login fails',
  executionStatus: 'partial_success',
  successScore: 6.5,
  actionPlan: ['Reproduce', 'Patch'],
  changesMade: ['src/auth.ts'],
  prCreated: true,
  prUrl: 'https://github.com/acme/widgets/pull/8',
  blockersEncountered: [],
  sessionUrl: 'https://app.example.test/sessions/sess-1',
  summary: 'Patched.',
};

describe('resolution-report', () => {
  it('should format a resolution', () => {
    expect(formatResolution(RESULT)).toBe([
      '🟡 Issue #42: Login fails',
      '',
      '🎯 Resolution Results:',
      '   Status: Partial Success',
      '   Success Score: 6.5/10',
      '   PR Created: Yes',
      '   PR URL: https://github.com/acme/widgets/pull/8',
      '',
      '📋 Action Plan:',
      '   1. Reproduce',
      '   2. Patch',
      '',
      '✅ Changes Made:',
      '   • src/auth.ts',
      '',
      '⚠️  Blockers Encountered:',
      '   • None',
      '',
      '🔗 Session URL: https://app.example.test/sessions/sess-1',
      '',
      '📝 Summary:',
      '   Patched.',
    ].join('\n'));
  });

  it('should omit the PR url line and note empty sections', () => {
    const text = formatResolution({ ...RESULT, executionStatus: 'failed', prCreated: false, prUrl: undefined, actionPlan: [], changesMade: [] });

    expect(text).toContain('🔴 Issue #42');
    expect(text).toContain('   PR Created: No\n\n📋 Action Plan:\n   • No action plan provided');
    expect(text).toContain('   • No changes documented');
  });

  it('should list issues with labels and assignees', () => {
    const text = formatIssueList('acme/widgets', [{
      number: 3,
      title: 'Old bug',
      state: 'closed',
      author: 'someone',
      createdAt: '2023-12-24T08:00:00Z',
      labels: ['bug', 'wontfix'],
      assignees: ['a', 'b'],
    }]);

    expect(text).toBe(
      'Found 1 issue(s) in acme/widgets:\n\n🔴 #3: Old bug [bug, wontfix] (assigned to: a, b)\n   Author: someone | Created: 2023-12-24'
    );
  });
});
