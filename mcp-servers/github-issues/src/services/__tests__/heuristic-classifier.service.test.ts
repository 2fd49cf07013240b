/**
 * HeuristicClassifierService Unit Tests
 */

import { HeuristicClassifierService } from '../heuristic-classifier.service';
import { COMPLEXITY_LEVELS, IssueComment, IssueRecord } from '../../types';

function makeIssue(overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    number: 1,
    title: 'Sample',
    body: '',
    labels: [],
    comments: [],
    ...overrides,
  };
}

function makeComments(count: number, body = 'ok'): IssueComment[] {
  return Array.from({ length: count }, (_, i) => ({
    author: `user${i}`,
    body,
    createdAt: `2024-01-${String(i + 1).padStart(2, '0')}T00:00:00Z`,
  }));
}

describe('HeuristicClassifierService', () => {
  const classifier = new HeuristicClassifierService();

  describe('classify', () => {
    it('should score a bare bug report at 8.5', () => {
      const analysis = classifier.classify(makeIssue({ labels: ['bug'] }));

      expect(analysis.category).toBe('bug');
      expect(analysis.complexity).toEqual({ level: 'trivial', value: 1 });
      expect(analysis.confidenceScore).toBe(8.5);
      expect(analysis.estimatedEffortHours).toBe(1);
      expect(analysis.keyFactors).toEqual([]);
      expect(analysis.blockers).toEqual([]);
      expect(analysis.dependencies).toEqual([]);
      expect(analysis.reasoning).toBe(
        'Heuristic analysis classifies this issue as bug with trivial complexity. High confidence in successful resolution.'
      );
    });

    it('should treat a null body like an empty one', () => {
      const analysis = classifier.classify(makeIssue({ labels: ['bug'], body: null }));
      expect(analysis.confidenceScore).toBe(8.5);
    });

    it('should rate a large breaking change as complex', () => {
      const analysis = classifier.classify(makeIssue({
        title: 'Rework storage layer',
        body: 'We need to change the architecture and the database layer. ' + 'x'.repeat(1000),
        labels: ['breaking-change'],
        comments: makeComments(11),
      }));

      expect(analysis.category).toBe('unknown');
      expect(analysis.complexity).toEqual({ level: 'complex', value: 4 });
      expect(analysis.confidenceScore).toBe(4.7);
      expect(analysis.estimatedEffortHours).toBe(26);
      expect(analysis.keyFactors).toEqual(['Database changes involved']);
    });

    it('should rate it very complex once another keyword pushes the score past 6', () => {
      const analysis = classifier.classify(makeIssue({
        title: 'Rework storage layer',
        body: 'We need to change the architecture and the database layer, plus a migration. ' + 'x'.repeat(1000),
        labels: ['breaking-change'],
        comments: makeComments(11),
      }));

      expect(analysis.complexity).toEqual({ level: 'very_complex', value: 5 });
      expect(analysis.confidenceScore).toBe(3.2);
      expect(analysis.estimatedEffortHours).toBe(52);
      expect(analysis.reasoning).toBe(
        'Heuristic analysis classifies this issue as unknown with very complex complexity. ' +
          'Low confidence in successful resolution; manual review recommended. ' +
          'Key factors: Database changes involved.'
      );
    });

    it('should list key factors in the reasoning', () => {
      const analysis = classifier.classify(makeIssue({ title: 'Add config option', labels: ['feature'] }));

      expect(analysis.category).toBe('feature');
      expect(analysis.confidenceScore).toBe(7.5);
      expect(analysis.estimatedEffortHours).toBe(1);
      expect(analysis.keyFactors).toEqual(['Configuration changes']);
      expect(analysis.reasoning).toBe(
        'Heuristic analysis classifies this issue as feature with trivial complexity. ' +
          'Moderate confidence in successful resolution. Key factors: Configuration changes.'
      );
    });

    it('should scan body and first comments for blockers, dependencies and issue references', () => {
      const analysis = classifier.classify(makeIssue({
        title: 'Deploy pipeline',
        body: 'Blocked by #12 and #15. Uses docker and postgres.',
        comments: [
          { author: 'a', body: 'Waiting on #20 and #21', createdAt: '2024-01-01T00:00:00Z' },
        ],
      }));

      expect(analysis.blockers).toEqual(['Blocked by other work', 'Waiting on external input']);
      expect(analysis.dependencies).toEqual(['Docker', 'Database', 'Issue #12', 'Issue #15', 'Issue #20']);
    });

    it('should ignore comments after the first three when scanning for blockers', () => {
      const comments = [...makeComments(3), { author: 'late', body: 'blocked by infra', createdAt: '2024-02-01T00:00:00Z' }];
      const analysis = classifier.classify(makeIssue({ comments }));
      expect(analysis.blockers).toEqual([]);
    });

    it('should be idempotent', () => {
      const issue = makeIssue({
        title: 'Crash on save',
        body: 'Steps to reproduce: click save. Exception thrown.',
        labels: ['needs-triage'],
        comments: makeComments(2),
      });
      expect(classifier.classify(issue)).toEqual(classifier.classify(issue));
    });

    it('should keep the issue identity', () => {
      const analysis = classifier.classify(makeIssue({ number: 77, title: 'Typo in readme' }));
      expect(analysis.issueNumber).toBe(77);
      expect(analysis.title).toBe('Typo in readme');
      expect(analysis.category).toBe('documentation');
    });
  });

  describe('categorize', () => {
    it('should let the first matching label win', () => {
      expect(classifier.categorize(['question', 'bug'], '')).toBe('question');
    });

    it('should match labels by substring, case-insensitively', () => {
      expect(classifier.categorize(['Type: Performance'], '')).toBe('performance');
      expect(classifier.categorize(['kind/Defect'], '')).toBe('bug');
    });

    it('should prefer labels over text', () => {
      expect(classifier.categorize(['docs'], 'the app crashes')).toBe('documentation');
    });

    it('should use the text table order when no label matches', () => {
      expect(classifier.categorize(['triage'], 'app crashes, docs are wrong')).toBe('bug');
      expect(classifier.categorize([], 'is it possible to export csv')).toBe('question');
    });

    it('should return unknown when nothing matches', () => {
      expect(classifier.categorize([], 'hello there')).toBe('unknown');
    });
  });

  describe('complexityForScore', () => {
    it.each([
      [0, 'trivial'],
      [1, 'trivial'],
      [2, 'simple'],
      [3, 'moderate'],
      [4, 'moderate'],
      [5, 'complex'],
      [6, 'complex'],
      [7, 'very_complex'],
      [12, 'very_complex'],
    ] as const)('should map score %i to %s', (score, level) => {
      expect(classifier.complexityForScore(score)).toEqual(COMPLEXITY_LEVELS[level]);
    });
  });

  describe('scoreComplexity', () => {
    it('should count each keyword once and each major-change label twice', () => {
      const issue = makeIssue({ labels: ['epic', 'Refactor'] });
      const text = 'database database integration';
      expect(classifier.scoreComplexity(issue, text)).toBe(6);
    });
  });

  describe('scoreConfidence', () => {
    it('should clamp to 10', () => {
      const body = 'Steps to reproduce: run it. Error shown. ' + 'y'.repeat(200);
      expect(classifier.scoreConfidence('documentation', COMPLEXITY_LEVELS.trivial, body, 0)).toBe(10);
    });

    it('should apply every penalty', () => {
      expect(classifier.scoreConfidence('security', COMPLEXITY_LEVELS.very_complex, '', 6)).toBe(1.2);
    });

    it('should add reproduction and error bonuses', () => {
      const body = 'To reproduce, open the editor. A traceback is printed.';
      // 7.0 + 0.5 (bug) + 0 (moderate) + 0.8 + 0.5; body is between 50 and 200 chars
      expect(classifier.scoreConfidence('bug', COMPLEXITY_LEVELS.moderate, body, 0)).toBe(8.8);
    });
  });

  describe('estimateEffort', () => {
    it('should halve documentation effort with a floor of one hour', () => {
      expect(classifier.estimateEffort('documentation', COMPLEXITY_LEVELS.trivial, 0)).toBe(1);
      expect(classifier.estimateEffort('documentation', COMPLEXITY_LEVELS.complex, 0)).toBe(10);
    });

    it('should scale security and feature work', () => {
      expect(classifier.estimateEffort('security', COMPLEXITY_LEVELS.moderate, 0)).toBe(12);
      expect(classifier.estimateEffort('feature', COMPLEXITY_LEVELS.simple, 0)).toBe(3);
    });

    it('should add 30% for busy threads, truncating each step', () => {
      expect(classifier.estimateEffort('feature', COMPLEXITY_LEVELS.complex, 11)).toBe(31);
    });
  });
});
