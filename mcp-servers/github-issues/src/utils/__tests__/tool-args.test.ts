import { parseToolArgs } from '../tool-args';

describe('parseToolArgs', () => {
  it('should keep well-typed arguments', () => {
    expect(parseToolArgs({
      repo: ' acme/widgets ',
      issue_number: 42,
      state: 'closed',
      post_comment: true,
      format: 'json',
    })).toEqual({
      repo: 'acme/widgets',
      issue_number: 42,
      state: 'closed',
      labels: undefined,
      assignee: undefined,
      limit: undefined,
      post_comment: true,
      format: 'json',
      analysis_json: undefined,
    });
  });

  it('should coerce numeric and boolean strings', () => {
    const args = parseToolArgs({ issue_number: '7', limit: '10', post_comment: 'true' });
    expect(args.issue_number).toBe(7);
    expect(args.limit).toBe(10);
    expect(args.post_comment).toBe(true);
  });

  it('should drop values outside the allowed sets', () => {
    const args = parseToolArgs({ state: 'merged', format: 'yaml', issue_number: 'abc', post_comment: 'yes' });
    expect(args.state).toBeUndefined();
    expect(args.format).toBeUndefined();
    expect(args.issue_number).toBeUndefined();
    expect(args.post_comment).toBeUndefined();
  });

  it('should accept analysis_json as an object', () => {
    expect(parseToolArgs({ analysis_json: { category: 'bug' } }).analysis_json).toBe('{"category":"bug"}');
  });

  it('should return no arguments for non-object input', () => {
    expect(parseToolArgs(undefined)).toEqual({});
    expect(parseToolArgs(['repo'])).toEqual({});
  });
});
