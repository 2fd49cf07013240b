/**
 * GitHubClient Unit Tests
 */

import { ApiError, ConfigurationError, NotFoundError } from '@issue-delegate/shared';
import { GitHubClient } from '../github-client';
import { createFakeHttp, requestBody } from './fake-http';

const CONFIG = { baseUrl: 'https://api.example.test', token: 'test-secret' };

const RAW_ISSUE = {
  number: 5,
  title: 'Crash on start',
  body: 'It crashes.',
  state: 'open',
  html_url: 'https://github.com/acme/widgets/issues/5',
  created_at: '2024-05-01T10:00:00Z',
  user: { login: 'reporter' },
  labels: [{ name: 'bug' }, 'p1', { name: '' }],
  assignees: [],
};

describe('GitHubClient', () => {
  describe('getIssue', () => {
    it('should fetch the issue and its comments', async () => {
      const { http, requests } = createFakeHttp(config => {
        if (config.url === '/repos/acme/widgets/issues/5') return { status: 200, data: RAW_ISSUE };
        return {
          status: 200,
          data: [
            { body: 'Same here', created_at: '2024-05-02T00:00:00Z', user: { login: 'dev' } },
            { body: null, created_at: '2024-05-03T00:00:00Z', user: null },
          ],
        };
      });
      const client = new GitHubClient(CONFIG, http);

      const issue = await client.getIssue('acme', 'widgets', 5);

      expect(issue).toEqual({
        number: 5,
        title: 'Crash on start',
        body: 'It crashes.',
        labels: ['bug', 'p1'],
        comments: [
          { author: 'dev', body: 'Same here', createdAt: '2024-05-02T00:00:00Z' },
          { author: 'unknown', body: '', createdAt: '2024-05-03T00:00:00Z' },
        ],
        url: 'https://github.com/acme/widgets/issues/5',
        state: 'open',
      });
      expect(requests[1].url).toBe('/repos/acme/widgets/issues/5/comments');
      expect(requests[1].params).toEqual({ per_page: 100, page: 1 });
    });

    it('should follow comment pages until a short page', async () => {
      const firstPage = Array.from({ length: 100 }, (_, i) => ({
        body: `Comment ${i + 1}`,
        created_at: '2024-05-02T00:00:00Z',
        user: { login: 'dev' },
      }));
      const secondPage = [
        { body: 'Comment 101', created_at: '2024-05-03T00:00:00Z', user: { login: 'dev' } },
        { body: 'Latest', created_at: '2024-05-04T00:00:00Z', user: { login: 'bot' } },
      ];
      const { http, requests } = createFakeHttp(config => {
        if (!config.url?.endsWith('/comments')) return { status: 200, data: RAW_ISSUE };
        return { status: 200, data: config.params.page === 1 ? firstPage : secondPage };
      });
      const client = new GitHubClient(CONFIG, http);

      const issue = await client.getIssue('acme', 'widgets', 5);

      expect(issue.comments).toHaveLength(102);
      expect(issue.comments[101]).toEqual({ author: 'bot', body: 'Latest', createdAt: '2024-05-04T00:00:00Z' });
      expect(requests).toHaveLength(3);
      expect(requests[2].params).toEqual({ per_page: 100, page: 2 });
    });

    it('should raise NotFoundError for a missing issue', async () => {
      const { http } = createFakeHttp(() => ({ status: 404, data: { message: 'Not Found' } }));
      const client = new GitHubClient(CONFIG, http);

      const error = await client.getIssue('acme', 'widgets', 999).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        statusCode: 404,
        message: 'Failed to get issue #999 from acme/widgets: Not Found',
      });
    });

    it('should surface comment fetch failures', async () => {
      const { http } = createFakeHttp(config =>
        config.url?.endsWith('/comments')
          ? { status: 502, data: { message: 'Bad Gateway' } }
          : { status: 200, data: RAW_ISSUE }
      );
      const client = new GitHubClient(CONFIG, http);

      await expect(client.getIssue('acme', 'widgets', 5)).rejects.toThrow(
        'Failed to get comments for issue #5: Bad Gateway'
      );
    });
  });

  describe('listIssues', () => {
    it('should skip pull requests and map summaries', async () => {
      const { http, requests } = createFakeHttp(() => ({
        status: 200,
        data: [
          { ...RAW_ISSUE, assignees: [{ login: 'owner' }] },
          { ...RAW_ISSUE, number: 6, pull_request: { url: 'x' } },
        ],
      }));
      const client = new GitHubClient(CONFIG, http);

      const issues = await client.listIssues('acme', 'widgets', { state: 'all', labels: 'bug', limit: 10 });

      expect(issues).toEqual([{
        number: 5,
        title: 'Crash on start',
        state: 'open',
        author: 'reporter',
        createdAt: '2024-05-01T10:00:00Z',
        labels: ['bug', 'p1'],
        assignees: ['owner'],
      }]);
      expect(requests[0].params).toEqual({
        state: 'all',
        per_page: 100,
        page: 1,
        sort: 'updated',
        direction: 'desc',
        labels: 'bug',
      });
    });

    it('should keep paging when pull requests leave fewer issues than the limit', async () => {
      const firstPage = Array.from({ length: 100 }, (_, i) =>
        i < 99 ? { ...RAW_ISSUE, number: i + 1, pull_request: { url: 'x' } } : { ...RAW_ISSUE, number: 1000 }
      );
      const secondPage = [2001, 2002, 2003].map(number => ({ ...RAW_ISSUE, number }));
      const { http, requests } = createFakeHttp(config => ({
        status: 200,
        data: config.params.page === 1 ? firstPage : secondPage,
      }));
      const client = new GitHubClient(CONFIG, http);

      const issues = await client.listIssues('acme', 'widgets', { limit: 3 });

      expect(issues.map(issue => issue.number)).toEqual([1000, 2001, 2002]);
      expect(requests).toHaveLength(2);
      expect(requests[1].params).toMatchObject({ per_page: 100, page: 2 });
    });

    it('should stop paging once the limit is reached', async () => {
      const fullPage = Array.from({ length: 100 }, (_, i) => ({ ...RAW_ISSUE, number: i + 1 }));
      const { http, requests } = createFakeHttp(() => ({ status: 200, data: fullPage }));
      const client = new GitHubClient(CONFIG, http);

      const issues = await client.listIssues('acme', 'widgets', { limit: 2 });

      expect(issues.map(issue => issue.number)).toEqual([1, 2]);
      expect(requests).toHaveLength(1);
    });

    it('should wrap transport errors', async () => {
      const { http } = createFakeHttp(() => ({ status: 500, data: {} }));
      const client = new GitHubClient(CONFIG, http);

      const error = await client.listIssues('acme', 'widgets').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ statusCode: 500 });
    });
  });

  describe('postComment', () => {
    it('should post the body and return the comment url', async () => {
      const { http, requests } = createFakeHttp(() => ({
        status: 201,
        data: { html_url: 'https://github.com/acme/widgets/issues/5#issuecomment-1' },
      }));
      const client = new GitHubClient(CONFIG, http);

      const url = await client.postComment('acme', 'widgets', 5, 'hello');

      expect(url).toBe('https://github.com/acme/widgets/issues/5#issuecomment-1');
      expect(requests[0].method).toBe('post');
      expect(requests[0].url).toBe('/repos/acme/widgets/issues/5/comments');
      expect(requestBody(requests[0])).toEqual({ body: 'hello' });
    });

    it('should refuse to post without a token, before any request', async () => {
      const { http, requests } = createFakeHttp(() => ({ status: 201, data: {} }));
      const client = new GitHubClient({ baseUrl: CONFIG.baseUrl }, http);

      expect(client.canPost()).toBe(false);
      await expect(client.postComment('acme', 'widgets', 5, 'hello')).rejects.toBeInstanceOf(ConfigurationError);
      expect(requests).toHaveLength(0);
    });
  });
});
