import axios, { AxiosInstance } from 'axios';
import { ConfigurationError, GitHubConfig, createApiError } from '@issue-delegate/shared';
import { ICommentPublisher, IIssueSource } from '../models/service-interfaces.js';
import { IssueComment, IssueRecord, IssueSummary, ListIssuesOptions } from '../types/index.js';

// Raw REST shapes, limited to the fields we read
interface GitHubUser {
  login: string;
}

type GitHubLabel = string | { name?: string };

interface GitHubIssue {
  number: number;
  title: string;
  body: string | null;
  state: string;
  html_url: string;
  created_at: string;
  user: GitHubUser | null;
  labels: GitHubLabel[];
  assignees?: GitHubUser[] | null;
  pull_request?: unknown;
}

interface GitHubComment {
  body?: string | null;
  created_at: string;
  user: GitHubUser | null;
}

interface GitHubCreatedComment {
  html_url: string;
}

const MAX_PAGE_SIZE = 100;
// Upper bound on pages followed for one listing
const MAX_PAGES = 50;

export class GitHubClient implements IIssueSource, ICommentPublisher {
  private client: AxiosInstance;
  private config: GitHubConfig;

  constructor(config: GitHubConfig, http?: AxiosInstance) {
    this.config = config;

    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'Content-Type': 'application/json',
      'User-Agent': 'issue-delegate-mcp',
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (config.token) {
      headers['Authorization'] = `Bearer ${config.token}`;
    }

    this.client = http ?? axios.create({
      baseURL: config.baseUrl,
      headers,
      timeout: 30000
    });
  }

  canPost(): boolean {
    return Boolean(this.config.token);
  }

  async getIssue(owner: string, repo: string, issueNumber: number): Promise<IssueRecord> {
    const path = `/repos/${owner}/${repo}/issues/${issueNumber}`;

    let issue: GitHubIssue;
    try {
      const response = await this.client.get<GitHubIssue>(path);
      issue = response.data;
    } catch (error) {
      throw createApiError(error, `Failed to get issue #${issueNumber} from ${owner}/${repo}`);
    }

    let comments: GitHubComment[];
    try {
      comments = await this.fetchPages<GitHubComment>(`${path}/comments`, {});
    } catch (error) {
      throw createApiError(error, `Failed to get comments for issue #${issueNumber}`);
    }

    return {
      number: issue.number,
      title: issue.title,
      body: issue.body ?? null,
      labels: labelNames(issue.labels),
      comments: comments.map(toIssueComment),
      url: issue.html_url,
      state: issue.state
    };
  }

  async listIssues(owner: string, repo: string, options: ListIssuesOptions = {}): Promise<IssueSummary[]> {
    const limit = options.limit ?? 30;
    const params: Record<string, string | number> = {
      state: options.state ?? 'open',
      sort: 'updated',
      direction: 'desc'
    };
    if (options.labels) params.labels = options.labels;
    if (options.assignee) params.assignee = options.assignee;

    try {
      // The issues endpoint also returns pull requests, so keep paging until enough issues remain
      const issues = await this.fetchPages<GitHubIssue>(
        `/repos/${owner}/${repo}/issues`,
        params,
        collected => collected.filter(issue => issue.pull_request === undefined).length >= limit
      );
      return issues
        .filter(issue => issue.pull_request === undefined)
        .slice(0, limit)
        .map(issue => ({
          number: issue.number,
          title: issue.title,
          state: issue.state,
          author: issue.user?.login ?? 'unknown',
          createdAt: issue.created_at,
          labels: labelNames(issue.labels),
          assignees: (issue.assignees ?? []).map(a => a.login)
        }));
    } catch (error) {
      throw createApiError(error, `Failed to list issues for ${owner}/${repo}`);
    }
  }

  /**
   * Follow `page` until a short page, the optional stop condition, or MAX_PAGES
   */
  private async fetchPages<T>(
    path: string,
    params: Record<string, string | number>,
    enough: (collected: T[]) => boolean = () => false
  ): Promise<T[]> {
    const collected: T[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      const response = await this.client.get<T[]>(path, {
        params: { ...params, per_page: MAX_PAGE_SIZE, page }
      });
      collected.push(...response.data);
      if (response.data.length < MAX_PAGE_SIZE || enough(collected)) break;
    }
    return collected;
  }

  async postComment(owner: string, repo: string, issueNumber: number, body: string): Promise<string> {
    if (!this.config.token) {
      throw new ConfigurationError('A GitHub token is required to post comments. Set GITHUB_TOKEN.');
    }

    try {
      const response = await this.client.post<GitHubCreatedComment>(
        `/repos/${owner}/${repo}/issues/${issueNumber}/comments`,
        { body }
      );
      return response.data.html_url;
    } catch (error) {
      throw createApiError(error, `Failed to post comment to issue #${issueNumber}`);
    }
  }
}

function labelNames(labels: GitHubLabel[]): string[] {
  return labels
    .map(label => (typeof label === 'string' ? label : label.name ?? ''))
    .filter(name => name.length > 0);
}

function toIssueComment(comment: GitHubComment): IssueComment {
  return {
    author: comment.user?.login ?? 'unknown',
    body: comment.body ?? '',
    createdAt: comment.created_at
  };
}
