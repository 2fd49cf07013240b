/**
 * Service interfaces for the issue scoping and resolution services
 * Concrete clients live in ../clients; tests substitute jest fakes
 */

import { IssueRecord, IssueSummary, ListIssuesOptions, SessionStatus } from '../types/index.js';

export interface IIssueSource {
  /**
   * Fetch an issue with its comments
   * Throws NotFoundError for a missing issue and ApiError on transport failure
   */
  getIssue(owner: string, repo: string, issueNumber: number): Promise<IssueRecord>;

  listIssues(owner: string, repo: string, options?: ListIssuesOptions): Promise<IssueSummary[]>;
}

export interface ICommentPublisher {
  /** Whether a write-capable credential is configured */
  canPost(): boolean;

  /**
   * Post a markdown comment; requires a write-capable token
   * @returns the URL of the created comment
   */
  postComment(owner: string, repo: string, issueNumber: number, body: string): Promise<string>;
}

export interface IAgentSessionApi {
  /** Create a session for the prompt and return its id */
  createSession(prompt: string): Promise<string>;

  getSession(sessionId: string): Promise<SessionStatus>;

  /** Link to the session in the agent's web app */
  sessionUrl(sessionId: string): string;
}
