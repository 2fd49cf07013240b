/**
 * GitHub Issues MCP Server
 * Issue listing, agent-backed scoping with a heuristic fallback, and delegated resolution
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema, Tool } from '@modelcontextprotocol/sdk/types.js';
import { MCPResponse, MethodNotFoundError, createLogger, toMcpError } from '@issue-delegate/shared';

import { ServerConfig } from './config.js';
import { GitHubClient } from './clients/github-client.js';
import { AgentSessionClient } from './clients/agent-session-client.js';
import { AgentSessionOrchestrator } from './services/agent-session-orchestrator.js';
import { HeuristicClassifierService } from './services/heuristic-classifier.service.js';
import { IssueAnalyzerService } from './services/issue-analyzer.service.js';
import { IssueResolverService } from './services/issue-resolver.service.js';
import { IssueHandler } from './handlers/issue-handler.js';
import { parseToolArgs } from './utils/tool-args.js';

const logger = createLogger('GitHubIssues');

const REPO_PROPERTY = { type: 'string', description: 'Repository as owner/name (e.g. octocat/hello-world)' };
const ISSUE_NUMBER_PROPERTY = { type: 'number', description: 'Issue number' };
const FORMAT_PROPERTY = {
  type: 'string',
  description: 'text (human-readable) or json (flat record)',
  enum: ['text', 'json'],
  default: 'text',
};

export const TOOLS: Tool[] = [
  {
    name: 'list_issues',
    description: 'List issues in a repository (pull requests are excluded), most recently updated first.',
    inputSchema: {
      type: 'object',
      properties: {
        repo: REPO_PROPERTY,
        state: { type: 'string', description: 'Issue state', enum: ['open', 'closed', 'all'], default: 'open' },
        labels: { type: 'string', description: 'Comma-separated label filter' },
        assignee: { type: 'string', description: 'Assignee username filter' },
        limit: { type: 'number', description: 'Maximum number of issues (1-100)', default: 30 },
        format: FORMAT_PROPERTY,
      },
      required: ['repo'],
    },
  },
  {
    name: 'analyze_issue',
    description: 'Scope an issue: category, complexity, confidence score, effort, key factors, blockers and dependencies. Uses the remote agent when AGENT_API_TOKEN is set, otherwise a heuristic classifier.',
    inputSchema: {
      type: 'object',
      properties: {
        repo: REPO_PROPERTY,
        issue_number: ISSUE_NUMBER_PROPERTY,
        post_comment: { type: 'boolean', description: 'Post the analysis as an issue comment (needs GITHUB_TOKEN)', default: false },
        format: FORMAT_PROPERTY,
      },
      required: ['repo', 'issue_number'],
    },
  },
  {
    name: 'get_issue_analysis',
    description: 'Read back the most recent analysis previously posted to an issue.',
    inputSchema: {
      type: 'object',
      properties: {
        repo: REPO_PROPERTY,
        issue_number: ISSUE_NUMBER_PROPERTY,
        format: FORMAT_PROPERTY,
      },
      required: ['repo', 'issue_number'],
    },
  },
  {
    name: 'resolve_issue',
    description: 'Delegate resolution of an issue to the remote agent, guided by a prior analysis (analysis_json, or the latest analysis comment). Waits up to RESOLUTION_MAX_WAIT_SECONDS.',
    inputSchema: {
      type: 'object',
      properties: {
        repo: REPO_PROPERTY,
        issue_number: ISSUE_NUMBER_PROPERTY,
        analysis_json: { type: 'string', description: 'Prior analysis as the JSON record returned by analyze_issue with format=json' },
        format: FORMAT_PROPERTY,
      },
      required: ['repo', 'issue_number'],
    },
  },
];

export class GitHubIssuesMCPServer {
  private server: Server;

  constructor(private handler: IssueHandler) {
    this.server = new Server(
      {
        name: 'github-issues-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.setupHandlers();
  }

  static fromConfig(config: ServerConfig): GitHubIssuesMCPServer {
    const github = new GitHubClient(config.github);
    const orchestrator = config.agent.apiToken
      ? new AgentSessionOrchestrator(new AgentSessionClient(config.agent))
      : null;

    logger.info(
      `GitHub token: ${github.canPost() ? 'set' : 'not set'}, agent token: ${orchestrator ? 'set' : 'not set (heuristic analysis only)'}`
    );

    const analyzer = new IssueAnalyzerService(
      github,
      new HeuristicClassifierService(),
      orchestrator,
      github,
      config.analysisBudget
    );
    const resolver = new IssueResolverService(github, orchestrator, config.resolutionBudget);

    return new GitHubIssuesMCPServer(new IssueHandler(github, analyzer, resolver));
  }

  /**
   * Dispatch one tools/call; exposed for tests
   */
  async callTool(name: string, rawArgs: unknown): Promise<MCPResponse> {
    const args = parseToolArgs(rawArgs);

    switch (name) {
      case 'list_issues':
        return await this.handler.listIssues(args);
      case 'analyze_issue':
        return await this.handler.analyzeIssue(args);
      case 'get_issue_analysis':
        return await this.handler.getIssueAnalysis(args);
      case 'resolve_issue':
        return await this.handler.resolveIssue(args);
      default:
        throw new MethodNotFoundError(name).toMcpError();
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      try {
        return await this.callTool(name, args);
      } catch (error) {
        throw toMcpError(error, `call tool ${name}`);
      }
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('GitHub Issues MCP server running on stdio');
  }
}
