#!/usr/bin/env node

import { createLogger, getErrorMessage, loadEnv } from '@issue-delegate/shared';
import { loadConfig } from './config.js';
import { GitHubIssuesMCPServer } from './server.js';

const logger = createLogger('GitHubIssues');

loadEnv(__dirname);

async function main(): Promise<void> {
  const server = GitHubIssuesMCPServer.fromConfig(loadConfig());
  await server.run();
}

main().catch(error => {
  logger.error('Failed to start server', getErrorMessage(error));
  process.exit(1);
});
