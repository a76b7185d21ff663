#!/usr/bin/env node
/**
 * federated-query-mcp - MCP server
 *
 * Answers natural-language questions across the databases listed in
 * federation.config.json and an optional document corpus.
 *
 * Transport: stdio (stdout carries JSON-RPC; all logging goes to stderr).
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createFederation } from './bootstrap.js';
import { registerFederatedQueryTools } from './tools/federated-query-tool.js';
import { errorMessage } from './common/errors.js';
import { logError, logInfo } from './common/services/logger.js';

const SERVER_NAME = 'federated-query-mcp';
const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const federation = await createFederation();

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  registerFederatedQueryTools(server, federation);

  const shutdown = (signal: string) => {
    logInfo('Shutting down', { signal });
    federation
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} running on stdio`, { databases: federation.catalog.getAllSchemas().length });
}

main().catch((error: unknown) => {
  logError('Server failed to start', { error: errorMessage(error) });
  process.exit(1);
});
