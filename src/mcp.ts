#!/usr/bin/env node
/**
 * mcp.ts — MCP server entry point using StdioServerTransport.
 *
 * Configuration comes from MASTODON_* environment variables (see config.ts),
 * optionally loaded from a .env file:
 *   MASTODON_CLIENT_ID=./clientcred.secret MASTODON_ACCESS_TOKEN=./usercred.secret npm run dev
 *
 * Logs go to stderr; stdout carries the MCP protocol.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { MastodonClient } from './client/MastodonClient.js';
import { loadConfig } from './config.js';
import { consoleLogger, describeError } from './logger.js';
import { createTools } from './tools/tools.js';

async function main() {
  const client = new MastodonClient(loadConfig());
  if (!client.accessToken) {
    consoleLogger.warn('MASTODON_ACCESS_TOKEN is not set; only public endpoints will work');
  }

  const server = createTools(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  process.on('SIGINT', () => {
    server
      .close()
      .catch((error: unknown) => consoleLogger.warn('MCP server close failed', describeError(error)))
      .finally(() => process.exit(0));
  });
}

main().catch((error: unknown) => {
  consoleLogger.warn('MCP server failed to start', describeError(error));
  process.exit(1);
});
