#!/usr/bin/env node
/**
 * repo-workbench MCP server
 *
 * Exposes a JavaScript repository to an agent:
 * - outline or full-content payload of every source file
 * - single-file reads
 * - run-every-file diagnostics
 * - payload application, fix and edit requests through an external code editor
 * - document rendering through an external renderer
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { logger } from './shared/logger.js';
import { Workbench } from './workbench/workbench.js';

async function main(): Promise<void> {
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, root: config.repository.root, mode: config.execution.mode }, 'Configuration loaded');

  let workbench: Workbench | undefined;
  const server = createServer(() => {
    workbench ??= Workbench.fromConfig(config);
    return workbench;
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('repo-workbench MCP server running on stdio');
}

main().catch((err: unknown) => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
