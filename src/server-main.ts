#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { readGitIdentity } from './config/identity.js';
import { loadConfig } from './config/loader.js';
import { createServer } from './server.js';
import { describeError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { openRepository } from './vcs/git.js';

async function main(): Promise<void> {
  const cwd = process.cwd();
  const { config, sources } = loadConfig({ explicitPath: process.env.PATCH_EXPORT_CONFIG, cwd });
  logger.info({ sources }, 'Starting patch-export MCP server');

  const server = createServer({
    config,
    cwd,
    openRepository: (location) => openRepository(location, cwd),
    gitIdentity: readGitIdentity,
  });
  await server.connect(new StdioServerTransport());
}

main().catch((err: unknown) => {
  logger.fatal({ error: describeError(err) }, 'MCP server failed to start');
  process.exit(1);
});
