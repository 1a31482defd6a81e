#!/usr/bin/env tsx
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createTradeMcpServer } from '../src/agents/tradeMcpServer.js';
import { loadConfig } from '../src/config/load.js';
import { JsonLogger } from '../src/core/logger.js';
import { createTradingEngine } from '../src/index.js';

async function main() {
  const config = loadConfig();
  // stdout carries the MCP protocol, so logs go to stderr.
  const logger = new JsonLogger(config.logLevel, { service: 'mcp' }, process.stderr);
  const engine = await createTradingEngine(config, { logger });
  const server = createTradeMcpServer({ trade: engine.tool, walletInfo: engine.walletInfo }, logger);

  const shutdown = async () => {
    await server.close();
    engine.close();
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => logger.error('shutdown failed', { error: err }));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await server.connect(new StdioServerTransport());
  logger.info('mcp server listening on stdio');
}

main().catch((error) => {
  console.error('Failed to start MCP server:', error);
  process.exit(1);
});
