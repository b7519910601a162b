#!/usr/bin/env node
/**
 * Domain Checker MCP entry point.
 *
 * Starts the server on stdio (default) or Streamable HTTP:
 *   domain-checker-mcp
 *   domain-checker-mcp --http --port 3001
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config, SERVER_VERSION } from './config.js';
import { createServer } from './server.js';
import { TOOLS } from './tools/index.js';
import { getTransportConfig, formatTransportInfo } from './transports/index.js';
import { createHttpTransport } from './transports/http.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const transportConfig = getTransportConfig();

  logger.info('Domain Checker MCP starting', {
    version: SERVER_VERSION,
    node_version: process.version,
    transport: transportConfig.type,
    output_format: config.outputFormat,
    default_tlds: config.defaultTlds.length,
  });

  let shutdown: () => Promise<void>;

  if (transportConfig.type === 'http') {
    const http = createHttpTransport(() => createServer(), transportConfig);
    await http.start();
    shutdown = () => http.stop();
  } else {
    const server = createServer();
    await server.connect(new StdioServerTransport());
    shutdown = () => server.close();
  }

  logger.info('Domain Checker MCP ready', {
    tools: TOOLS.length,
    transport: formatTransportInfo(transportConfig),
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('Shutting down...', { signal });
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
