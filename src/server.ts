/**
 * Domain Checker MCP Server.
 *
 * Exposes two tools over the Model Context Protocol:
 * - check_domain_tool: registration status of one domain (DNS + RDAP)
 * - check_tlds_tool: one keyword checked across many TLDs
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { config, SERVER_NAME, SERVER_VERSION } from './config.js';
import type { OutputFormat } from './types.js';
import { logger, generateRequestId, runWithRequestId } from './utils/logger.js';
import { wrapError } from './utils/errors.js';
import { formatToolResult, formatToolError } from './utils/format.js';
import { TOOLS, executeToolCall } from './tools/index.js';

export interface CreateServerOptions {
  /** Overrides config.outputFormat for this server instance */
  outputFormat?: OutputFormat;
}

/**
 * Create and configure the MCP server.
 */
export function createServer(options: CreateServerOptions = {}): Server {
  const outputFormat = options.outputFormat ?? config.outputFormat;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    return runWithRequestId(generateRequestId(), async () => {
      try {
        logger.info('Tool call started', { tool: name });

        const result = await executeToolCall(name, args ?? {});

        logger.info('Tool call completed', { tool: name });

        return {
          content: [
            {
              type: 'text' as const,
              text: formatToolResult(name, result, outputFormat),
            },
          ],
        };
      } catch (error) {
        const wrapped = wrapError(error);

        logger.error('Tool call failed', {
          tool: name,
          error: wrapped.message,
          code: wrapped.code,
        });

        // Errors travel as tool content so the model can read them
        return {
          content: [
            {
              type: 'text' as const,
              text: formatToolError(
                {
                  code: wrapped.code,
                  userMessage: wrapped.userMessage,
                  retryable: wrapped.retryable,
                  suggestedAction: wrapped.suggestedAction,
                },
                outputFormat,
              ),
            },
          ],
          isError: true,
        };
      }
    });
  });

  server.onerror = (error) => {
    logger.logError('MCP server error', error);
  };

  return server;
}
