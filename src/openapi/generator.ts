/**
 * OpenAPI Specification Generator
 *
 * Builds an OpenAPI 3.1 document for the REST tool endpoints from the
 * same zod schemas that validate MCP tool calls.
 */

import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi,
} from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { SERVER_VERSION } from '../config.js';
import { TOOL_REGISTRY } from '../tools/index.js';

extendZodWithOpenApi(z);

const SuccessResponseSchema = z.object({
  success: z.literal(true).describe('Whether the operation succeeded'),
  data: z.unknown().describe('Tool-specific response data'),
});

const ErrorResponseSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string().describe('Error code'),
    message: z.string().describe('Human-readable error message'),
    retryable: z.boolean().describe('Whether the request can be retried'),
  }),
});

const MAX_OPERATION_DESCRIPTION = 300;

function summarize(description: string): string {
  return description.length > MAX_OPERATION_DESCRIPTION
    ? `${description.slice(0, MAX_OPERATION_DESCRIPTION - 3)}...`
    : description;
}

export type OpenAPIDocument = ReturnType<OpenApiGeneratorV31['generateDocument']>;

/**
 * Generate the OpenAPI document for every registered tool.
 *
 * @param baseUrl - Base URL for the API (e.g., http://localhost:3000)
 */
export function generateOpenAPISpec(
  baseUrl: string = 'http://localhost:3000',
  version: string = SERVER_VERSION,
): OpenAPIDocument {
  const registry = new OpenAPIRegistry();

  registry.register('SuccessResponse', SuccessResponseSchema);
  registry.register('ErrorResponse', ErrorResponseSchema);

  const errorContent = {
    'application/json': { schema: ErrorResponseSchema },
  };

  for (const [name, tool] of TOOL_REGISTRY) {
    registry.registerPath({
      method: 'post',
      path: `/api/tools/${name}`,
      operationId: tool.operationId,
      summary: name.replace(/_/g, ' ').replace(/\b\w/g, (c) => c.toUpperCase()),
      description: summarize(tool.descriptor.description),
      tags: ['domains'],
      request: {
        body: {
          content: {
            'application/json': { schema: tool.schema },
          },
          required: true,
        },
      },
      responses: {
        200: {
          description: 'Successful response',
          content: {
            'application/json': { schema: SuccessResponseSchema },
          },
        },
        400: { description: 'Bad request - invalid parameters', content: errorContent },
        404: { description: 'Unknown tool', content: errorContent },
        500: { description: 'Internal server error', content: errorContent },
        504: { description: 'Upstream lookup timed out', content: errorContent },
      },
    });
  }

  const generator = new OpenApiGeneratorV31(registry.definitions);

  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Domain Checker API',
      version,
      description: `REST API for domain availability checks backed by DNS and RDAP.

The MCP tools served at \`/mcp\` (check_domain_tool, check_tlds_tool) are generated from the operations in this document.`,
      license: {
        name: 'MIT',
        url: 'https://opensource.org/licenses/MIT',
      },
    },
    servers: [
      {
        url: baseUrl,
      },
    ],
    tags: [
      {
        name: 'domains',
        description: 'Domain availability operations',
      },
    ],
  });
}
