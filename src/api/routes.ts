/**
 * REST API Routes for Tool Execution
 *
 * POST /api/tools/:name runs the named tool with the JSON body as arguments.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { executeToolCall } from '../tools/index.js';
import { wrapError, type DomainCheckerError } from '../utils/errors.js';
import { logger, generateRequestId, runWithRequestId } from '../utils/logger.js';

export interface ToolHttpResponse {
  status: number;
  body:
    | { success: true; data: unknown }
    | {
        success: false;
        error: { code: string; message: string; retryable: boolean };
      };
}

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  INVALID_DOMAIN: 400,
  INVALID_KEYWORD: 400,
  UNSUPPORTED_TLD: 400,
  UNKNOWN_TOOL: 404,
  TIMEOUT: 504,
};

export function statusForError(error: DomainCheckerError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

/**
 * Run a tool and shape the outcome as an HTTP status and JSON body.
 * Each request gets its own request ID for the logs it produces.
 */
export function handleToolRequest(
  toolName: string,
  args: unknown,
): Promise<ToolHttpResponse> {
  return runWithRequestId(generateRequestId(), () => runTool(toolName, args));
}

async function runTool(toolName: string, args: unknown): Promise<ToolHttpResponse> {
  logger.info('REST tool call started', { tool: toolName });
  try {
    const data = await executeToolCall(toolName, args ?? {});
    return { status: 200, body: { success: true, data } };
  } catch (error) {
    const wrapped = wrapError(error);
    logger.warn('REST tool call failed', {
      tool: toolName,
      code: wrapped.code,
      error: wrapped.message,
    });
    return {
      status: statusForError(wrapped),
      body: {
        success: false,
        error: {
          code: wrapped.code,
          message: wrapped.userMessage,
          retryable: wrapped.retryable,
        },
      },
    };
  }
}

export function createApiRouter(): Router {
  const router = Router();

  router.post('/tools/:name', (req: Request, res: Response, next: NextFunction) => {
    handleToolRequest(req.params.name ?? '', req.body)
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  });

  return router;
}
