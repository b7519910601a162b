/**
 * Tool Registry.
 *
 * Static mapping from MCP tool name to the operation that serves it.
 */

import type { z } from 'zod';
import type { ToolDescriptor } from '../types.js';
import { UnknownToolError } from '../utils/errors.js';
import {
  checkDomainTool,
  checkDomainSchema,
  executeCheckDomain,
} from './check_domain.js';
import {
  checkTldsTool,
  checkTldsSchema,
  executeCheckTlds,
} from './check_tlds.js';

export {
  checkDomainTool,
  checkDomainSchema,
  executeCheckDomain,
  type CheckDomainInput,
} from './check_domain.js';

export {
  checkTldsTool,
  checkTldsSchema,
  executeCheckTlds,
  type CheckTldsInput,
} from './check_tlds.js';

export interface ToolEntry {
  descriptor: ToolDescriptor;
  schema: z.ZodTypeAny;
  /** Stable operation id used by the REST API and OpenAPI document */
  operationId: string;
  execute: (args: unknown) => Promise<unknown>;
}

export const TOOL_REGISTRY: ReadonlyMap<string, ToolEntry> = new Map<string, ToolEntry>([
  [
    checkDomainTool.name,
    {
      descriptor: checkDomainTool,
      schema: checkDomainSchema,
      operationId: 'checkDomain',
      execute: executeCheckDomain,
    },
  ],
  [
    checkTldsTool.name,
    {
      descriptor: checkTldsTool,
      schema: checkTldsSchema,
      operationId: 'checkTlds',
      execute: executeCheckTlds,
    },
  ],
]);

/**
 * All tool descriptors, in registration order.
 */
export const TOOLS: ToolDescriptor[] = [...TOOL_REGISTRY.values()].map(
  (entry) => entry.descriptor,
);

export function listToolNames(): string[] {
  return [...TOOL_REGISTRY.keys()];
}

/**
 * Execute a tool call by name.
 */
export async function executeToolCall(
  name: string,
  args: unknown,
): Promise<unknown> {
  const entry = TOOL_REGISTRY.get(name);
  if (!entry) {
    throw new UnknownToolError(name, listToolNames());
  }
  return entry.execute(args ?? {});
}
