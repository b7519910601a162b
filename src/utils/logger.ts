/**
 * Structured JSON logging on stderr.
 *
 * stdout carries the MCP protocol, so every entry is one JSON line on stderr.
 * Entries logged while a tool call runs carry that call's request ID,
 * which travels with the async context rather than a shared variable.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { config } from '../config.js';
import type { LogLevel } from '../types.js';

type LogFields = Record<string, unknown>;

const requestContext = new AsyncLocalStorage<string>();

/**
 * Run `fn` with `requestId` attached to every entry logged inside it,
 * including entries from awaited service and lookup calls.
 */
export function runWithRequestId<T>(requestId: string, fn: () => Promise<T>): Promise<T> {
  return requestContext.run(requestId, fn);
}

export function getRequestId(): string | undefined {
  return requestContext.getStore();
}

export function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

// Long opaque strings and key=value credentials inside free text
const LONG_TOKEN = /\b[a-zA-Z0-9]{32,}\b/g;
const INLINE_CREDENTIAL = /(?:api[_-]?key|secret|password|token)[\s:="']+[^\s"']+/gi;

const SECRET_KEYS = /secret|password|api_?key|token|authorization/i;

// Domain names and keywords are logged as given; a 40-letter keyword is not a token
const NAME_FIELDS = new Set(['domain', 'keyword', 'tlds', 'url']);

function redactText(text: string): string {
  return text.replace(LONG_TOKEN, '[REDACTED]').replace(INLINE_CREDENTIAL, '[REDACTED]');
}

/**
 * Redact credentials in a string, array or plain object.
 */
export function maskSecrets(value: unknown): unknown {
  if (typeof value === 'string') return redactText(value);
  if (Array.isArray(value)) return value.map(maskSecrets);
  if (value !== null && typeof value === 'object') {
    return maskRecord(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

export function maskRecord(fields: LogFields): LogFields {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]): [string, unknown] => {
      if (SECRET_KEYS.test(key)) return [key, '[REDACTED]'];
      if (NAME_FIELDS.has(key)) return [key, value];
      return [key, maskSecrets(value)];
    }),
  );
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (SEVERITY[level] < SEVERITY[config.logLevel]) return;

  const requestId = getRequestId();
  console.error(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(requestId ? { request_id: requestId } : {}),
      ...(fields ? maskRecord(fields) : {}),
    }),
  );
}

export const logger = {
  debug: (message: string, fields?: LogFields) => write('debug', message, fields),
  info: (message: string, fields?: LogFields) => write('info', message, fields),
  warn: (message: string, fields?: LogFields) => write('warn', message, fields),
  error: (message: string, fields?: LogFields) => write('error', message, fields),

  logError: (message: string, error: Error, fields?: LogFields) =>
    write('error', message, {
      ...fields,
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    }),
};
