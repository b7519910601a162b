/**
 * Configuration loader for Domain Checker MCP.
 *
 * Loads environment variables with sensible defaults.
 * No API keys are needed: DNS and RDAP are public.
 */

import { config as loadDotenv } from 'dotenv';
import type { Config, OutputFormat, LogLevel } from './types.js';

// Load .env file if present
loadDotenv();

export const SERVER_NAME = 'domain-checker-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * TLDs scanned by check_tlds_tool when the caller gives none.
 */
export const TOP_TLDS = [
  'com',
  'net',
  'org',
  'io',
  'co',
  'app',
  'dev',
  'ai',
  'me',
  'info',
  'xyz',
  'online',
  'site',
  'tech',
];

/**
 * Parse a comma-separated string into an array.
 */
function parseList(value: string | undefined, defaults: string[]): string[] {
  if (!value) return defaults;
  return value
    .split(',')
    .map((s) => s.trim().toLowerCase().replace(/^\./, ''))
    .filter((s) => s.length > 0);
}

/**
 * Parse a positive integer with a fallback default.
 */
function parseIntWithDefault(
  value: string | undefined,
  defaultValue: number,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  switch (value?.toLowerCase()) {
    case 'table':
      return 'table';
    case 'both':
      return 'both';
    default:
      return 'json';
  }
}

/**
 * Load configuration from environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    outputFormat: parseOutputFormat(env.OUTPUT_FORMAT),
    rdap: {
      timeoutMs: parseIntWithDefault(env.RDAP_TIMEOUT_MS, 5000),
      userAgent: env.RDAP_USER_AGENT || 'DomainCheckerBot/1.0',
    },
    dns: {
      timeoutMs: parseIntWithDefault(env.DNS_TIMEOUT_MS, 5000),
    },
    defaultTlds: parseList(env.CHECK_TLDS, TOP_TLDS),
    denyTlds: parseList(env.DENY_TLDS, [
      'localhost',
      'internal',
      'test',
      'local',
      'invalid',
      'example',
    ]),
    scanConcurrency: parseIntWithDefault(env.SCAN_CONCURRENCY, 4),
    maxTldsPerScan: parseIntWithDefault(env.MAX_TLDS_PER_SCAN, 50),
  };
}

/**
 * Global config instance.
 * Loaded once at startup.
 */
export const config = loadConfig();
