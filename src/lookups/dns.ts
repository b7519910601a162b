/**
 * DNS presence check.
 *
 * A domain with A or NS records is registered. The absence of records says
 * nothing on its own, so callers confirm with RDAP.
 */

import { resolve4, resolveNs } from 'node:dns/promises';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

type RecordKind = 'A' | 'NS';

const RESOLVERS: Record<RecordKind, (domain: string) => Promise<string[]>> = {
  A: (domain) => resolve4(domain),
  NS: (domain) => resolveNs(domain),
};

async function resolveWithTimeout(
  domain: string,
  kind: RecordKind,
  timeoutMs: number,
): Promise<string[]> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`dns_timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([RESOLVERS[kind](domain), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function hasRecords(domain: string, kind: RecordKind): Promise<boolean> {
  try {
    const records = await resolveWithTimeout(domain, kind, config.dns.timeoutMs);
    return records.length > 0;
  } catch (error) {
    // ENOTFOUND / ENODATA are the expected answers for unregistered names
    logger.debug('DNS lookup returned no records', {
      domain,
      type: kind,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Check whether a domain has A records, falling back to NS records.
 */
export async function hasDnsRecords(domain: string): Promise<boolean> {
  if (await hasRecords(domain, 'A')) {
    return true;
  }
  return hasRecords(domain, 'NS');
}
