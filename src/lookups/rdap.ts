/**
 * RDAP (Registration Data Access Protocol) Client.
 *
 * RFC 7480 - Modern replacement for WHOIS.
 * Public API - no authentication required.
 */

import axios from 'axios';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  DomainCheckerError,
  RdapLookupError,
  TimeoutError,
} from '../utils/errors.js';
import { getTld } from '../utils/validators.js';

// ═══════════════════════════════════════════════════════════════════════════
// Zod Schemas for RDAP Response Validation (RFC 9083)
// ═══════════════════════════════════════════════════════════════════════════

const RdapEntitySchema = z.object({
  roles: z.array(z.string()).optional(),
  // ["vcard", [[name, params, type, value], ...]] - checked field by field below
  vcardArray: z.array(z.unknown()).optional(),
}).passthrough();

const RdapEventSchema = z.object({
  eventAction: z.string().optional(),
  eventDate: z.string().optional(),
}).passthrough();

export const RdapDomainRecordSchema = z.object({
  objectClassName: z.string().optional(),
  ldhName: z.string().optional(),
  entities: z.array(RdapEntitySchema).optional(),
  events: z.array(RdapEventSchema).optional(),
}).passthrough();

export type RdapDomainRecord = z.infer<typeof RdapDomainRecordSchema>;

export type RdapLookup =
  | { status: 'found'; url: string; record: RdapDomainRecord }
  | { status: 'not_found'; url: string; httpStatus: number }
  | { status: 'error'; url: string; error: DomainCheckerError };

/**
 * Registries queried directly; everything else goes through rdap.org,
 * which redirects to the authoritative server.
 */
const DIRECT_RDAP_BASES: Record<string, (tld: string) => string> = {
  com: (tld) => `https://rdap.verisign.com/${tld}/v1`,
  net: (tld) => `https://rdap.verisign.com/${tld}/v1`,
  org: () => 'https://rdap.publicinterestregistry.org/rdap',
  ch: (tld) => `https://rdap.nic.${tld}`,
  li: (tld) => `https://rdap.nic.${tld}`,
};

const RDAP_FALLBACK_BASE = 'https://rdap.org';

/**
 * Build the RDAP domain query URL for a normalized domain.
 */
export function rdapUrlFor(domain: string): string {
  const tld = getTld(domain);
  const base = DIRECT_RDAP_BASES[tld]?.(tld) ?? RDAP_FALLBACK_BASE;
  return `${base}/domain/${domain}`;
}

/**
 * Pull the registrar's display name out of a jCard array.
 * Returns the first "fn" or "org" property with a text value.
 */
function extractNameFromVCard(vcardArray: unknown[] | undefined): string | undefined {
  const properties = vcardArray?.[1];
  if (!Array.isArray(properties)) {
    return undefined;
  }

  for (const prop of properties) {
    if (!Array.isArray(prop) || prop.length < 4) {
      continue;
    }

    const [propName, , , propValue] = prop;
    if (propName !== 'fn' && propName !== 'org') {
      continue;
    }

    if (typeof propValue === 'string' && propValue.trim()) {
      return propValue.trim();
    }
    // "org" may be structured: ["Org Name", "Unit"]
    if (Array.isArray(propValue) && typeof propValue[0] === 'string' && propValue[0].trim()) {
      return propValue[0].trim();
    }
  }

  return undefined;
}

/**
 * Registrar name from the first entity carrying the "registrar" role.
 */
export function extractRegistrar(record: RdapDomainRecord): string | undefined {
  for (const entity of record.entities ?? []) {
    if (!entity.roles?.includes('registrar')) {
      continue;
    }
    const name = extractNameFromVCard(entity.vcardArray);
    if (name) {
      return name;
    }
  }
  return undefined;
}

export interface RdapEventDates {
  registeredAt?: string;
  expiresAt?: string;
}

export function extractEventDates(record: RdapDomainRecord): RdapEventDates {
  const dates: RdapEventDates = {};

  for (const event of record.events ?? []) {
    if (!event.eventDate) continue;

    switch (event.eventAction?.toLowerCase()) {
      case 'registration':
        dates.registeredAt = event.eventDate;
        break;
      case 'expiration':
        dates.expiresAt = event.eventDate;
        break;
    }
  }

  return dates;
}

function toLookupError(domain: string, error: unknown): DomainCheckerError {
  if (error instanceof DomainCheckerError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TimeoutError(`RDAP lookup for ${domain}`, config.rdap.timeoutMs);
    }
    return new RdapLookupError(domain, error.message, error.response?.status, error);
  }

  return new RdapLookupError(
    domain,
    error instanceof Error ? error.message : String(error),
    undefined,
    error instanceof Error ? error : undefined,
  );
}

const NOT_FOUND_STATUSES: ReadonlySet<number> = new Set([404, 410]);

function isExpectedStatus(status: number): boolean {
  return status === 200 || NOT_FOUND_STATUSES.has(status);
}

/**
 * Query RDAP for a domain.
 *
 * 200 with a domain object means registered; 404 or 410 means the registry
 * has no record. Every other status (429 rate limits, 403, server errors),
 * timeouts and malformed bodies come back as `error` so callers can tell
 * "absent" from "unknown".
 */
export async function lookupRdap(domain: string): Promise<RdapLookup> {
  const url = rdapUrlFor(domain);
  logger.debug('RDAP lookup', { domain, url });

  try {
    const response = await axios.get<unknown>(url, {
      timeout: config.rdap.timeoutMs,
      headers: {
        Accept: 'application/rdap+json',
        'User-Agent': config.rdap.userAgent,
      },
      validateStatus: isExpectedStatus,
    });

    if (NOT_FOUND_STATUSES.has(response.status)) {
      logger.debug('RDAP record not found', { domain, status: response.status });
      return { status: 'not_found', url, httpStatus: response.status };
    }

    if (response.status !== 200) {
      throw new RdapLookupError(domain, `Unexpected HTTP ${response.status}`, response.status);
    }

    const parsed = RdapDomainRecordSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn('RDAP response validation failed', {
        domain,
        errors: parsed.error.errors.slice(0, 3).map((issue) => issue.message),
      });
      return {
        status: 'error',
        url,
        error: new RdapLookupError(domain, 'Malformed RDAP response', response.status),
      };
    }

    return { status: 'found', url, record: parsed.data };
  } catch (error) {
    const wrapped = toLookupError(domain, error);
    logger.warn('RDAP lookup failed', {
      domain,
      url,
      code: wrapped.code,
      error: wrapped.message,
    });
    return { status: 'error', url, error: wrapped };
  }
}
