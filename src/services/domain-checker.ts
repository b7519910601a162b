/**
 * Domain Checker Service.
 *
 * Decides registration status from two public signals:
 * 1. DNS - A or NS records mean the name is delegated, hence registered
 * 2. RDAP - the registry's own record, which also carries registrar and dates
 *
 * A name with neither is reported as available.
 */

import type { DomainCheckResult, TldScanResult } from '../types.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { validateDomain, validateKeyword, validateTlds } from '../utils/validators.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { hasDnsRecords } from '../lookups/dns.js';
import {
  lookupRdap,
  extractRegistrar,
  extractEventDates,
  type RdapLookup,
} from '../lookups/rdap.js';

const UNKNOWN = 'Unknown';

function registeredResult(
  domain: string,
  hasDns: boolean,
  rdap: RdapLookup,
): DomainCheckResult {
  if (rdap.status === 'found' && !hasDns) {
    return {
      domain,
      status: 'Registered',
      registrar: UNKNOWN,
      registration_date: UNKNOWN,
      expiration_date: UNKNOWN,
      has_dns: false,
      rdap_data_available: true,
      note: 'Domain found in RDAP registry',
    };
  }

  if (rdap.status === 'found') {
    const dates = extractEventDates(rdap.record);
    return {
      domain,
      status: 'Registered',
      registrar: extractRegistrar(rdap.record) ?? UNKNOWN,
      registration_date: dates.registeredAt ?? UNKNOWN,
      expiration_date: dates.expiresAt ?? UNKNOWN,
      has_dns: true,
      rdap_data_available: true,
    };
  }

  return {
    domain,
    status: 'Registered',
    registrar: UNKNOWN,
    registration_date: UNKNOWN,
    expiration_date: UNKNOWN,
    has_dns: true,
    rdap_data_available: false,
    note: "Domain has DNS records but RDAP data couldn't be retrieved",
  };
}

function availableResult(domain: string, rdap: RdapLookup): DomainCheckResult {
  return {
    domain,
    status: 'Available',
    registrar: null,
    registration_date: null,
    expiration_date: null,
    has_dns: false,
    rdap_data_available: false,
    note:
      rdap.status === 'error'
        ? `No DNS records found and RDAP lookup failed (${rdap.error.code}); availability is unconfirmed`
        : 'No DNS records or RDAP data found',
  };
}

/**
 * Check a single, already-normalized domain.
 */
async function lookupDomain(domain: string): Promise<DomainCheckResult> {
  const hasDns = await hasDnsRecords(domain);
  const rdap = await lookupRdap(domain);

  if (hasDns || rdap.status === 'found') {
    return registeredResult(domain, hasDns, rdap);
  }
  return availableResult(domain, rdap);
}

/**
 * Check whether a domain is registered, with registrar and dates when RDAP has them.
 */
export async function checkDomain(domain: string): Promise<DomainCheckResult> {
  const normalized = validateDomain(domain);
  const startTime = Date.now();

  logger.info('Domain check started', { domain: normalized });

  const result = await lookupDomain(normalized);

  logger.info('Domain check completed', {
    domain: normalized,
    status: result.status,
    has_dns: result.has_dns,
    rdap_data_available: result.rdap_data_available,
    duration_ms: Date.now() - startTime,
  });

  return result;
}

type ScanOutcome = 'taken' | 'available' | 'unconfirmed';

/**
 * Availability of one keyword.tld pair. RDAP is only asked when DNS is silent.
 */
async function scanDomain(domain: string): Promise<ScanOutcome> {
  if (await hasDnsRecords(domain)) {
    return 'taken';
  }

  const rdap = await lookupRdap(domain);
  switch (rdap.status) {
    case 'found':
      return 'taken';
    case 'not_found':
      return 'available';
    case 'error':
      return 'unconfirmed';
  }
}

/**
 * Check a keyword across a list of TLDs (the configured defaults when omitted).
 */
export async function checkTlds(
  keyword: string,
  tlds?: string[],
): Promise<TldScanResult> {
  const normalizedKeyword = validateKeyword(keyword);
  const normalizedTlds = validateTlds(tlds);
  const startTime = Date.now();

  logger.info('TLD scan started', {
    keyword: normalizedKeyword,
    tlds: normalizedTlds,
  });

  const domains = normalizedTlds.map((tld) => `${normalizedKeyword}.${tld}`);
  const outcomes = await mapWithConcurrency(domains, config.scanConcurrency, scanDomain);

  const available: string[] = [];
  const taken: string[] = [];
  const unconfirmed: string[] = [];

  outcomes.forEach((outcome, index) => {
    const domain = domains[index] ?? '';
    if (outcome === 'taken') {
      taken.push(domain);
      return;
    }
    available.push(domain);
    if (outcome === 'unconfirmed') {
      unconfirmed.push(domain);
    }
  });

  logger.info('TLD scan completed', {
    keyword: normalizedKeyword,
    available: available.length,
    taken: taken.length,
    unconfirmed: unconfirmed.length,
    duration_ms: Date.now() - startTime,
  });

  return {
    keyword: normalizedKeyword,
    tlds_checked: normalizedTlds.length,
    available_count: available.length,
    taken_count: taken.length,
    available_domains: available,
    taken_domains: taken,
    unconfirmed_domains: unconfirmed,
    tlds_checked_list: normalizedTlds,
  };
}
