/**
 * Domain Name Validators.
 *
 * Validates domains, keywords and TLDs before any lookup is made.
 */

import { config } from '../config.js';
import {
  InvalidDomainError,
  InvalidKeywordError,
  UnsupportedTldError,
  ValidationError,
} from './errors.js';

/**
 * Valid LDH label.
 * - 1-63 characters
 * - Alphanumeric and hyphens
 * - Cannot start or end with hyphen
 */
const LABEL_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Valid TLD: letters only, or an IDN A-label.
 */
const TLD_PATTERN = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/;

const INVALID_CHARS = /[^a-z0-9.-]/;

const MAX_DOMAIN_LENGTH = 253;

function describeLabelProblem(label: string): string {
  if (label.length === 0) return 'Contains an empty label';
  if (label.length > 63) return `Label "${label.slice(0, 12)}..." is longer than 63 characters`;
  if (label.startsWith('-')) return 'A label cannot start with a hyphen';
  if (label.endsWith('-')) return 'A label cannot end with a hyphen';
  return `Label "${label}" is not valid`;
}

/**
 * Validate and normalize a full domain name such as "example.com".
 *
 * @returns Normalized domain (lowercase, no trailing dot)
 * @throws InvalidDomainError if invalid, UnsupportedTldError if the TLD is reserved
 */
export function validateDomain(domain: string): string {
  const normalized = domain.trim().toLowerCase().replace(/\.$/, '');

  if (!normalized) {
    throw new InvalidDomainError(domain, 'Domain cannot be empty');
  }

  if (normalized.length > MAX_DOMAIN_LENGTH) {
    throw new InvalidDomainError(
      domain,
      `Domain too long (${normalized.length} chars, max ${MAX_DOMAIN_LENGTH})`,
    );
  }

  const invalidChar = normalized.match(INVALID_CHARS)?.[0];
  if (invalidChar !== undefined) {
    throw new InvalidDomainError(domain, `Contains invalid character: "${invalidChar}"`);
  }

  const labels = normalized.split('.');
  if (labels.length < 2) {
    throw new InvalidDomainError(
      domain,
      'No TLD found. Include the extension (e.g., "example.com")',
    );
  }

  for (const label of labels) {
    if (!LABEL_PATTERN.test(label)) {
      throw new InvalidDomainError(domain, describeLabelProblem(label));
    }
  }

  const tld = labels[labels.length - 1] ?? '';
  if (!TLD_PATTERN.test(tld)) {
    throw new InvalidDomainError(domain, `".${tld}" is not a valid TLD`);
  }

  if (config.denyTlds.includes(tld)) {
    throw new UnsupportedTldError(tld, 'Reserved TLD');
  }

  return normalized;
}

/**
 * Validate a keyword that will be combined with TLDs.
 *
 * @returns Normalized keyword (lowercase)
 * @throws InvalidKeywordError if invalid
 */
export function validateKeyword(keyword: string): string {
  const normalized = keyword.trim().toLowerCase();

  if (!normalized) {
    throw new InvalidKeywordError(keyword, 'Keyword cannot be empty');
  }

  if (normalized.includes('.')) {
    throw new InvalidKeywordError(keyword, 'Keyword must not contain a dot');
  }

  const invalidChar = normalized.match(INVALID_CHARS)?.[0];
  if (invalidChar !== undefined) {
    throw new InvalidKeywordError(keyword, `Contains invalid character: "${invalidChar}"`);
  }

  if (!LABEL_PATTERN.test(normalized)) {
    throw new InvalidKeywordError(keyword, describeLabelProblem(normalized));
  }

  return normalized;
}

/**
 * Validate a TLD.
 *
 * @param tld - The TLD to validate (with or without leading dot)
 * @returns Normalized TLD (lowercase, no dot)
 * @throws UnsupportedTldError if malformed or denied
 */
export function validateTld(tld: string): string {
  const normalized = tld.trim().replace(/^\./, '').toLowerCase();

  if (!normalized) {
    throw new UnsupportedTldError(tld, 'TLD cannot be empty');
  }

  if (!TLD_PATTERN.test(normalized)) {
    throw new UnsupportedTldError(normalized, 'Not a valid TLD');
  }

  if (config.denyTlds.includes(normalized)) {
    throw new UnsupportedTldError(normalized, 'Reserved TLD');
  }

  return normalized;
}

/**
 * Validate a list of TLDs, falling back to the configured defaults.
 * Duplicates are dropped, keeping first-seen order.
 */
export function validateTlds(tlds?: string[]): string[] {
  const source = tlds && tlds.length > 0 ? tlds : config.defaultTlds;
  const normalized = [...new Set(source.map(validateTld))];

  if (normalized.length > config.maxTldsPerScan) {
    throw new ValidationError([
      `tlds: at most ${config.maxTldsPerScan} TLDs can be checked at once (got ${normalized.length})`,
    ]);
  }

  return normalized;
}

/**
 * Top-level label of a normalized domain.
 */
export function getTld(domain: string): string {
  return domain.slice(domain.lastIndexOf('.') + 1);
}
