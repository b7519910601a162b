/**
 * Unit Tests for Domain Validators.
 */

import {
  validateDomain,
  validateKeyword,
  validateTld,
  validateTlds,
  getTld,
} from '../../src/utils/validators';
import { TOP_TLDS } from '../../src/config';
import {
  InvalidDomainError,
  InvalidKeywordError,
  UnsupportedTldError,
  ValidationError,
} from '../../src/utils/errors';

describe('validateDomain', () => {
  it('should accept valid domains', () => {
    expect(validateDomain('example.com')).toBe('example.com');
    expect(validateDomain('my-app.io')).toBe('my-app.io');
    expect(validateDomain('sub.example.co')).toBe('sub.example.co');
    expect(validateDomain('xn--bcher-kva.ch')).toBe('xn--bcher-kva.ch');
  });

  it('should normalize case, whitespace and a trailing dot', () => {
    expect(validateDomain('  Example.COM  ')).toBe('example.com');
    expect(validateDomain('example.com.')).toBe('example.com');
  });

  it('should reject empty input', () => {
    expect(() => validateDomain('')).toThrow(InvalidDomainError);
    expect(() => validateDomain('   ')).toThrow(InvalidDomainError);
  });

  it('should reject a name without a TLD', () => {
    expect(() => validateDomain('example')).toThrow(
      'Invalid domain: example - No TLD found. Include the extension (e.g., "example.com")',
    );
  });

  it('should reject invalid characters', () => {
    expect(() => validateDomain('exa_mple.com')).toThrow(
      'Invalid domain: exa_mple.com - Contains invalid character: "_"',
    );
    expect(() => validateDomain('https://example.com')).toThrow(InvalidDomainError);
  });

  it('should reject labels with leading or trailing hyphens', () => {
    expect(() => validateDomain('-example.com')).toThrow(
      'Invalid domain: -example.com - A label cannot start with a hyphen',
    );
    expect(() => validateDomain('example-.com')).toThrow(
      'Invalid domain: example-.com - A label cannot end with a hyphen',
    );
  });

  it('should reject empty labels', () => {
    expect(() => validateDomain('example..com')).toThrow(
      'Invalid domain: example..com - Contains an empty label',
    );
  });

  it('should reject labels longer than 63 characters', () => {
    expect(() => validateDomain(`${'a'.repeat(64)}.com`)).toThrow(InvalidDomainError);
  });

  it('should reject domains longer than 253 characters', () => {
    const long = `${Array(5).fill('a'.repeat(63)).join('.')}.com`;
    expect(() => validateDomain(long)).toThrow('max 253');
  });

  it('should reject domains under a reserved TLD', () => {
    expect(() => validateDomain('foo.localhost')).toThrow(UnsupportedTldError);
    expect(() => validateDomain('Build.Internal.')).toThrow(
      'TLD not supported: .internal - Reserved TLD',
    );
  });

  it('should reject numeric TLDs', () => {
    expect(() => validateDomain('example.123')).toThrow(
      'Invalid domain: example.123 - ".123" is not a valid TLD',
    );
  });
});

describe('validateKeyword', () => {
  it('should accept and normalize keywords', () => {
    expect(validateKeyword('myapp')).toBe('myapp');
    expect(validateKeyword('  MyApp ')).toBe('myapp');
    expect(validateKeyword('my-app2')).toBe('my-app2');
  });

  it('should reject keywords with a dot', () => {
    expect(() => validateKeyword('myapp.com')).toThrow(
      'Invalid keyword: myapp.com - Keyword must not contain a dot',
    );
  });

  it('should reject empty and malformed keywords', () => {
    expect(() => validateKeyword('')).toThrow(InvalidKeywordError);
    expect(() => validateKeyword('my app')).toThrow(InvalidKeywordError);
    expect(() => validateKeyword('-myapp')).toThrow(InvalidKeywordError);
  });
});

describe('validateTld', () => {
  it('should strip a leading dot and lowercase', () => {
    expect(validateTld('.COM')).toBe('com');
    expect(validateTld('io')).toBe('io');
  });

  it('should reject reserved TLDs', () => {
    expect(() => validateTld('localhost')).toThrow(
      'TLD not supported: .localhost - Reserved TLD',
    );
    expect(() => validateTld('.test')).toThrow(UnsupportedTldError);
  });

  it('should reject malformed TLDs', () => {
    expect(() => validateTld('c')).toThrow(UnsupportedTldError);
    expect(() => validateTld('co m')).toThrow(UnsupportedTldError);
    expect(() => validateTld('')).toThrow(UnsupportedTldError);
  });
});

describe('validateTlds', () => {
  it('should fall back to the default TLDs', () => {
    expect(validateTlds()).toEqual(TOP_TLDS);
    expect(validateTlds([])).toEqual(TOP_TLDS);
  });

  it('should drop duplicates keeping first-seen order', () => {
    expect(validateTlds(['io', '.com', 'IO', 'dev', 'com'])).toEqual(['io', 'com', 'dev']);
  });

  it('should reject more TLDs than one scan allows', () => {
    const tlds = Array.from({ length: 51 }, (_, i) =>
      `t${String.fromCharCode(97 + (i % 26))}${String.fromCharCode(97 + Math.floor(i / 26))}`,
    );
    expect(() => validateTlds(tlds)).toThrow(ValidationError);
  });
});

describe('getTld', () => {
  it('should return the last label', () => {
    expect(getTld('example.com')).toBe('com');
    expect(getTld('a.b.co')).toBe('co');
  });
});
