import { formatToolResult, formatToolError } from '../../src/utils/format';
import type { DomainCheckResult, TldScanResult } from '../../src/types';

const registered: DomainCheckResult = {
  domain: 'example.com',
  status: 'Registered',
  registrar: 'Test Registrar LLC',
  registration_date: '1995-08-14T04:00:00Z',
  expiration_date: '2030-08-13T04:00:00Z',
  has_dns: true,
  rdap_data_available: true,
};

const scan: TldScanResult = {
  keyword: 'myapp',
  tlds_checked: 3,
  available_count: 2,
  taken_count: 1,
  available_domains: ['myapp.io', 'myapp.ai'],
  taken_domains: ['myapp.com'],
  unconfirmed_domains: ['myapp.ai'],
  tlds_checked_list: ['com', 'io', 'ai'],
};

describe('formatToolResult', () => {
  it('returns pretty JSON by default format', () => {
    expect(formatToolResult('check_domain_tool', registered, 'json')).toBe(
      JSON.stringify(registered, null, 2),
    );
  });

  it('renders a field table for a domain check', () => {
    const available: DomainCheckResult = {
      domain: 'unclaimed-name.com',
      status: 'Available',
      registrar: null,
      registration_date: null,
      expiration_date: null,
      has_dns: false,
      rdap_data_available: false,
      note: 'No DNS records or RDAP data found',
    };

    expect(formatToolResult('check_domain_tool', available, 'table')).toBe(
      [
        '| Field | Value |',
        '| --- | --- |',
        '| Domain | unclaimed-name.com |',
        '| Status | Available |',
        '| Registrar | - |',
        '| Registered | - |',
        '| Expires | - |',
        '| DNS records | No |',
        '| RDAP data | No |',
        'Note: No DNS records or RDAP data found',
      ].join('\n'),
    );
  });

  it('renders a summary and status table for a TLD scan', () => {
    expect(formatToolResult('check_tlds_tool', scan, 'table')).toBe(
      [
        'Summary: checked 3, available 2, taken 1',
        '| Domain | Status |',
        '| --- | --- |',
        '| myapp.com | Taken |',
        '| myapp.io | Available |',
        '| myapp.ai | Available (unconfirmed) |',
      ].join('\n'),
    );
  });

  it('appends the JSON block in both mode', () => {
    const text = formatToolResult('check_domain_tool', registered, 'both');

    expect(text.startsWith('| Field | Value |')).toBe(true);
    expect(text.endsWith(`\n\n\`\`\`json\n${JSON.stringify(registered, null, 2)}\n\`\`\``)).toBe(
      true,
    );
  });

  it('falls back to a hint for unknown payloads', () => {
    expect(formatToolResult('other_tool', { ok: true }, 'table')).toBe(
      'Output format not implemented for other_tool. Set OUTPUT_FORMAT=json for raw output.',
    );
  });
});

describe('formatToolError', () => {
  const error = {
    code: 'INVALID_DOMAIN',
    userMessage: 'The domain "bad" is not valid: No TLD found',
    retryable: false,
    suggestedAction: 'Pass a full domain name',
  };

  it('renders JSON', () => {
    expect(JSON.parse(formatToolError(error, 'json'))).toEqual({
      error: true,
      code: 'INVALID_DOMAIN',
      message: 'The domain "bad" is not valid: No TLD found',
      retryable: false,
      suggestedAction: 'Pass a full domain name',
    });
  });

  it('renders text lines', () => {
    expect(formatToolError(error, 'table')).toBe(
      [
        'Error: The domain "bad" is not valid: No TLD found',
        'Code: INVALID_DOMAIN',
        'Retryable: no',
        'Suggested action: Pass a full domain name',
      ].join('\n'),
    );
  });
});
