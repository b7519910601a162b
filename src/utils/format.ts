import type {
  DomainCheckResult,
  OutputFormat,
  TldScanResult,
} from '../types.js';

function renderTable(headers: string[], rows: string[][]): string {
  const headerRow = `| ${headers.join(' | ')} |`;
  const separator = `| ${headers.map(() => '---').join(' | ')} |`;
  const body = rows.map((row) => `| ${row.join(' | ')} |`).join('\n');
  return [headerRow, separator, body].filter(Boolean).join('\n');
}

function formatValue(value: string | null): string {
  return value ?? '-';
}

function isDomainCheckResult(value: unknown): value is DomainCheckResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'domain' in value &&
    'status' in value &&
    'has_dns' in value
  );
}

function isTldScanResult(value: unknown): value is TldScanResult {
  return (
    typeof value === 'object' &&
    value !== null &&
    'keyword' in value &&
    'available_domains' in value &&
    'taken_domains' in value
  );
}

function formatDomainCheck(result: DomainCheckResult): string {
  const rows = [
    ['Domain', result.domain],
    ['Status', result.status],
    ['Registrar', formatValue(result.registrar)],
    ['Registered', formatValue(result.registration_date)],
    ['Expires', formatValue(result.expiration_date)],
    ['DNS records', result.has_dns ? 'Yes' : 'No'],
    ['RDAP data', result.rdap_data_available ? 'Yes' : 'No'],
  ];
  const sections = [renderTable(['Field', 'Value'], rows)];
  if (result.note) {
    sections.push(`Note: ${result.note}`);
  }
  return sections.join('\n');
}

function formatTldScan(result: TldScanResult): string {
  const unconfirmed = new Set(result.unconfirmed_domains);
  const taken = new Set(result.taken_domains);
  const rows = result.tlds_checked_list.map((tld) => {
    const domain = `${result.keyword}.${tld}`;
    let status = 'Available';
    if (taken.has(domain)) {
      status = 'Taken';
    } else if (unconfirmed.has(domain)) {
      status = 'Available (unconfirmed)';
    }
    return [domain, status];
  });

  return [
    `Summary: checked ${result.tlds_checked}, available ${result.available_count}, taken ${result.taken_count}`,
    renderTable(['Domain', 'Status'], rows),
  ].join('\n');
}

export function formatToolResult(
  name: string,
  result: unknown,
  format: OutputFormat,
): string {
  const json = JSON.stringify(result, null, 2);
  if (format === 'json') {
    return json;
  }

  let text: string;
  if (name === 'check_domain_tool' && isDomainCheckResult(result)) {
    text = formatDomainCheck(result);
  } else if (name === 'check_tlds_tool' && isTldScanResult(result)) {
    text = formatTldScan(result);
  } else {
    text = `Output format not implemented for ${name}. Set OUTPUT_FORMAT=json for raw output.`;
  }

  if (format === 'both') {
    return `${text}\n\n\`\`\`json\n${json}\n\`\`\``;
  }

  return text;
}

export function formatToolError(
  error: { code?: string; userMessage?: string; retryable?: boolean; suggestedAction?: string },
  format: OutputFormat,
): string {
  const payload = {
    error: true,
    code: error.code || 'unknown',
    message: error.userMessage || 'Unknown error',
    retryable: error.retryable ?? false,
    suggestedAction: error.suggestedAction,
  };

  if (format === 'json' || format === 'both') {
    const json = JSON.stringify(payload, null, 2);
    return format === 'both'
      ? `Error:\n${payload.message}\n\n\`\`\`json\n${json}\n\`\`\``
      : json;
  }

  const lines = [
    `Error: ${payload.message}`,
    `Code: ${payload.code}`,
    `Retryable: ${payload.retryable ? 'yes' : 'no'}`,
  ];
  if (payload.suggestedAction) {
    lines.push(`Suggested action: ${payload.suggestedAction}`);
  }
  return lines.join('\n');
}
