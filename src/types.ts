/**
 * Domain Checker MCP - Core Type Definitions
 */

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type RegistrationStatus = 'Registered' | 'Available';

/**
 * Outcome of check_domain_tool for a single domain.
 */
export interface DomainCheckResult {
  /** Normalized domain that was checked (e.g., "example.com") */
  domain: string;

  status: RegistrationStatus;

  /**
   * Registrar name from RDAP. "Unknown" when registered but not reported,
   * null when the domain looks available.
   */
  registrar: string | null;

  registration_date: string | null;

  expiration_date: string | null;

  /** Whether A or NS records resolved */
  has_dns: boolean;

  /** Whether an RDAP record was retrieved */
  rdap_data_available: boolean;

  note?: string;
}

/**
 * Outcome of check_tlds_tool for one keyword.
 */
export interface TldScanResult {
  keyword: string;
  tlds_checked: number;
  available_count: number;
  taken_count: number;
  available_domains: string[];
  taken_domains: string[];

  /** Subset of available_domains whose RDAP lookup failed */
  unconfirmed_domains: string[];

  tlds_checked_list: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// MCP TOOL TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Tool descriptor exposed through tools/list.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type OutputFormat = 'json' | 'table' | 'both';

/**
 * Server configuration loaded from environment variables.
 */
export interface Config {
  // Logging
  logLevel: LogLevel;

  // How tool results are rendered into MCP text content
  outputFormat: OutputFormat;

  rdap: {
    timeoutMs: number;
    userAgent: string;
  };

  dns: {
    timeoutMs: number;
  };

  // TLD lists
  defaultTlds: string[];
  denyTlds: string[];

  // check_tlds_tool limits
  scanConcurrency: number;
  maxTldsPerScan: number;
}
