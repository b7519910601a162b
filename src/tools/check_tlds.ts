/**
 * check_tlds_tool - Keyword Scan Across TLDs.
 *
 * Checks keyword.tld for every requested TLD and splits the results
 * into available and taken domains.
 */

import { z } from 'zod';
import type { TldScanResult, ToolDescriptor } from '../types.js';
import { checkTlds } from '../services/domain-checker.js';
import { wrapError } from '../utils/errors.js';
import { TOP_TLDS } from '../config.js';

export const checkTldsSchema = z.object({
  keyword: z
    .string()
    .min(1)
    .max(63)
    .describe('The keyword to check across TLDs (e.g., "myapp"). No extension.'),
  tlds: z
    .array(z.string())
    .optional()
    .describe(`TLDs to check (e.g., ["com", "io"]). Defaults to: ${TOP_TLDS.join(', ')}.`),
});

export type CheckTldsInput = z.infer<typeof checkTldsSchema>;

export const checkTldsTool: ToolDescriptor = {
  name: 'check_tlds_tool',
  description: `Check a keyword across multiple top-level domains (TLDs) to find available domain names.

Each keyword.tld is checked with DNS first and confirmed with RDAP when no records exist.
Without "tlds", ${TOP_TLDS.length} popular TLDs are checked (.${TOP_TLDS.join(', .')}).

Returns:
- available_domains / taken_domains and their counts
- unconfirmed_domains: available ones whose RDAP lookup failed
- tlds_checked_list: the TLDs that were checked

Example:
- check_tlds_tool("myapp", ["com", "io", "dev"])`,
  inputSchema: {
    type: 'object',
    properties: {
      keyword: {
        type: 'string',
        description: 'The keyword to check across TLDs (e.g., "myapp")',
      },
      tlds: {
        type: 'array',
        items: { type: 'string' },
        description: 'Optional list of TLDs to check. Defaults to the popular TLD list.',
      },
    },
    required: ['keyword'],
  },
};

export async function executeCheckTlds(
  input: unknown,
): Promise<TldScanResult> {
  try {
    const { keyword, tlds } = checkTldsSchema.parse(input);
    return await checkTlds(keyword, tlds);
  } catch (error) {
    throw wrapError(error);
  }
}
