/**
 * check_domain_tool - Single Domain Availability Check.
 */

import { z } from 'zod';
import type { DomainCheckResult, ToolDescriptor } from '../types.js';
import { checkDomain } from '../services/domain-checker.js';
import { wrapError } from '../utils/errors.js';

export const checkDomainSchema = z.object({
  domain: z
    .string()
    .min(1)
    .max(253)
    .describe('The full domain name to check, including its extension (e.g., "example.com")'),
});

export type CheckDomainInput = z.infer<typeof checkDomainSchema>;

export const checkDomainTool: ToolDescriptor = {
  name: 'check_domain_tool',
  description: `Check if a domain is available for registration by querying DNS records and RDAP data.

DNS is checked first (A, then NS records). RDAP is then queried for registration details.

Returns:
- status: "Registered" or "Available"
- registrar, registration_date, expiration_date (when RDAP provides them)
- has_dns / rdap_data_available flags and an explanatory note

Example:
- check_domain_tool("example.com")`,
  inputSchema: {
    type: 'object',
    properties: {
      domain: {
        type: 'string',
        description: 'The domain name to check (e.g., "example.com")',
      },
    },
    required: ['domain'],
  },
};

export async function executeCheckDomain(
  input: unknown,
): Promise<DomainCheckResult> {
  try {
    const { domain } = checkDomainSchema.parse(input);
    return await checkDomain(domain);
  } catch (error) {
    throw wrapError(error);
  }
}
