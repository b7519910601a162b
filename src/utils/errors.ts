/**
 * Custom Error Classes for Domain Checker MCP.
 *
 * Every error carries a machine-readable code, a message meant for the
 * person driving the agent, and a hint about what to do next.
 */

import { ZodError } from 'zod';

/**
 * Base error class for all domain checker errors.
 */
export class DomainCheckerError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** User-friendly message */
  readonly userMessage: string;
  /** Can this operation be retried? */
  readonly retryable: boolean;
  /** Suggested action for the user */
  readonly suggestedAction?: string;

  constructor(
    code: string,
    message: string,
    userMessage: string,
    options?: {
      retryable?: boolean;
      suggestedAction?: string;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = 'DomainCheckerError';
    this.code = code;
    this.userMessage = userMessage;
    this.retryable = options?.retryable ?? false;
    this.suggestedAction = options?.suggestedAction;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }

  toJSON(): object {
    return {
      code: this.code,
      message: this.userMessage,
      retryable: this.retryable,
      suggestedAction: this.suggestedAction,
    };
  }
}

export class InvalidDomainError extends DomainCheckerError {
  constructor(domain: string, reason: string) {
    super(
      'INVALID_DOMAIN',
      `Invalid domain: ${domain} - ${reason}`,
      `The domain "${domain}" is not valid: ${reason}`,
      {
        retryable: false,
        suggestedAction:
          'Pass a full domain name such as "example.com" using letters, digits and hyphens.',
      },
    );
    this.name = 'InvalidDomainError';
  }
}

export class InvalidKeywordError extends DomainCheckerError {
  constructor(keyword: string, reason: string) {
    super(
      'INVALID_KEYWORD',
      `Invalid keyword: ${keyword} - ${reason}`,
      `The keyword "${keyword}" cannot be used as a domain label: ${reason}`,
      {
        retryable: false,
        suggestedAction:
          'Use a single label without a dot or extension, e.g. "myapp".',
      },
    );
    this.name = 'InvalidKeywordError';
  }
}

export class UnsupportedTldError extends DomainCheckerError {
  constructor(tld: string, reason: string) {
    super(
      'UNSUPPORTED_TLD',
      `TLD not supported: .${tld} - ${reason}`,
      `The TLD ".${tld}" cannot be checked: ${reason}`,
      {
        retryable: false,
        suggestedAction: 'Remove it from the list or leave "tlds" empty to scan the default TLDs.',
      },
    );
    this.name = 'UnsupportedTldError';
  }
}

/**
 * Error when tool arguments fail schema validation.
 */
export class ValidationError extends DomainCheckerError {
  readonly issues: string[];

  constructor(issues: string[], cause?: Error) {
    super(
      'VALIDATION_ERROR',
      `Invalid arguments: ${issues.join('; ')}`,
      `The tool arguments are invalid: ${issues.join('; ')}`,
      {
        retryable: false,
        suggestedAction: 'Check the tool input schema and try again.',
        cause,
      },
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return new ValidationError(issues, error);
  }
}

export class UnknownToolError extends DomainCheckerError {
  constructor(name: string, availableTools: string[]) {
    super(
      'UNKNOWN_TOOL',
      `Unknown tool: ${name}`,
      `The tool "${name}" is not available.`,
      {
        retryable: false,
        suggestedAction: `Available tools: ${availableTools.join(', ')}`,
      },
    );
    this.name = 'UnknownToolError';
  }
}

export class TimeoutError extends DomainCheckerError {
  constructor(operation: string, timeoutMs: number) {
    super(
      'TIMEOUT',
      `Operation timed out: ${operation} (${timeoutMs}ms)`,
      'The lookup took too long to complete.',
      {
        retryable: true,
        suggestedAction: 'Try again - this might be a temporary network issue.',
      },
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error when an RDAP server cannot be reached or answers with a server error.
 */
export class RdapLookupError extends DomainCheckerError {
  /** HTTP status code if available */
  readonly statusCode?: number;

  constructor(domain: string, message: string, statusCode?: number, cause?: Error) {
    super(
      'RDAP_ERROR',
      `RDAP lookup failed for ${domain}: ${message}`,
      `The registry for "${domain}" could not be queried.`,
      {
        retryable: true,
        suggestedAction: 'Try again in a few minutes.',
        cause,
      },
    );
    this.name = 'RdapLookupError';
    this.statusCode = statusCode;
  }
}

/**
 * Convert any error to a DomainCheckerError.
 */
export function wrapError(error: unknown): DomainCheckerError {
  if (error instanceof DomainCheckerError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZod(error);
  }

  if (error instanceof Error) {
    return new DomainCheckerError(
      'UNKNOWN_ERROR',
      error.message,
      'An unexpected error occurred.',
      {
        retryable: true,
        suggestedAction: 'Try again or report the issue if it persists.',
        cause: error,
      },
    );
  }

  return new DomainCheckerError(
    'UNKNOWN_ERROR',
    String(error),
    'An unexpected error occurred.',
    {
      retryable: true,
      suggestedAction: 'Try again or report the issue if it persists.',
    },
  );
}
