/**
 * Error types for the quality gate.
 *
 * Quality failures are never errors: a failed gate is reported as data
 * (`final_status: 'FAIL'`) and content violations as critical issues.
 */

import type { z } from 'zod';

/**
 * Malformed Pattern/AntiPattern input. Raised by the ContentValidator
 * constructor and never retried.
 */
export class RuleDefinitionError extends Error {
  readonly issues: readonly string[];

  constructor(kind: 'pattern' | 'anti-pattern', issues: readonly string[]) {
    super(`Invalid ${kind} definition: ${issues.join('; ')}`);
    this.name = 'RuleDefinitionError';
    this.issues = issues;
  }

  static fromZodError(kind: 'pattern' | 'anti-pattern', error: z.ZodError): RuleDefinitionError {
    return new RuleDefinitionError(kind, formatZodIssues(error));
  }
}

/**
 * Inconsistent or out-of-range configuration values.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Quality gate config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * The caller aborted a retry loop between attempts.
 */
export class RetryCancelledError extends Error {
  readonly attempt: number;

  constructor(context: string, attempt: number) {
    super(`${context} was cancelled before attempt ${attempt + 1}`);
    this.name = 'RetryCancelledError';
    this.attempt = attempt;
  }
}

/**
 * Converts Zod issues to "path: message" strings.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}
