/**
 * Error thrown when a rule definition or module type id is malformed.
 *
 * Compatible with an HTTP error handler (`statusCode` + `code` pattern).
 * Never stored on a rule status - it is raised to the caller instead.
 *
 * @module
 */

import type { ValidationIssue } from './types.js';

export class ConfigurationError extends Error {
  readonly statusCode = 400;
  readonly code = 'CONFIGURATION_ERROR';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  /** Exposes issues as `details` for an API error handler. */
  get details(): ValidationIssue[] {
    return this.issues;
  }
}
