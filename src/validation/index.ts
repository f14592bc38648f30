/**
 * Shared rule validation module.
 *
 * @module
 */

// Types
export type { IssueSeverity, ValidationIssue, ValidationResult } from './types.js';

// Constants
export { MODULE_LISTS, CONNECTION_FIELDS, OUTPUT_MODULE_KINDS } from './constants.js';
export type { ModuleListField } from './constants.js';

// Validator
export { RuleInputValidator } from './rule-validator.js';
export type { ValidatorOptions } from './rule-validator.js';

// Error
export { ConfigurationError } from './configuration-error.js';
