/**
 * Main rule input validator.
 *
 * Validates one or many rule inputs and returns all issues (errors + warnings)
 * rather than throwing on the first problem.
 *
 * @module
 */

import { IssueCollector, isObject, hasProperty } from './types.js';
import type { ValidationResult } from './types.js';
import { MODULE_LISTS } from './constants.js';
import { validateModules } from './validators/module.js';
import { validateConnections } from './validators/connection.js';

/** Options for {@link RuleInputValidator}. */
export interface ValidatorOptions {
  /** When true, reports connections to missing or non-output modules as warnings. */
  strict?: boolean;
}

type RuleRecord = Record<string, unknown>;

/**
 * Validates rule inputs against the expected schema.
 *
 * ```ts
 * const v = new RuleInputValidator();
 * const result = v.validate(unknownInput);
 * if (!result.valid) { … }
 * ```
 */
export class RuleInputValidator {
  private readonly strict: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /** Validates a single rule input. */
  validate(input: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!isObject(input)) {
      collector.addError('', 'Rule must be an object');
      return collector.toResult();
    }

    this.validateRule(input, '', collector);
    return collector.toResult();
  }

  /** Validates an array of rule inputs, including duplicate-ID detection. */
  validateMany(inputs: unknown): ValidationResult {
    const collector = new IssueCollector();

    if (!Array.isArray(inputs)) {
      collector.addError('', 'Input must be an array of rules');
      return collector.toResult();
    }

    const ids = new Set<string>();

    for (let i = 0; i < inputs.length; i++) {
      const rule: unknown = inputs[i];
      const prefix = `[${i}]`;

      if (!isObject(rule)) {
        collector.addError(prefix, 'Rule must be an object');
        continue;
      }

      if (hasProperty(rule, 'id') && typeof rule['id'] === 'string') {
        const id = rule['id'];
        if (ids.has(id)) {
          collector.addError(`${prefix}.id`, `Duplicate rule ID: ${id}`);
        } else {
          ids.add(id);
        }
      }

      this.validateRule(rule, prefix, collector);
    }

    return collector.toResult();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private validateRule(rule: RuleRecord, prefix: string, collector: IssueCollector): void {
    collector.startRule();

    this.validateRequiredFields(rule, prefix, collector);
    this.validateOptionalFields(rule, prefix, collector);

    for (const { field, kind } of MODULE_LISTS) {
      if (hasProperty(rule, field)) {
        validateModules(rule[field], kind, this.fieldPath(prefix, field), collector);
      }
    }

    // Connection targets can point at any list, so they are checked once all ids are known
    for (const field of ['conditions', 'actions'] as const) {
      if (hasProperty(rule, field)) {
        validateConnections(rule[field], this.fieldPath(prefix, field), collector, this.strict);
      }
    }

    const triggers = rule['triggers'];
    if (!Array.isArray(triggers) || triggers.length === 0) {
      collector.addWarning(this.fieldPath(prefix, 'triggers'), 'Rule has no triggers and will never fire');
    }
  }

  private validateRequiredFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    if (!hasProperty(rule, 'id')) {
      collector.addError(this.fieldPath(prefix, 'id'), 'Required field "id" is missing');
    } else if (typeof rule['id'] !== 'string') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" must be a string');
    } else if (rule['id'].trim() === '') {
      collector.addError(this.fieldPath(prefix, 'id'), 'Field "id" cannot be empty');
    }
  }

  private validateOptionalFields(
    rule: RuleRecord,
    prefix: string,
    collector: IssueCollector,
  ): void {
    for (const field of ['name', 'description']) {
      if (hasProperty(rule, field) && typeof rule[field] !== 'string') {
        collector.addError(this.fieldPath(prefix, field), `Field "${field}" must be a string`);
      }
    }

    if (hasProperty(rule, 'enabled') && typeof rule['enabled'] !== 'boolean') {
      collector.addError(
        this.fieldPath(prefix, 'enabled'),
        'Field "enabled" must be a boolean',
      );
    }

    if (hasProperty(rule, 'tags')) {
      const tags = rule['tags'];
      if (!Array.isArray(tags)) {
        collector.addError(this.fieldPath(prefix, 'tags'), 'Field "tags" must be an array');
      } else {
        for (let i = 0; i < tags.length; i++) {
          if (typeof tags[i] !== 'string') {
            collector.addError(this.fieldPath(prefix, `tags[${i}]`), 'Tag must be a string');
          }
        }
      }
    }

    if (hasProperty(rule, 'scope')) {
      if (typeof rule['scope'] !== 'string') {
        collector.addError(this.fieldPath(prefix, 'scope'), 'Field "scope" must be a string');
      } else if (rule['scope'].trim() === '') {
        collector.addError(this.fieldPath(prefix, 'scope'), 'Field "scope" cannot be empty');
      }
    }
  }

  private fieldPath(prefix: string, field: string): string {
    return prefix ? `${prefix}.${field}` : field;
  }
}
