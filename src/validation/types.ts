/**
 * Validation result types and the issue collector shared by validators.
 *
 * @module
 */

import type { ModuleKind } from '../types/module.js';

export type IssueSeverity = 'error' | 'warning';

/** One problem found in a rule input; `path` points into the input (e.g. `actions[0].id`) */
export interface ValidationIssue {
  path: string;
  message: string;
  severity: IssueSeverity;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Sbírá nálezy jednoho validačního běhu.
 *
 * Kromě nálezů drží moduly aktuálního pravidla (id → druh), aby šlo
 * hlásit duplicitní id napříč seznamy a kontrolovat zdroje propojení.
 */
export class IssueCollector {
  private readonly issues: ValidationIssue[] = [];
  private readonly modules = new Map<string, ModuleKind>();

  addError(path: string, message: string): void {
    this.add(path, message, 'error');
  }

  addWarning(path: string, message: string): void {
    this.add(path, message, 'warning');
  }

  /** Začíná nové pravidlo - zapomene moduly předchozího */
  startRule(): void {
    this.modules.clear();
  }

  /**
   * Zapamatuje si modul pravidla.
   * @returns false, pokud modul s tímto id už v pravidle je
   */
  declareModule(id: string, kind: ModuleKind): boolean {
    if (this.modules.has(id)) return false;
    this.modules.set(id, kind);
    return true;
  }

  kindOf(moduleId: string): ModuleKind | undefined {
    return this.modules.get(moduleId);
  }

  toResult(): ValidationResult {
    const errors = this.issues.filter(issue => issue.severity === 'error');
    return {
      valid: errors.length === 0,
      errors,
      warnings: this.issues.filter(issue => issue.severity === 'warning'),
    };
  }

  private add(path: string, message: string, severity: IssueSeverity): void {
    this.issues.push({ path: path || '(root)', message, severity });
  }
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasProperty(obj: unknown, prop: string): boolean {
  return isObject(obj) && prop in obj;
}
