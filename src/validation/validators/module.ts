/**
 * Module validation.
 *
 * @module
 */

import type { ModuleKind } from '../../types/module.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty } from '../types.js';
import { MODULE_TYPE_SEPARATOR } from '../../utils/module-type.js';

/**
 * Validates a list of modules of one kind and records their ids on the
 * collector. Duplicate ids are reported across all lists of the rule.
 */
export function validateModules(
  modules: unknown,
  kind: ModuleKind,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(modules)) {
    collector.addError(path, `Field must be an array of ${kind} modules`);
    return;
  }

  for (let i = 0; i < modules.length; i++) {
    validateModule(modules[i], kind, `${path}[${i}]`, collector);
  }
}

function validateModule(
  module: unknown,
  kind: ModuleKind,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(module)) {
    collector.addError(path, 'Module must be an object');
    return;
  }

  if (!hasProperty(module, 'id')) {
    collector.addError(`${path}.id`, 'Module must have an "id" field');
  } else if (typeof module['id'] !== 'string') {
    collector.addError(`${path}.id`, 'Module id must be a string');
  } else if (module['id'].trim() === '') {
    collector.addError(`${path}.id`, 'Module id cannot be empty');
  } else if (!collector.declareModule(module['id'], kind)) {
    collector.addError(`${path}.id`, `Duplicate module id: ${module['id']}`);
  }

  validateModuleType(module['type'], `${path}.type`, collector);

  if (hasProperty(module, 'configuration') && !isObject(module['configuration'])) {
    collector.addError(`${path}.configuration`, 'Module configuration must be an object');
  }

  for (const field of ['label', 'description']) {
    if (hasProperty(module, field) && typeof module[field] !== 'string') {
      collector.addError(`${path}.${field}`, `Module ${field} must be a string`);
    }
  }

  if (kind === 'trigger' && hasProperty(module, 'connections')) {
    collector.addWarning(`${path}.connections`, 'Triggers have no inputs; connections are ignored');
  }
}

function validateModuleType(type: unknown, path: string, collector: IssueCollector): void {
  if (type === undefined || type === null) {
    collector.addError(path, 'Module must have a "type" field');
  } else if (typeof type !== 'string') {
    collector.addError(path, 'Module type must be a string');
  } else if (type.trim() === '') {
    collector.addError(path, 'Module type cannot be empty');
  } else if (type.startsWith(MODULE_TYPE_SEPARATOR)) {
    collector.addError(path, `Module type cannot start with "${MODULE_TYPE_SEPARATOR}": ${type}`);
  }
}
