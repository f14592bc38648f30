/**
 * Connection validation.
 *
 * Shape errors are reported here. Targets that do not exist or produce no
 * outputs are binding-time errors recorded on the rule status; in strict
 * mode they are also reported as warnings.
 *
 * @module
 */

import { CONNECTION_FIELDS, OUTPUT_MODULE_KINDS } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty } from '../types.js';

export function validateConnections(
  modules: unknown,
  path: string,
  collector: IssueCollector,
  strict: boolean,
): void {
  if (!Array.isArray(modules)) {
    return;
  }

  for (let i = 0; i < modules.length; i++) {
    const module = modules[i];
    if (!isObject(module) || !hasProperty(module, 'connections')) {
      continue;
    }

    const connectionsPath = `${path}[${i}].connections`;
    const connections = module['connections'];
    if (!Array.isArray(connections)) {
      collector.addError(connectionsPath, 'Connections must be an array');
      continue;
    }

    const inputNames = new Set<string>();
    for (let j = 0; j < connections.length; j++) {
      validateConnection(connections[j], module['id'], `${connectionsPath}[${j}]`, inputNames, collector, strict);
    }
  }
}

function validateConnection(
  connection: unknown,
  moduleId: unknown,
  path: string,
  inputNames: Set<string>,
  collector: IssueCollector,
  strict: boolean,
): void {
  if (!isObject(connection)) {
    collector.addError(path, 'Connection must be an object');
    return;
  }

  let shapeValid = true;
  for (const field of CONNECTION_FIELDS) {
    const value = connection[field];
    if (typeof value !== 'string' || value.trim() === '') {
      collector.addError(`${path}.${field}`, `Connection field "${field}" must be a non-empty string`);
      shapeValid = false;
    }
  }
  if (!shapeValid) return;

  const inputName = String(connection['inputName']);
  if (inputNames.has(inputName)) {
    collector.addError(`${path}.inputName`, `Input "${inputName}" is connected more than once`);
  }
  inputNames.add(inputName);

  if (!strict) return;

  const sourceId = String(connection['sourceModuleId']);
  const sourceKind = collector.kindOf(sourceId);
  if (sourceKind === undefined) {
    collector.addWarning(`${path}.sourceModuleId`, `Connection source "${sourceId}" does not exist in the rule`);
  } else if (!OUTPUT_MODULE_KINDS.includes(sourceKind)) {
    collector.addWarning(`${path}.sourceModuleId`, `Connection source "${sourceId}" is a ${sourceKind} and has no outputs`);
  } else if (sourceId === moduleId) {
    collector.addWarning(`${path}.sourceModuleId`, 'Module is connected to its own output');
  }
}
