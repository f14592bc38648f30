/**
 * Shared validation constants.
 *
 * @module
 */

import type { ModuleKind } from '../types/module.js';

/** Rule fields holding module lists, with the kind their modules get. */
export const MODULE_LISTS = [
  { field: 'triggers', kind: 'trigger' },
  { field: 'conditions', kind: 'condition' },
  { field: 'actions', kind: 'action' },
] as const satisfies readonly { field: string; kind: ModuleKind }[];

export type ModuleListField = (typeof MODULE_LISTS)[number]['field'];

/** Required string fields of a connection. */
export const CONNECTION_FIELDS = ['inputName', 'sourceModuleId', 'sourceOutputName'] as const;

/** Module kinds whose outputs a connection may point at. */
export const OUTPUT_MODULE_KINDS: readonly ModuleKind[] = ['trigger', 'action'];
