import type {
  ActionModule,
  ConditionModule,
  ConnectedModuleInput,
  ModuleInput,
  TriggerModule,
} from './module.js';

/** Automation rule - triggers fire it, conditions gate it, actions run in order */
export interface Rule {
  id: string;
  name?: string;
  description?: string;

  /** Identifier of the owner or origin of the rule (e.g. the bundle that provided it) */
  scope?: string;

  tags: string[];

  /** Initial enabled flag; the live flag is kept on the rule status */
  enabled: boolean;

  triggers: TriggerModule[];
  conditions: ConditionModule[];
  actions: ActionModule[];

  // Metadata
  version: number;
  createdAt: number;
  updatedAt: number;
}

/** Rule as supplied to `setRule` - kinds are assigned, metadata generated */
export interface RuleInput {
  id: string;
  name?: string;
  description?: string;
  scope?: string;
  tags?: string[];
  enabled?: boolean;
  triggers?: ModuleInput[];
  conditions?: ConnectedModuleInput[];
  actions?: ConnectedModuleInput[];
}
