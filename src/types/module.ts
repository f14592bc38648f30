/** Module category - determines which handler capability a module binds to */
export type ModuleKind = 'trigger' | 'condition' | 'action';

/** Named values produced by a trigger or action, or consumed by a condition or action */
export type ModuleValues = Record<string, unknown>;

/** Static wiring of one input to an output of another module in the same rule */
export interface Connection {
  inputName: string;
  sourceModuleId: string;
  sourceOutputName: string;
}

interface ModuleBase {
  /** Unique within the owning rule */
  id: string;

  /**
   * Module type identifier. Anything after the first ':' is a sub-type;
   * handlers are looked up by the part before it ("timer:daily" → "timer").
   */
  type: string;

  configuration: Record<string, unknown>;
  label?: string;
  description?: string;
}

export interface TriggerModule extends ModuleBase {
  kind: 'trigger';
}

export interface ConditionModule extends ModuleBase {
  kind: 'condition';
  connections: Connection[];
}

export interface ActionModule extends ModuleBase {
  kind: 'action';
  connections: Connection[];
}

/** Trigger, condition or action - dispatch on `kind` */
export type Module = TriggerModule | ConditionModule | ActionModule;

/** Module definition as supplied by the caller - kind comes from the list it sits in */
export interface ModuleInput {
  id: string;
  type: string;
  configuration?: Record<string, unknown>;
  label?: string;
  description?: string;
}

export interface ConnectedModuleInput extends ModuleInput {
  connections?: Connection[];
}
