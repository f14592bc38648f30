import type { Module, ModuleValues } from './module.js';
import type { RuleExecutionResult } from './execution.js';

/**
 * Per-rule callback handed to trigger handlers.
 *
 * A trigger handler calls `triggered` whenever it decides to fire; the
 * returned promise settles once the rule finished evaluating that firing.
 */
export interface RuleEngineCallback {
  readonly ruleId: string;
  triggered(triggerId: string, outputs: ModuleValues): Promise<RuleExecutionResult>;
}

interface HandlerBase {
  /** Releases resources held by the handler; called when its module is unbound */
  dispose?(): void;
}

export interface TriggerHandler extends HandlerBase {
  readonly kind: 'trigger';

  /** `null` detaches the handler - it must stop firing */
  setCallback(callback: RuleEngineCallback | null): void;
}

export interface ConditionHandler extends HandlerBase {
  readonly kind: 'condition';
  isSatisfied(inputs: ModuleValues): boolean | Promise<boolean>;
}

export interface ActionHandler extends HandlerBase {
  readonly kind: 'action';
  execute(inputs: ModuleValues): ModuleValues | void | Promise<ModuleValues | void>;
}

export type ModuleHandler = TriggerHandler | ConditionHandler | ActionHandler;

/**
 * Provider of module handlers.
 *
 * A factory serves one or more system module types. It owns the handlers it
 * creates: the engine hands them back through `release` (or, when the factory
 * has none, calls the handler's own `dispose`).
 */
export interface HandlerFactory {
  getTypes(): Iterable<string>;
  create(module: Module, ruleId: string): ModuleHandler | null | undefined;
  release?(module: Module, handler: ModuleHandler, ruleId: string): void;
}
