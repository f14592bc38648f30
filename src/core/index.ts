export { RuleEngine } from './rule-engine.js';
export { RuleManager } from './rule-manager.js';
export { RuleStatusTracker } from './rule-status-tracker.js';
export { HandlerRegistry } from './handler-registry.js';
export { Binder, type BinderOptions } from './binder.js';
export { RuleCallback, type FiringRunner } from './rule-callback.js';
export { FactoryTracker, type FactoryEvent, type FactoryEventHandlers } from './factory-tracker.js';
export {
  OutputHolder,
  OutputRef,
  RuntimeRule,
  RuntimeTrigger,
  RuntimeCondition,
  RuntimeAction,
  type AnyRuntimeModule,
  type RuntimeConnectedModule,
  type RuntimeOutputModule,
} from './runtime-rule.js';
