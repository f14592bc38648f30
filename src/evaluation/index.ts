export {
  ConnectionResolver,
  type ConnectionResolverOptions,
  type UnresolvedConnection,
} from './connection-resolver.js';
export {
  RuleExecutor,
  ignoredResult,
  type ExecutionHooks,
  type RuleExecutorOptions,
  type ConditionEvaluatedInfo,
  type ActionStartedInfo,
  type ActionCompletedInfo,
  type ActionFailedInfo,
} from './rule-executor.js';
export { ExecutionError } from './execution-error.js';
