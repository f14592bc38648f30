/** How a single trigger firing ended */
export type ExecutionOutcome =
  | 'executed'    // conditions satisfied, all actions ran
  | 'skipped'     // a condition was not satisfied
  | 'failed'      // a condition or action handler threw
  | 'ignored';    // firing dropped before evaluation

export type IgnoredReason =
  | 'rule_disabled'
  | 'rule_not_initialized'
  | 'rule_removed'
  | 'unknown_trigger'
  | 'engine_disposed';

/** Result of one trigger firing, returned to the trigger handler that fired it */
export interface RuleExecutionResult {
  ruleId: string;
  triggerId: string;
  outcome: ExecutionOutcome;
  reason?: IgnoredReason | 'conditions_not_met';
  actionsExecuted: number;
  failedModuleId?: string;
  error?: string;
  durationMs: number;
}
