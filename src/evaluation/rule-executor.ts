import type { ModuleValues } from '../types/module.js';
import type { IgnoredReason, RuleExecutionResult } from '../types/execution.js';
import type { RuntimeAction, RuntimeCondition, RuntimeRule } from '../core/runtime-rule.js';
import type { ConnectionResolver } from './connection-resolver.js';
import { ExecutionError } from './execution-error.js';

/** Informace o vyhodnocené podmínce pro tracing */
export interface ConditionEvaluatedInfo {
  conditionId: string;
  conditionType: string;
  inputs: ModuleValues;
  satisfied: boolean;
  durationMs: number;
}

export interface ActionStartedInfo {
  actionId: string;
  actionType: string;
  inputs: ModuleValues;
}

export interface ActionCompletedInfo {
  actionId: string;
  actionType: string;
  outputs: ModuleValues | undefined;
  durationMs: number;
}

export interface ActionFailedInfo {
  actionId: string;
  actionType: string;
  error: string;
  durationMs: number;
}

/** Volitelné callbacky pro tracing průběhu jednoho odpálení */
export interface ExecutionHooks {
  onConditionEvaluated?: (info: ConditionEvaluatedInfo) => void;
  onActionStarted?: (info: ActionStartedInfo) => void;
  onActionCompleted?: (info: ActionCompletedInfo) => void;
  onActionFailed?: (info: ActionFailedInfo) => void;
}

export interface RuleExecutorOptions {
  name?: string;
}

/**
 * Výsledek odpálení zahozeného ještě před vyhodnocením.
 */
export function ignoredResult(ruleId: string, triggerId: string, reason: IgnoredReason): RuleExecutionResult {
  return { ruleId, triggerId, outcome: 'ignored', reason, actionsExecuted: 0, durationMs: 0 };
}

/**
 * Provede jedno odpálení pravidla: uloží výstupy triggeru, vyhodnotí
 * podmínky (AND, zkrácené vyhodnocení) a spustí akce v pořadí deklarace.
 *
 * Stav pravidla nemění. Chyba handleru ukončí odpálení a vrátí se ve
 * výsledku; ven se nevyhazuje.
 */
export class RuleExecutor {
  private readonly name: string;

  constructor(
    private readonly resolver: ConnectionResolver,
    options: RuleExecutorOptions = {}
  ) {
    this.name = options.name ?? 'rule-engine';
  }

  async execute(
    runtime: RuntimeRule,
    triggerId: string,
    outputs: ModuleValues,
    hooks: ExecutionHooks = {}
  ): Promise<RuleExecutionResult> {
    const startTime = performance.now();
    const trigger = runtime.getTrigger(triggerId);

    if (!trigger) {
      console.warn(`[${this.name}] Rule "${runtime.id}" fired by unknown trigger "${triggerId}"`);
      return ignoredResult(runtime.id, triggerId, 'unknown_trigger');
    }

    trigger.outputs.set(outputs);

    let actionsExecuted = 0;
    let current: RuntimeCondition | RuntimeAction | undefined;

    try {
      for (const condition of runtime.conditions) {
        current = condition;
        const satisfied = await this.evaluateCondition(runtime, condition, hooks);
        if (!satisfied) {
          return {
            ruleId: runtime.id,
            triggerId,
            outcome: 'skipped',
            reason: 'conditions_not_met',
            actionsExecuted: 0,
            durationMs: performance.now() - startTime,
          };
        }
      }

      for (const action of runtime.actions) {
        current = action;
        await this.executeAction(runtime, action, hooks);
        actionsExecuted++;
      }
    } catch (error) {
      const failedModuleId = current?.id ?? triggerId;
      const executionError = error instanceof ExecutionError
        ? error
        : new ExecutionError(
          `Module "${failedModuleId}" of rule "${runtime.id}" failed: ${errorMessage(error)}`,
          runtime.id,
          failedModuleId,
          { cause: error }
        );

      console.error(`[${this.name}] ${executionError.message}`);

      return {
        ruleId: runtime.id,
        triggerId,
        outcome: 'failed',
        actionsExecuted,
        failedModuleId,
        error: executionError.message,
        durationMs: performance.now() - startTime,
      };
    }

    return {
      ruleId: runtime.id,
      triggerId,
      outcome: 'executed',
      actionsExecuted,
      durationMs: performance.now() - startTime,
    };
  }

  private async evaluateCondition(
    runtime: RuntimeRule,
    condition: RuntimeCondition,
    hooks: ExecutionHooks
  ): Promise<boolean> {
    const handler = condition.handler;
    if (!handler) {
      throw new ExecutionError(
        `Condition "${condition.id}" of rule "${runtime.id}" has no handler`,
        runtime.id,
        condition.id
      );
    }

    const startTime = performance.now();
    const inputs = this.resolver.getInputs(runtime, condition);
    const satisfied = await handler.isSatisfied(inputs);

    hooks.onConditionEvaluated?.({
      conditionId: condition.id,
      conditionType: condition.module.type,
      inputs,
      satisfied,
      durationMs: performance.now() - startTime,
    });

    return satisfied;
  }

  private async executeAction(
    runtime: RuntimeRule,
    action: RuntimeAction,
    hooks: ExecutionHooks
  ): Promise<void> {
    const handler = action.handler;
    if (!handler) {
      throw new ExecutionError(
        `Action "${action.id}" of rule "${runtime.id}" has no handler`,
        runtime.id,
        action.id
      );
    }

    const startTime = performance.now();
    const inputs = this.resolver.getInputs(runtime, action);
    hooks.onActionStarted?.({ actionId: action.id, actionType: action.module.type, inputs });

    try {
      const result = await handler.execute(inputs);
      const outputs = isModuleValues(result) ? result : undefined;
      // void nechává předchozí výstupy beze změny
      if (outputs) {
        action.outputs.set(outputs);
      }

      hooks.onActionCompleted?.({
        actionId: action.id,
        actionType: action.module.type,
        outputs,
        durationMs: performance.now() - startTime,
      });
    } catch (error) {
      hooks.onActionFailed?.({
        actionId: action.id,
        actionType: action.module.type,
        error: errorMessage(error),
        durationMs: performance.now() - startTime,
      });
      throw error;
    }
  }
}

function isModuleValues(value: unknown): value is ModuleValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
