import type { RuleEngineCallback } from '../types/handler.js';
import type { ModuleValues } from '../types/module.js';
import type { IgnoredReason, RuleExecutionResult } from '../types/execution.js';
import { ignoredResult } from '../evaluation/rule-executor.js';

export type FiringRunner = (ruleId: string, triggerId: string, outputs: ModuleValues) => Promise<RuleExecutionResult>;

/**
 * Callback jednoho pravidla, předávaný jeho triggerům.
 *
 * Vzniká jednou pro pravidlo a přežívá re-inicializace. Odpálení
 * téhož pravidla se řadí do fronty, různá pravidla běží souběžně.
 */
export class RuleCallback implements RuleEngineCallback {
  private queue: Promise<unknown> = Promise.resolve();
  private disposedReason: IgnoredReason | null = null;

  constructor(
    readonly ruleId: string,
    private readonly runner: FiringRunner,
    private readonly name: string = 'rule-engine'
  ) {}

  triggered(triggerId: string, outputs: ModuleValues): Promise<RuleExecutionResult> {
    if (this.disposedReason) {
      return Promise.resolve(ignoredResult(this.ruleId, triggerId, this.disposedReason));
    }

    const firing = this.queue.then(async () => {
      if (this.disposedReason) {
        return ignoredResult(this.ruleId, triggerId, this.disposedReason);
      }
      return this.runner(this.ruleId, triggerId, outputs);
    });

    this.queue = firing.catch((error: unknown) => {
      console.error(`[${this.name}] Unexpected failure while firing rule "${this.ruleId}":`, error);
    });

    return firing;
  }

  get isDisposed(): boolean {
    return this.disposedReason !== null;
  }

  /** Další odpálení se zahodí s daným důvodem; běžící doběhne */
  dispose(reason: IgnoredReason = 'rule_removed'): void {
    this.disposedReason ??= reason;
  }
}
