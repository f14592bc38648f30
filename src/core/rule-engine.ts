import type { Rule, RuleInput } from '../types/rule.js';
import type { ModuleValues } from '../types/module.js';
import type { HandlerFactory } from '../types/handler.js';
import type { RuleExecutionResult } from '../types/execution.js';
import type { RuleStatus, RuleStatusListener } from '../types/status.js';
import { missingHandlerError } from '../types/status.js';
import type { RuleEngineConfig, EngineStats } from '../types/index.js';
import { RuleInputValidator, ConfigurationError } from '../validation/index.js';
import type { ValidationResult } from '../validation/index.js';
import { RuleManager } from './rule-manager.js';
import { RuleStatusTracker } from './rule-status-tracker.js';
import { HandlerRegistry } from './handler-registry.js';
import { Binder } from './binder.js';
import { RuleCallback } from './rule-callback.js';
import { FactoryTracker } from './factory-tracker.js';
import { RuntimeRule } from './runtime-rule.js';
import { ConnectionResolver } from '../evaluation/connection-resolver.js';
import { RuleExecutor, ignoredResult, type ExecutionHooks } from '../evaluation/rule-executor.js';
import { generateId } from '../utils/id-generator.js';
import { getSystemModuleType } from '../utils/module-type.js';
import { TraceCollector } from '../debugging/trace-collector.js';

type Unsubscribe = () => void;

interface EngineInternals {
  firingsReceived: number;
  totalRulesExecuted: number;
  executionFailures: number;
  totalProcessingTimeMs: number;
}

/**
 * Hlavní orchestrátor rule enginu.
 *
 * Spojuje všechny komponenty a poskytuje unified API pro:
 * - Správu pravidel (set, remove, enable, query podle tagů a scope)
 * - Registraci handler factories
 * - Dotazy na status pravidel
 *
 * Pravidla se inicializují, jakmile jsou k dispozici handlery pro všechny
 * jejich moduly. Factories mohou přicházet a odcházet kdykoliv; dotčená
 * pravidla se znovu navážou.
 */
export class RuleEngine {
  private readonly ruleManager: RuleManager;
  private readonly statuses: RuleStatusTracker;
  private readonly registry: HandlerRegistry;
  private readonly binder: Binder;
  private readonly executor: RuleExecutor;
  private readonly traceCollector: TraceCollector;
  private readonly config: Required<Omit<RuleEngineConfig, 'tracing'>>;
  private readonly validator: RuleInputValidator;

  private readonly runtimes: Map<string, RuntimeRule> = new Map();
  private readonly callbacks: Map<string, RuleCallback> = new Map();

  private readonly internals: EngineInternals = {
    firingsReceived: 0,
    totalRulesExecuted: 0,
    executionFailures: 0,
    totalProcessingTimeMs: 0
  };

  private tracker: FactoryTracker | null = null;
  private disposed = false;

  private constructor(
    ruleManager: RuleManager,
    traceCollector: TraceCollector,
    config: RuleEngineConfig
  ) {
    this.ruleManager = ruleManager;
    this.traceCollector = traceCollector;

    this.config = {
      name: config.name ?? 'rule-engine'
    };

    const name = this.config.name;
    this.validator = new RuleInputValidator();
    this.statuses = new RuleStatusTracker(name);
    this.registry = new HandlerRegistry();

    this.binder = new Binder(this.registry, this.statuses, {
      name,
      onInitialized: runtime => {
        this.traceCollector.record('rule_initialized', {}, { ruleId: runtime.id });
      },
      onUninitialized: (runtime, errors) => {
        this.traceCollector.record('rule_uninitialized', {
          errors: errors.map(e => ({ code: e.code, message: e.message })),
        }, { ruleId: runtime.id });
      },
    });

    const resolver = new ConnectionResolver({
      name,
      onUnresolved: connection => {
        this.traceCollector.record('connection_unresolved', { ...connection }, {
          ruleId: connection.ruleId,
          moduleId: connection.moduleId,
        });
      },
    });
    this.executor = new RuleExecutor(resolver, { name });
  }

  /**
   * Vytvoří a spustí novou instanci RuleEngine.
   */
  static async start(config: RuleEngineConfig = {}): Promise<RuleEngine> {
    const ruleManager = await RuleManager.start();
    const traceCollector = await TraceCollector.start({
      enabled: config.tracing?.enabled ?? false,
      maxEntries: config.tracing?.maxEntries ?? 10_000
    });

    const engine = new RuleEngine(ruleManager, traceCollector, config);
    engine.tracker = await FactoryTracker.start({
      onFactoryAdded: factory => engine.handleFactoryAdded(factory),
      onFactoryRemoved: factory => engine.handleFactoryRemoved(factory),
    }, engine.config.name);

    return engine;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          SPRÁVA PRAVIDEL
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Validuje pravidlo bez registrace (dry-run).
   */
  validateRule(input: unknown): ValidationResult {
    return this.validator.validate(input);
  }

  /**
   * Přidá nebo nahradí pravidlo a pokusí se ho inicializovat.
   *
   * Vstup je před registrací validován. Pokud validace selže, throwne
   * {@link ConfigurationError} se seznamem nalezených chyb. Při nahrazení
   * se handlery původní definice uvolní; enabled příznak ze statusu zůstává.
   */
  setRule(input: RuleInput): Rule {
    this.ensureRunning();

    const result = this.validator.validate(input);
    if (!result.valid) {
      throw new ConfigurationError('Rule validation failed', result.errors);
    }

    const previous = this.runtimes.get(input.id);
    if (previous) {
      this.binder.release(previous);
    }

    const rule = this.ruleManager.register(input);
    const runtime = new RuntimeRule(rule);
    this.runtimes.set(rule.id, runtime);

    this.statuses.create(rule.id, rule.enabled);
    this.statuses.indexRule(rule.id, runtime.modules().map(m => getSystemModuleType(m.module.type)));

    this.binder.bind(runtime, this.callbackFor(rule.id));
    return rule;
  }

  /**
   * Odebere pravidlo - odpojí triggery, uvolní handlery a smaže status.
   *
   * @returns odebrané pravidlo, nebo undefined pro neznámé ID
   */
  removeRule(ruleId: string): Rule | undefined {
    this.ensureRunning();

    const runtime = this.runtimes.get(ruleId);
    if (!runtime) return undefined;

    const wasInitialized = this.statuses.get(ruleId)?.initialized ?? false;

    this.binder.release(runtime);
    this.runtimes.delete(ruleId);
    this.callbacks.get(ruleId)?.dispose();
    this.callbacks.delete(ruleId);
    this.statuses.delete(ruleId);

    if (wasInitialized) {
      this.traceCollector.record('rule_uninitialized', { removed: true }, { ruleId });
    }
    console.debug(`[${this.config.name}] Rule removed: ${ruleId}`);

    return this.ruleManager.unregister(ruleId);
  }

  /**
   * Získá pravidlo podle ID.
   */
  getRule(ruleId: string): Rule | undefined {
    return this.ruleManager.get(ruleId);
  }

  /**
   * Vrátí všechna registrovaná pravidla.
   */
  getRules(): Rule[] {
    return this.ruleManager.getAll();
  }

  /** Pravidla s daným tagem; bez tagu všechna */
  getRulesByTag(tag?: string): Rule[] {
    return this.ruleManager.getByTag(tag);
  }

  /** Pravidla s alespoň jedním z tagů; bez tagů všechna */
  getRulesByTags(tags?: Iterable<string>): Rule[] {
    return this.ruleManager.getByTags(tags);
  }

  getScopeIds(): string[] {
    return this.ruleManager.getScopeIds();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                            STATUS PRAVIDEL
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Povolí / zakáže pravidlo. Handlery ani triggery se nemění.
   * @returns false pro neznámé pravidlo
   */
  setEnabled(ruleId: string, enabled: boolean): boolean {
    this.ensureRunning();
    return this.statuses.setEnabled(ruleId, enabled);
  }

  getStatus(ruleId: string): RuleStatus | undefined {
    return this.statuses.get(ruleId);
  }

  /** True, pokud pravidlo právě zpracovává odpálení */
  isRunning(ruleId: string): boolean {
    return this.statuses.get(ruleId)?.running ?? false;
  }

  /**
   * Přihlásí listener na změny statusu pravidel.
   */
  onStatusChange(listener: RuleStatusListener): Unsubscribe {
    return this.statuses.onChange(listener);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          HANDLER FACTORIES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Zaregistruje factory a znovu naváže neinicializovaná pravidla, která
   * potřebují některý z jejích typů. Promise se splní po dokončení průchodu.
   */
  registerFactory(factory: HandlerFactory): Promise<void> {
    this.ensureRunning();
    return this.factoryTracker.added(factory);
  }

  /**
   * Odebere factory. Pravidla s jejími handlery se deinicializují a
   * případně navážou na jinou factory stejného typu.
   */
  unregisterFactory(factory: HandlerFactory): Promise<void> {
    this.ensureRunning();
    return this.factoryTracker.removed(factory);
  }

  /** Systémové typy, pro které je registrována alespoň jedna factory */
  getFactoryTypes(): string[] {
    return this.registry.getTypes();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                            STATISTIKY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Vrátí statistiky enginu.
   */
  getStats(): EngineStats {
    const { firingsReceived, totalRulesExecuted, executionFailures, totalProcessingTimeMs } = this.internals;
    const tracing = this.traceCollector.getStats();

    return {
      rulesCount: this.ruleManager.size,
      initializedRulesCount: this.statuses.initializedCount,
      factoriesCount: this.registry.factoriesCount,
      moduleTypesCount: this.registry.getTypes().length,
      firingsReceived,
      rulesExecuted: totalRulesExecuted,
      executionFailures,
      avgProcessingTimeMs: totalRulesExecuted > 0
        ? totalProcessingTimeMs / totalRulesExecuted
        : 0,
      factoryEventsProcessed: this.tracker?.processedCount ?? 0,
      tracing: {
        enabled: this.traceCollector.isEnabled(),
        entriesCount: tracing.entriesCount,
        maxEntries: tracing.maxEntries
      }
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                              TRACING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Povolí debugging tracing.
   */
  enableTracing(): void {
    this.traceCollector.enable();
  }

  /**
   * Zakáže debugging tracing.
   */
  disableTracing(): void {
    this.traceCollector.disable();
  }

  isTracingEnabled(): boolean {
    return this.traceCollector.isEnabled();
  }

  /**
   * Vrátí TraceCollector pro přímý přístup k trace entries.
   */
  getTraceCollector(): TraceCollector {
    return this.traceCollector;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                            LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Zastaví engine a uvolní všechny prostředky. Opakované volání nic nedělá.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    await this.tracker?.stop();

    for (const [ruleId, runtime] of this.runtimes) {
      this.binder.release(runtime);
      this.callbacks.get(ruleId)?.dispose('engine_disposed');
      this.statuses.delete(ruleId);
    }

    this.runtimes.clear();
    this.callbacks.clear();
    this.ruleManager.clear();
    this.registry.clear();
    this.statuses.clearListeners();

    console.debug(`[${this.config.name}] Engine disposed`);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                         INTERNÍ METODY
  // ═══════════════════════════════════════════════════════════════════════════

  private handleFactoryAdded(factory: HandlerFactory): void {
    const previousTypes = this.registry.typesOf(factory);
    const types = this.registry.register(factory);
    const droppedTypes = previousTypes.filter(type => !types.includes(type));

    this.traceCollector.record('factory_registered', { types });
    console.debug(`[${this.config.name}] Factory registered for types: ${types.join(', ')}`);

    // Opakovaná registrace může typy ubrat - jako by je factory odebrala
    if (droppedTypes.length > 0) {
      this.detachFactory(factory, droppedTypes);
    }

    for (const ruleId of this.statuses.getRulesByTypes(types)) {
      if (!this.statuses.get(ruleId)?.initialized) {
        this.rebind(ruleId);
      }
    }
  }

  private handleFactoryRemoved(factory: HandlerFactory): void {
    const types = this.registry.unregister(factory);
    if (!types) return;

    this.traceCollector.record('factory_unregistered', { types });
    console.debug(`[${this.config.name}] Factory unregistered for types: ${types.join(', ')}`);

    this.detachFactory(factory, types);
  }

  /**
   * Odpojí pravidla od handlerů, které factory vytvořila pro dané typy.
   *
   * Pokud všechny ztracené typy převezme jiná factory, pravidlo projde
   * přes UNINITIALIZED a naváže se znovu. Jinak zůstane neinicializované
   * s chybami jen pro typy, které opravdu chybí. Neinicializovaným
   * pravidlům se jen obnoví seznam chyb.
   */
  private detachFactory(factory: HandlerFactory, types: string[]): void {
    for (const ruleId of this.statuses.getRulesByTypes(types)) {
      const runtime = this.runtimes.get(ruleId);
      if (!runtime) continue;

      if (!this.statuses.get(ruleId)?.initialized) {
        this.rebind(ruleId);
        continue;
      }

      const lost = new Map<string, string[]>();
      for (const module of runtime.modules()) {
        const type = getSystemModuleType(module.module.type);
        if (module.factory === factory && types.includes(type)) {
          lost.set(type, [...(lost.get(type) ?? []), module.id]);
        }
      }
      if (lost.size === 0) continue;

      if ([...lost.keys()].every(type => this.registry.get(type) !== undefined)) {
        this.binder.unbind(runtime, [...lost].map(([type, moduleIds]) => missingHandlerError(type, moduleIds)));
      } else {
        // Chyby zapíše až binder
        this.binder.release(runtime);
      }
      this.rebind(ruleId);
    }
  }

  private rebind(ruleId: string): void {
    const runtime = this.runtimes.get(ruleId);
    if (runtime) {
      this.binder.bind(runtime, this.callbackFor(ruleId));
    }
  }

  /** Callback pravidla - vzniká jednou a přežívá re-inicializace */
  private callbackFor(ruleId: string): RuleCallback {
    let callback = this.callbacks.get(ruleId);
    if (!callback) {
      callback = new RuleCallback(
        ruleId,
        (id, triggerId, outputs) => this.fire(id, triggerId, outputs),
        this.config.name
      );
      this.callbacks.set(ruleId, callback);
    }
    return callback;
  }

  /**
   * Zpracuje jedno odpálení. Volá se z fronty pravidla, takže odpálení
   * téhož pravidla se nikdy nepřekrývají.
   */
  private async fire(ruleId: string, triggerId: string, outputs: ModuleValues): Promise<RuleExecutionResult> {
    this.internals.firingsReceived++;

    if (this.disposed) {
      return ignoredResult(ruleId, triggerId, 'engine_disposed');
    }

    const runtime = this.runtimes.get(ruleId);
    const status = this.statuses.get(ruleId);

    if (!runtime || !status) {
      return ignoredResult(ruleId, triggerId, 'rule_removed');
    }
    if (!status.initialized) {
      return ignoredResult(ruleId, triggerId, 'rule_not_initialized');
    }
    if (!status.enabled) {
      return ignoredResult(ruleId, triggerId, 'rule_disabled');
    }

    const firingId = generateId();
    this.traceCollector.record('rule_triggered', {
      triggerId,
      outputs: { ...outputs },
    }, { firingId, ruleId, moduleId: triggerId });

    this.statuses.setRunning(ruleId, true);
    let result: RuleExecutionResult;
    try {
      result = await this.executor.execute(runtime, triggerId, outputs, this.executionHooks(ruleId, firingId));
    } finally {
      this.statuses.setRunning(ruleId, false);
    }

    this.recordResult(result, firingId);
    return result;
  }

  private recordResult(result: RuleExecutionResult, firingId: string): void {
    const options = { firingId, ruleId: result.ruleId, durationMs: result.durationMs };

    switch (result.outcome) {
      case 'executed':
        this.internals.totalRulesExecuted++;
        this.internals.totalProcessingTimeMs += result.durationMs;
        this.traceCollector.record('rule_executed', {
          triggerId: result.triggerId,
          actionsExecuted: result.actionsExecuted,
        }, options);
        break;
      case 'skipped':
        this.traceCollector.record('rule_skipped', {
          triggerId: result.triggerId,
          reason: result.reason,
        }, options);
        break;
      case 'failed':
        this.internals.executionFailures++;
        this.traceCollector.record('rule_failed', {
          triggerId: result.triggerId,
          actionsExecuted: result.actionsExecuted,
          error: result.error,
        }, {
          ...options,
          ...(result.failedModuleId !== undefined && { moduleId: result.failedModuleId }),
        });
        break;
      case 'ignored':
        break;
    }
  }

  private executionHooks(ruleId: string, firingId: string): ExecutionHooks {
    if (!this.traceCollector.isEnabled()) {
      return {};
    }

    return {
      onConditionEvaluated: info => {
        this.traceCollector.record('condition_evaluated', { ...info }, {
          firingId, ruleId, moduleId: info.conditionId, durationMs: info.durationMs
        });
      },
      onActionStarted: info => {
        this.traceCollector.record('action_started', { ...info }, {
          firingId, ruleId, moduleId: info.actionId
        });
      },
      onActionCompleted: info => {
        this.traceCollector.record('action_completed', { ...info }, {
          firingId, ruleId, moduleId: info.actionId, durationMs: info.durationMs
        });
      },
      onActionFailed: info => {
        this.traceCollector.record('action_failed', { ...info }, {
          firingId, ruleId, moduleId: info.actionId, durationMs: info.durationMs
        });
      },
    };
  }

  private get factoryTracker(): FactoryTracker {
    if (!this.tracker) {
      throw new Error(`RuleEngine "${this.config.name}" is not running`);
    }
    return this.tracker;
  }

  private ensureRunning(): void {
    if (this.disposed) {
      throw new Error(`RuleEngine "${this.config.name}" is disposed`);
    }
  }
}
