import type { HandlerFactory, ModuleHandler, RuleEngineCallback } from '../types/handler.js';
import type { Module } from '../types/module.js';
import {
  handlerKindMismatchError,
  invalidConnectionError,
  missingHandlerError,
  type RuleError,
} from '../types/status.js';
import { getSystemModuleType } from '../utils/module-type.js';
import type { HandlerRegistry } from './handler-registry.js';
import type { RuleStatusTracker } from './rule-status-tracker.js';
import type { AnyRuntimeModule, RuntimeRule } from './runtime-rule.js';

/** Handler vytvořený během jednoho průchodu, zatím nenavázaný */
interface PendingBinding {
  module: AnyRuntimeModule;
  handler: ModuleHandler;
  factory: HandlerFactory;
}

export interface BinderOptions {
  name?: string;
  onInitialized?: (runtime: RuntimeRule) => void;
  onUninitialized?: (runtime: RuntimeRule, errors: RuleError[]) => void;
}

/**
 * Navazuje moduly pravidla na handlery z registru.
 *
 * Průchod jde v pořadí podmínky → akce → triggery a sbírá všechny chyby
 * najednou. Teprve když jsou všechny typy vyřešené, handlery se navážou
 * a triggery dostanou callback pravidla; jinak se vytvořené handlery
 * uvolní a pravidlo zůstane neinicializované s chybami ve statusu.
 */
export class Binder {
  private readonly name: string;

  constructor(
    private readonly registry: HandlerRegistry,
    private readonly statuses: RuleStatusTracker,
    private readonly options: BinderOptions = {}
  ) {
    this.name = options.name ?? 'rule-engine';
  }

  /**
   * Pokusí se inicializovat pravidlo.
   * @returns true, pokud je pravidlo po průchodu inicializované
   */
  bind(runtime: RuntimeRule, callback: RuleEngineCallback): boolean {
    const ruleId = runtime.id;

    if (this.isCurrent(runtime)) {
      this.statuses.initialize(ruleId, runtime.rule.enabled, this.checkConnections(runtime));
      return true;
    }

    if (runtime.hasBoundHandlers()) {
      this.release(runtime);
    }

    const missing = new Map<string, string[]>();
    const mismatches: RuleError[] = [];
    const pending: PendingBinding[] = [];

    for (const module of runtime.modules()) {
      const type = getSystemModuleType(module.module.type);
      const factory = this.registry.get(type);
      const handler = factory ? this.createHandler(factory, module.module, ruleId) : null;

      if (!factory || !handler) {
        const moduleIds = missing.get(type) ?? [];
        moduleIds.push(module.id);
        missing.set(type, moduleIds);
        continue;
      }

      if (handler.kind !== module.kind) {
        mismatches.push(handlerKindMismatchError(module.module.type, module.id, module.kind, handler.kind));
        this.releaseHandler(factory, module.module, handler, ruleId);
        continue;
      }

      pending.push({ module, handler, factory });
    }

    const errors: RuleError[] = [];
    for (const [type, moduleIds] of missing) {
      const error = missingHandlerError(type, moduleIds);
      console.warn(`[${this.name}] ${error.message} (rule "${ruleId}")`);
      errors.push(error);
    }
    errors.push(...mismatches);

    const connectionErrors = this.checkConnections(runtime);

    if (errors.length > 0) {
      for (const { module, handler, factory } of pending) {
        this.releaseHandler(factory, module.module, handler, ruleId);
      }
      this.markUninitialized(runtime, [...errors, ...connectionErrors]);
      return false;
    }

    for (const { module, handler, factory } of pending) {
      attachHandler(module, handler, factory);
    }
    runtime.resetConnections();

    for (const trigger of runtime.triggers) {
      trigger.handler?.setCallback(callback);
    }

    this.statuses.initialize(ruleId, runtime.rule.enabled, connectionErrors);
    console.debug(`[${this.name}] Rule started: ${ruleId}`);
    this.options.onInitialized?.(runtime);
    return true;
  }

  /**
   * Deinicializuje pravidlo - odpojí triggery, uvolní handlery a zapíše
   * chyby do statusu. Pravidlo zůstává známé.
   */
  unbind(runtime: RuntimeRule, errors: RuleError[]): void {
    this.release(runtime);
    this.markUninitialized(runtime, errors);
  }

  /**
   * Odpojí triggery a vrátí handlery jejich factories. Status nemění.
   */
  release(runtime: RuntimeRule): void {
    for (const trigger of runtime.triggers) {
      trigger.handler?.setCallback(null);
    }

    for (const module of [...runtime.triggers, ...runtime.actions, ...runtime.conditions]) {
      const binding = module.unbind();
      if (binding) {
        this.releaseHandler(binding.factory, module.module, binding.handler, runtime.id);
      }
    }
    runtime.resetConnections();
  }

  /**
   * Pravidlo je plně navázané na factories, které registr právě nabízí -
   * opakovaná vazba nic nemění.
   */
  private isCurrent(runtime: RuntimeRule): boolean {
    return runtime.hasBoundHandlers() && runtime.isFullyBound() && runtime.modules().every(
      m => this.registry.get(getSystemModuleType(m.module.type)) === m.factory
    );
  }

  private markUninitialized(runtime: RuntimeRule, errors: RuleError[]): void {
    const wasInitialized = this.statuses.get(runtime.id)?.initialized ?? false;
    this.statuses.uninitialize(runtime.id, runtime.rule.enabled, errors);

    if (wasInitialized) {
      console.debug(`[${this.name}] Rule stopped: ${runtime.id}`);
    }
    this.options.onUninitialized?.(runtime, errors);
  }

  /** Chyby propojení - neblokují inicializaci */
  private checkConnections(runtime: RuntimeRule): RuleError[] {
    const errors: RuleError[] = [];

    for (const module of runtime.connectedModules()) {
      for (const connection of module.module.connections) {
        const source = runtime.getModule(connection.sourceModuleId);
        if (!source) {
          errors.push(invalidConnectionError(
            module.id,
            connection.inputName,
            `module "${connection.sourceModuleId}" does not exist`
          ));
        } else if (source.kind === 'condition') {
          errors.push(invalidConnectionError(
            module.id,
            connection.inputName,
            `module "${connection.sourceModuleId}" is not a data source`
          ));
        }
      }
    }

    return errors;
  }

  private createHandler(factory: HandlerFactory, module: Module, ruleId: string): ModuleHandler | null {
    try {
      return factory.create(module, ruleId) ?? null;
    } catch (error) {
      console.error(`[${this.name}] Handler factory failed for module "${module.id}" (${module.type}):`, error);
      return null;
    }
  }

  private releaseHandler(factory: HandlerFactory, module: Module, handler: ModuleHandler, ruleId: string): void {
    try {
      if (factory.release) {
        factory.release(module, handler, ruleId);
      } else {
        handler.dispose?.();
      }
    } catch (error) {
      console.error(`[${this.name}] Failed to release handler of module "${module.id}":`, error);
    }
  }
}

/** Naváže handler podle druhu modulu; druh handleru už je ověřený */
function attachHandler(module: AnyRuntimeModule, handler: ModuleHandler, factory: HandlerFactory): void {
  switch (module.kind) {
    case 'trigger':
      if (handler.kind === 'trigger') module.bind(handler, factory);
      break;
    case 'condition':
      if (handler.kind === 'condition') module.bind(handler, factory);
      break;
    case 'action':
      if (handler.kind === 'action') module.bind(handler, factory);
      break;
  }
}
