import type {
  ActionHandler,
  ConditionHandler,
  HandlerFactory,
  ModuleHandler,
  TriggerHandler,
} from '../types/handler.js';
import type {
  ActionModule,
  ConditionModule,
  Module,
  ModuleValues,
  TriggerModule,
} from '../types/module.js';
import type { Rule } from '../types/rule.js';

/**
 * Drží aktuální výstupy triggeru nebo akce.
 *
 * Při každém odpálení / spuštění se hodnoty nahradí celé.
 */
export class OutputHolder {
  private values: ModuleValues = {};

  get(name: string): unknown {
    return this.values[name];
  }

  set(values: ModuleValues): void {
    this.values = { ...values };
  }

  snapshot(): ModuleValues {
    return { ...this.values };
  }
}

/**
 * Živá reference na jeden výstup jiného modulu téhož pravidla.
 */
export class OutputRef {
  constructor(
    readonly sourceModuleId: string,
    readonly outputName: string,
    private readonly holder: OutputHolder
  ) {}

  get value(): unknown {
    return this.holder.get(this.outputName);
  }
}

/** Handler navázaný na modul spolu s factory, která ho vytvořila */
export interface HandlerBinding<H extends ModuleHandler> {
  handler: H;
  factory: HandlerFactory;
}

export abstract class RuntimeModule<M extends Module, H extends ModuleHandler> {
  private binding: HandlerBinding<H> | null = null;

  constructor(readonly module: M) {}

  get id(): string {
    return this.module.id;
  }

  get handler(): H | null {
    return this.binding?.handler ?? null;
  }

  get factory(): HandlerFactory | null {
    return this.binding?.factory ?? null;
  }

  bind(handler: H, factory: HandlerFactory): void {
    this.binding = { handler, factory };
  }

  /** Odpojí handler a vrátí původní vazbu (pro uvolnění přes factory) */
  unbind(): HandlerBinding<H> | null {
    const binding = this.binding;
    this.binding = null;
    return binding;
  }
}

export class RuntimeTrigger extends RuntimeModule<TriggerModule, TriggerHandler> {
  readonly kind = 'trigger';
  readonly outputs = new OutputHolder();
}

export class RuntimeCondition extends RuntimeModule<ConditionModule, ConditionHandler> {
  readonly kind = 'condition';

  /** Resolved input → output references; built lazily on first execution */
  connections: Map<string, OutputRef> | null = null;
}

export class RuntimeAction extends RuntimeModule<ActionModule, ActionHandler> {
  readonly kind = 'action';
  readonly outputs = new OutputHolder();
  connections: Map<string, OutputRef> | null = null;
}

export type AnyRuntimeModule = RuntimeTrigger | RuntimeCondition | RuntimeAction;
export type RuntimeConnectedModule = RuntimeCondition | RuntimeAction;
export type RuntimeOutputModule = RuntimeTrigger | RuntimeAction;

/**
 * Běhový stav pravidla - moduly s navázanými handlery a výstupy.
 *
 * Definice pravidla (`rule`) se nemění; handlery, výstupy a cache
 * propojení žijí tady a patří enginu.
 */
export class RuntimeRule {
  readonly triggers: RuntimeTrigger[];
  readonly conditions: RuntimeCondition[];
  readonly actions: RuntimeAction[];
  private readonly byId = new Map<string, AnyRuntimeModule>();

  constructor(readonly rule: Rule) {
    this.triggers = rule.triggers.map(t => new RuntimeTrigger(t));
    this.conditions = rule.conditions.map(c => new RuntimeCondition(c));
    this.actions = rule.actions.map(a => new RuntimeAction(a));

    for (const module of this.modules()) {
      this.byId.set(module.id, module);
    }
  }

  get id(): string {
    return this.rule.id;
  }

  getModule(moduleId: string): AnyRuntimeModule | undefined {
    return this.byId.get(moduleId);
  }

  getTrigger(triggerId: string): RuntimeTrigger | undefined {
    const module = this.byId.get(triggerId);
    return module?.kind === 'trigger' ? module : undefined;
  }

  /**
   * Všechny moduly v pořadí vazby: podmínky, akce, triggery.
   * Triggery jdou poslední, aby se nikdy nenapojily na pravidlo,
   * které nemůže běžet.
   */
  modules(): AnyRuntimeModule[] {
    return [...this.conditions, ...this.actions, ...this.triggers];
  }

  connectedModules(): RuntimeConnectedModule[] {
    return [...this.conditions, ...this.actions];
  }

  /** True, pokud má každý modul navázaný handler */
  isFullyBound(): boolean {
    return this.modules().every(m => m.handler !== null);
  }

  hasBoundHandlers(): boolean {
    return this.modules().some(m => m.handler !== null);
  }

  /** Zahodí cache propojení - znovu se sestaví při dalším spuštění */
  resetConnections(): void {
    for (const module of this.connectedModules()) {
      module.connections = null;
    }
  }
}
