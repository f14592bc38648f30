import type { RuleError, RuleStatus, RuleStatusListener } from '../types/status.js';

/**
 * Stav pravidel a reverzní index typ modulu → pravidla.
 *
 * Každé známé pravidlo má právě jeden RuleStatus. Status se nikdy
 * nemění na místě - každý přechod ho nahradí novým objektem.
 */
export class RuleStatusTracker {
  private readonly statuses: Map<string, RuleStatus> = new Map();
  private readonly rulesByType: Map<string, Set<string>> = new Map();
  private readonly typesByRule: Map<string, Set<string>> = new Map();
  private readonly listeners: Set<RuleStatusListener> = new Set();

  constructor(private readonly name: string = 'rule-engine') {}

  // ═══════════════════════════════════════════════════════════════════════════
  //                              STATUSY
  // ═══════════════════════════════════════════════════════════════════════════

  get(ruleId: string): RuleStatus | undefined {
    return this.statuses.get(ruleId);
  }

  has(ruleId: string): boolean {
    return this.statuses.has(ruleId);
  }

  /**
   * Vytvoří status nově přidaného pravidla (neinicializované, bez chyb).
   * Existující status ponechá - enabled přežívá nahrazení definice.
   */
  create(ruleId: string, initialEnabled: boolean): RuleStatus {
    const existing = this.statuses.get(ruleId);
    if (existing) return existing;

    return this.replace(ruleId, { initialized: false, enabled: initialEnabled, running: false, errors: [] });
  }

  /**
   * Přechod do INITIALIZED. Chyby mohou obsahovat jen neblokující
   * chyby propojení.
   */
  initialize(ruleId: string, initialEnabled: boolean, errors: readonly RuleError[] = []): RuleStatus {
    const previous = this.statuses.get(ruleId);
    return this.replace(ruleId, {
      initialized: true,
      enabled: previous?.enabled ?? initialEnabled,
      running: previous?.running ?? false,
      errors,
    });
  }

  /** Přechod do UNINITIALIZED; enabled se zachová */
  uninitialize(ruleId: string, initialEnabled: boolean, errors: readonly RuleError[]): RuleStatus {
    const previous = this.statuses.get(ruleId);
    return this.replace(ruleId, {
      initialized: false,
      enabled: previous?.enabled ?? initialEnabled,
      running: false,
      errors,
    });
  }

  /**
   * Nastaví enabled příznak. Nic nespouští ani nezastavuje.
   * @returns false pro neznámé pravidlo
   */
  setEnabled(ruleId: string, enabled: boolean): boolean {
    const previous = this.statuses.get(ruleId);
    if (!previous) return false;

    this.replace(ruleId, { ...previous, enabled });
    return true;
  }

  setRunning(ruleId: string, running: boolean): void {
    const previous = this.statuses.get(ruleId);
    if (!previous || previous.running === running) return;

    this.replace(ruleId, { ...previous, running });
  }

  /** Odstraní status i záznamy v reverzním indexu */
  delete(ruleId: string): boolean {
    const previous = this.statuses.get(ruleId);
    this.unindexRule(ruleId);
    if (!previous) return false;

    this.statuses.delete(ruleId);
    this.notify(ruleId, undefined, previous);
    return true;
  }

  get size(): number {
    return this.statuses.size;
  }

  get initializedCount(): number {
    let count = 0;
    for (const status of this.statuses.values()) {
      if (status.initialized) count++;
    }
    return count;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          REVERZNÍ INDEX
  // ═══════════════════════════════════════════════════════════════════════════

  /** Zaindexuje pravidlo pod systémové typy jeho modulů (nahradí předchozí) */
  indexRule(ruleId: string, moduleTypes: Iterable<string>): void {
    this.unindexRule(ruleId);

    const types = new Set(moduleTypes);
    this.typesByRule.set(ruleId, types);
    for (const type of types) {
      const rules = this.rulesByType.get(type) ?? new Set();
      rules.add(ruleId);
      this.rulesByType.set(type, rules);
    }
  }

  unindexRule(ruleId: string): void {
    const types = this.typesByRule.get(ruleId);
    if (!types) return;

    for (const type of types) {
      const rules = this.rulesByType.get(type);
      if (rules) {
        rules.delete(ruleId);
        if (rules.size === 0) {
          this.rulesByType.delete(type);
        }
      }
    }
    this.typesByRule.delete(ruleId);
  }

  /** Pravidla závislá na daném systémovém typu */
  getRulesByType(moduleType: string): string[] {
    return [...(this.rulesByType.get(moduleType) ?? [])];
  }

  /** Pravidla závislá na kterémkoliv z typů (bez duplicit, v pořadí výskytu) */
  getRulesByTypes(moduleTypes: Iterable<string>): string[] {
    const result = new Set<string>();
    for (const type of moduleTypes) {
      for (const ruleId of this.rulesByType.get(type) ?? []) {
        result.add(ruleId);
      }
    }
    return [...result];
  }

  getIndexedTypes(): string[] {
    return [...this.rulesByType.keys()];
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                            LISTENERY
  // ═══════════════════════════════════════════════════════════════════════════

  /** Přihlásí listener na změny statusu; vrací funkci pro odhlášení */
  onChange(listener: RuleStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clearListeners(): void {
    this.listeners.clear();
  }

  /** Uloží zmrazenou kopii - volající ani listenery ji nemohou změnit */
  private replace(ruleId: string, next: RuleStatus): RuleStatus {
    const previous = this.statuses.get(ruleId);
    const status = freezeStatus(next);
    this.statuses.set(ruleId, status);

    if (!previous || !statusEquals(previous, status)) {
      this.notify(ruleId, status, previous);
    }
    return status;
  }

  private notify(ruleId: string, status: RuleStatus | undefined, previous: RuleStatus | undefined): void {
    for (const listener of this.listeners) {
      try {
        listener(ruleId, status, previous);
      } catch (error) {
        console.error(`[${this.name}] Status listener error for rule "${ruleId}":`, error);
      }
    }
  }
}

function freezeStatus(status: RuleStatus): RuleStatus {
  const errors = status.errors.map(error => Object.freeze({
    ...error,
    ...(error.moduleIds !== undefined && { moduleIds: Object.freeze([...error.moduleIds]) }),
  }));
  return Object.freeze({ ...status, errors: Object.freeze(errors) });
}

function statusEquals(a: RuleStatus, b: RuleStatus): boolean {
  return a.initialized === b.initialized
    && a.enabled === b.enabled
    && a.running === b.running
    && a.errors.length === b.errors.length
    && a.errors.every((e, i) => {
      const other = b.errors[i];
      return other !== undefined && e.code === other.code && e.message === other.message;
    });
}
