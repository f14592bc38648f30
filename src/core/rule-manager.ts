import type { Rule, RuleInput } from '../types/rule.js';
import type {
  ActionModule,
  ConditionModule,
  ConnectedModuleInput,
  ModuleInput,
  TriggerModule,
} from '../types/module.js';

/**
 * Tabulka pravidel s indexací podle tagů a scope.
 *
 * Drží jen definice. Handlery, výstupy a status patří enginu.
 */
export class RuleManager {
  private rules: Map<string, Rule> = new Map();

  private byTags: Map<string, Set<string>> = new Map();
  private byScope: Map<string, Set<string>> = new Map();
  private nextVersion = 1;

  static async start(): Promise<RuleManager> {
    return new RuleManager();
  }

  /**
   * Registruje pravidlo; existující pravidlo se stejným ID nahradí.
   * Vstup musí být zvalidovaný.
   */
  register(input: RuleInput): Rule {
    const now = Date.now();
    const previous = this.rules.get(input.id);

    const rule: Rule = {
      id: input.id,
      ...(input.name !== undefined && { name: input.name }),
      ...(input.description !== undefined && { description: input.description }),
      ...(input.scope !== undefined && { scope: input.scope }),
      tags: [...new Set(input.tags ?? [])],
      enabled: input.enabled ?? true,
      triggers: (input.triggers ?? []).map(toTrigger),
      conditions: (input.conditions ?? []).map(toCondition),
      actions: (input.actions ?? []).map(toAction),
      version: this.nextVersion++,
      createdAt: previous?.createdAt ?? now,
      updatedAt: now,
    };

    if (previous) {
      this.unindexRule(previous);
    }
    this.rules.set(rule.id, rule);
    this.indexRule(rule);

    return rule;
  }

  /**
   * Odregistruje pravidlo.
   * @returns odebrané pravidlo, nebo undefined pro neznámé ID
   */
  unregister(ruleId: string): Rule | undefined {
    const rule = this.rules.get(ruleId);
    if (!rule) return undefined;

    this.unindexRule(rule);
    this.rules.delete(ruleId);

    return rule;
  }

  /**
   * Získá pravidlo podle ID.
   */
  get(ruleId: string): Rule | undefined {
    return this.rules.get(ruleId);
  }

  has(ruleId: string): boolean {
    return this.rules.has(ruleId);
  }

  /**
   * Vrátí všechna pravidla.
   */
  getAll(): Rule[] {
    return [...this.rules.values()];
  }

  /**
   * Pravidla s daným tagem. Bez tagu vrací všechna pravidla.
   */
  getByTag(tag?: string): Rule[] {
    if (tag === undefined) {
      return this.getAll();
    }
    return this.collect(this.byTags.get(tag));
  }

  /**
   * Pravidla, která mají alespoň jeden z tagů.
   * Bez tagů vrací všechna pravidla, prázdný seznam nic.
   */
  getByTags(tags?: Iterable<string>): Rule[] {
    if (tags === undefined) {
      return this.getAll();
    }

    const ids = new Set<string>();
    for (const tag of tags) {
      for (const id of this.byTags.get(tag) ?? []) {
        ids.add(id);
      }
    }

    // Zachová pořadí registrace
    return this.getAll().filter(rule => ids.has(rule.id));
  }

  getByScope(scope: string): Rule[] {
    return this.collect(this.byScope.get(scope));
  }

  /**
   * Všechna použitá scope ID.
   */
  getScopeIds(): string[] {
    return [...this.byScope.keys()];
  }

  /**
   * Počet pravidel.
   */
  get size(): number {
    return this.rules.size;
  }

  clear(): void {
    this.rules.clear();
    this.byTags.clear();
    this.byScope.clear();
  }

  private collect(ids: Set<string> | undefined): Rule[] {
    if (!ids) return [];
    return [...ids]
      .map(id => this.rules.get(id))
      .filter((r): r is Rule => r !== undefined);
  }

  private indexRule(rule: Rule): void {
    for (const tag of rule.tags) {
      this.addToIndex(this.byTags, tag, rule.id);
    }
    if (rule.scope !== undefined) {
      this.addToIndex(this.byScope, rule.scope, rule.id);
    }
  }

  private unindexRule(rule: Rule): void {
    for (const tag of rule.tags) {
      this.removeFromIndex(this.byTags, tag, rule.id);
    }
    if (rule.scope !== undefined) {
      this.removeFromIndex(this.byScope, rule.scope, rule.id);
    }
  }

  private addToIndex(index: Map<string, Set<string>>, key: string, ruleId: string): void {
    const set = index.get(key) ?? new Set();
    set.add(ruleId);
    index.set(key, set);
  }

  private removeFromIndex(index: Map<string, Set<string>>, key: string, ruleId: string): void {
    const set = index.get(key);
    if (set) {
      set.delete(ruleId);
      if (set.size === 0) {
        index.delete(key);
      }
    }
  }
}

function moduleBase(input: ModuleInput) {
  return {
    id: input.id,
    type: input.type,
    configuration: { ...(input.configuration ?? {}) },
    ...(input.label !== undefined && { label: input.label }),
    ...(input.description !== undefined && { description: input.description }),
  };
}

function toTrigger(input: ModuleInput): TriggerModule {
  return { kind: 'trigger', ...moduleBase(input) };
}

function toCondition(input: ConnectedModuleInput): ConditionModule {
  return {
    kind: 'condition',
    ...moduleBase(input),
    connections: (input.connections ?? []).map(c => ({ ...c })),
  };
}

function toAction(input: ConnectedModuleInput): ActionModule {
  return {
    kind: 'action',
    ...moduleBase(input),
    connections: (input.connections ?? []).map(c => ({ ...c })),
  };
}
