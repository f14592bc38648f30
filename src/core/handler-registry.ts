import type { HandlerFactory } from '../types/handler.js';
import { getSystemModuleType } from '../utils/module-type.js';

/**
 * Registr handler factories podle systémového typu modulu.
 *
 * Jedna factory může obsluhovat více typů. Pokud typ nabízí více
 * factories, platí naposledy registrovaná; po jejím odebrání
 * převezme typ nejpozději registrovaná ze zbývajících.
 */
export class HandlerRegistry {
  /** typ → factories v pořadí registrace; aktivní je poslední */
  private readonly byType: Map<string, HandlerFactory[]> = new Map();

  /** Typy zachycené při registraci factory */
  private readonly typesByFactory: Map<HandlerFactory, string[]> = new Map();

  /**
   * Zaregistruje factory pro všechny její typy.
   * Opakovaná registrace téže factory typy jen obnoví. Podtypy se
   * zapisují pod svůj systémový typ.
   *
   * @returns systémové typy, které factory obsluhuje
   * @throws {ConfigurationError} pokud factory nabízí neplatný typ
   */
  register(factory: HandlerFactory): string[] {
    const types = [...new Set([...factory.getTypes()].map(getSystemModuleType))];
    this.unregister(factory);

    this.typesByFactory.set(factory, types);
    for (const type of types) {
      const factories = this.byType.get(type) ?? [];
      factories.push(factory);
      this.byType.set(type, factories);
    }

    return types;
  }

  /**
   * Odebere factory ze všech jejích typů.
   *
   * @returns typy, pro které byla factory registrována, nebo undefined
   *   pro neznámou factory
   */
  unregister(factory: HandlerFactory): string[] | undefined {
    const types = this.typesByFactory.get(factory);
    if (!types) return undefined;

    for (const type of types) {
      const remaining = (this.byType.get(type) ?? []).filter(f => f !== factory);
      if (remaining.length > 0) {
        this.byType.set(type, remaining);
      } else {
        this.byType.delete(type);
      }
    }
    this.typesByFactory.delete(factory);

    return types;
  }

  /** Aktivní factory pro systémový typ */
  get(moduleType: string): HandlerFactory | undefined {
    return this.byType.get(moduleType)?.at(-1);
  }

  /** Typy, pod kterými je factory právě registrovaná */
  typesOf(factory: HandlerFactory): string[] {
    return [...(this.typesByFactory.get(factory) ?? [])];
  }

  has(factory: HandlerFactory): boolean {
    return this.typesByFactory.has(factory);
  }

  getTypes(): string[] {
    return [...this.byType.keys()];
  }

  get factoriesCount(): number {
    return this.typesByFactory.size;
  }

  clear(): void {
    this.byType.clear();
    this.typesByFactory.clear();
  }
}
