import type { ModuleValues } from '../types/module.js';
import { OutputRef, type RuntimeConnectedModule, type RuntimeRule } from '../core/runtime-rule.js';

export interface UnresolvedConnection {
  ruleId: string;
  moduleId: string;
  inputName: string;
  sourceModuleId: string;
  sourceOutputName: string;
  reason: string;
}

export interface ConnectionResolverOptions {
  name?: string;
  onUnresolved?: (connection: UnresolvedConnection) => void;
}

/**
 * Překládá deklarovaná propojení modulu na živé reference výstupů.
 *
 * Reference se sestaví při prvním spuštění modulu a zůstávají v cache,
 * dokud pravidlo nepřejde znovu do inicializace. Propojení na neexistující
 * nebo nedatový modul se přeskočí s varováním.
 */
export class ConnectionResolver {
  private readonly name: string;

  constructor(private readonly options: ConnectionResolverOptions = {}) {
    this.name = options.name ?? 'rule-engine';
  }

  resolve(runtime: RuntimeRule, module: RuntimeConnectedModule): Map<string, OutputRef> {
    if (module.connections) {
      return module.connections;
    }

    const refs = new Map<string, OutputRef>();

    for (const connection of module.module.connections) {
      const source = runtime.getModule(connection.sourceModuleId);

      if (source === undefined || source.kind === 'condition') {
        const reason = source === undefined ? 'source module not found' : 'source module has no outputs';
        console.warn(
          `[${this.name}] Skipping connection "${connection.inputName}" of module "${module.id}" ` +
          `in rule "${runtime.id}": ${reason}`
        );
        this.options.onUnresolved?.({
          ruleId: runtime.id,
          moduleId: module.id,
          inputName: connection.inputName,
          sourceModuleId: connection.sourceModuleId,
          sourceOutputName: connection.sourceOutputName,
          reason,
        });
        continue;
      }

      refs.set(
        connection.inputName,
        new OutputRef(connection.sourceModuleId, connection.sourceOutputName, source.outputs)
      );
    }

    module.connections = refs;
    return refs;
  }

  /** Aktuální hodnoty vstupů modulu (vstup → hodnota) */
  getInputs(runtime: RuntimeRule, module: RuntimeConnectedModule): ModuleValues {
    const inputs: ModuleValues = {};
    for (const [inputName, ref] of this.resolve(runtime, module)) {
      inputs[inputName] = ref.value;
    }
    return inputs;
  }
}
