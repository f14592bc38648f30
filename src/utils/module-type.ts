import { ConfigurationError } from '../validation/configuration-error.js';

/** Odděluje systémový typ modulu od podtypu: "timer:daily" */
export const MODULE_TYPE_SEPARATOR = ':';

/**
 * Vrátí systémový typ modulu - část před prvním oddělovačem.
 *
 * Handlery se hledají podle systémového typu, podtypy tak padají
 * na handler svého základního typu.
 *
 * @throws {ConfigurationError} pokud typ není neprázdný string
 */
export function getSystemModuleType(moduleType: unknown): string {
  if (typeof moduleType !== 'string' || moduleType.trim() === '') {
    throw new ConfigurationError('Invalid module type id. It must be a non-empty string', [
      { path: 'type', message: `Invalid module type id: ${String(moduleType)}`, severity: 'error' },
    ]);
  }

  const idx = moduleType.indexOf(MODULE_TYPE_SEPARATOR);
  if (idx === 0) {
    throw new ConfigurationError('Invalid module type id. System type before ":" is empty', [
      { path: 'type', message: `Invalid module type id: ${moduleType}`, severity: 'error' },
    ]);
  }

  return idx === -1 ? moduleType : moduleType.slice(0, idx);
}
