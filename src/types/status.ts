/** Error codes recorded on a rule status */
export type RuleErrorCode =
  | 'MISSING_HANDLER'          // no factory serves the module type
  | 'HANDLER_KIND_MISMATCH'    // factory returned a handler for another module kind
  | 'INVALID_CONNECTION';      // connection source missing or not output-producing

export type RuleErrorCategory = 'binding' | 'connection';

/** Structured error stored on a rule status */
export interface RuleError {
  readonly code: RuleErrorCode;
  readonly category: RuleErrorCategory;
  readonly message: string;
  readonly moduleType?: string;
  readonly moduleIds?: readonly string[];
  readonly inputName?: string;
}

/**
 * Snapshot of a rule's readiness. Replaced as a whole on every transition.
 *
 * `enabled` and `running` are meaningful only while `initialized`, but
 * `enabled` is kept while the rule waits for handlers to come back.
 */
export interface RuleStatus {
  readonly initialized: boolean;
  readonly enabled: boolean;
  readonly running: boolean;
  readonly errors: readonly RuleError[];
}

export type RuleStatusListener = (
  ruleId: string,
  status: RuleStatus | undefined,
  previous: RuleStatus | undefined
) => void;

export function missingHandlerError(moduleType: string, moduleIds: readonly string[] = []): RuleError {
  const suffix = moduleIds.length > 0 ? `, for modules: ${moduleIds.join(', ')}` : '';
  return {
    code: 'MISSING_HANDLER',
    category: 'binding',
    message: `Missing handler: ${moduleType}${suffix}`,
    moduleType,
    ...(moduleIds.length > 0 && { moduleIds }),
  };
}

export function handlerKindMismatchError(
  moduleType: string,
  moduleId: string,
  expected: string,
  actual: string
): RuleError {
  return {
    code: 'HANDLER_KIND_MISMATCH',
    category: 'binding',
    message: `Handler for module "${moduleId}" (${moduleType}) has kind "${actual}", expected "${expected}"`,
    moduleType,
    moduleIds: [moduleId],
  };
}

export function invalidConnectionError(moduleId: string, inputName: string, reason: string): RuleError {
  return {
    code: 'INVALID_CONNECTION',
    category: 'connection',
    message: `Input "${inputName}" of module "${moduleId}" can not be connected: ${reason}`,
    moduleIds: [moduleId],
    inputName,
  };
}
