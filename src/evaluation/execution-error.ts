/**
 * Selhání handleru během provádění pravidla.
 */
export class ExecutionError extends Error {
  readonly statusCode = 500;
  readonly code = 'EXECUTION_ERROR';

  constructor(
    message: string,
    readonly ruleId: string,
    readonly moduleId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExecutionError';
  }

  get details(): { ruleId: string; moduleId: string } {
    return { ruleId: this.ruleId, moduleId: this.moduleId };
  }
}
