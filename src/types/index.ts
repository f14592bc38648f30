export * from './module.js';
export * from './handler.js';
export * from './rule.js';
export * from './status.js';
export * from './execution.js';

/** Statistiky tracingu */
export interface TracingStats {
  enabled: boolean;
  entriesCount: number;
  maxEntries: number;
}

/** Statistiky enginu */
export interface EngineStats {
  rulesCount: number;
  initializedRulesCount: number;
  factoriesCount: number;
  moduleTypesCount: number;
  firingsReceived: number;
  rulesExecuted: number;
  executionFailures: number;
  avgProcessingTimeMs: number;
  factoryEventsProcessed: number;
  tracing: TracingStats;
}

/** Konfigurace tracingu */
export interface TracingConfig {
  /** Povolit tracing při startu enginu (default: false) */
  enabled?: boolean;

  /** Maximální počet trace entries v ring bufferu (default: 10000) */
  maxEntries?: number;
}

/** Konfigurace Rule Engine */
export interface RuleEngineConfig {
  name?: string;                  // Prefix log zpráv
  tracing?: TracingConfig;        // Konfigurace debugging tracingu
}
