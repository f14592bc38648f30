/**
 * Debugging types for rule binding and execution tracing.
 */

/** Types of trace entries that can be recorded */
export type TraceEntryType =
  | 'factory_registered'
  | 'factory_unregistered'
  | 'rule_initialized'
  | 'rule_uninitialized'
  | 'rule_triggered'
  | 'rule_executed'
  | 'rule_skipped'
  | 'rule_failed'
  | 'condition_evaluated'
  | 'action_started'
  | 'action_completed'
  | 'action_failed'
  | 'connection_unresolved';

/** A single trace entry recording an engine activity */
export interface DebugTraceEntry {
  /** Unique identifier for this trace entry */
  id: string;

  /** Unix timestamp in milliseconds when this occurred */
  timestamp: number;

  /** Type of activity being traced */
  type: TraceEntryType;

  /** ID of the trigger firing this entry belongs to */
  firingId?: string;

  /** ID of the rule involved, if applicable */
  ruleId?: string;

  /** ID of the module involved, if applicable */
  moduleId?: string;

  /** Additional contextual information about the activity */
  details: Record<string, unknown>;

  /** Duration of the activity in milliseconds, if applicable */
  durationMs?: number;
}

/** Filter options for querying trace entries */
export interface TraceFilter {
  firingId?: string;
  ruleId?: string;
  types?: TraceEntryType[];

  /** Filter entries at or after this timestamp */
  fromTimestamp?: number;

  /** Filter entries at or before this timestamp */
  toTimestamp?: number;

  /** Maximum number of entries to return (most recent kept) */
  limit?: number;
}

/** Callback type for trace entry subscriptions */
export type TraceSubscriber = (entry: DebugTraceEntry) => void;

/** Options accepted by {@link TraceCollector.record} */
export type TraceRecordOptions = Partial<
  Pick<DebugTraceEntry, 'id' | 'timestamp' | 'firingId' | 'ruleId' | 'moduleId' | 'durationMs'>
>;
