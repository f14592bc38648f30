import { generateId } from '../utils/id-generator.js';
import type {
  DebugTraceEntry,
  TraceEntryType,
  TraceFilter,
  TraceRecordOptions,
  TraceSubscriber,
} from './types.js';

/** Configuration options for TraceCollector */
export interface TraceCollectorConfig {
  /** Maximum number of entries to keep in the ring buffer (default: 10000) */
  maxEntries?: number;

  /** Whether tracing is initially enabled (default: false) */
  enabled?: boolean;
}

type IndexKey = 'firingId' | 'ruleId' | 'type';

/**
 * Collects and indexes trace entries from rule binding and execution.
 *
 * Uses a ring buffer to limit memory usage while keeping lookup by firing,
 * rule and entry type cheap.
 */
export class TraceCollector {
  private readonly maxEntries: number;
  private enabled: boolean;

  private readonly entries: DebugTraceEntry[] = [];
  private readonly indexes: Record<IndexKey, Map<string, Set<DebugTraceEntry>>> = {
    firingId: new Map(),
    ruleId: new Map(),
    type: new Map(),
  };

  private readonly subscribers = new Set<TraceSubscriber>();

  constructor(config: TraceCollectorConfig = {}) {
    this.maxEntries = Math.max(1, config.maxEntries ?? 10_000);
    this.enabled = config.enabled ?? false;
  }

  /** Create a TraceCollector (async for consistency with other engine services) */
  static async start(config?: TraceCollectorConfig): Promise<TraceCollector> {
    return new TraceCollector(config);
  }

  /** Enable trace collection */
  enable(): void {
    this.enabled = true;
  }

  /** Disable trace collection */
  disable(): void {
    this.enabled = false;
  }

  /** Check if tracing is currently enabled */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a new trace entry.
   *
   * If tracing is disabled, this is a no-op.
   */
  record(
    type: TraceEntryType,
    details: Record<string, unknown>,
    options: TraceRecordOptions = {}
  ): DebugTraceEntry | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const entry: DebugTraceEntry = {
      id: options.id ?? generateId(),
      timestamp: options.timestamp ?? Date.now(),
      type,
      details,
      ...(options.firingId !== undefined && { firingId: options.firingId }),
      ...(options.ruleId !== undefined && { ruleId: options.ruleId }),
      ...(options.moduleId !== undefined && { moduleId: options.moduleId }),
      ...(options.durationMs !== undefined && { durationMs: options.durationMs }),
    };

    if (this.entries.length >= this.maxEntries) {
      this.evictOldest();
    }
    this.entries.push(entry);
    this.index(entry);

    this.notifySubscribers(entry);
    return entry;
  }

  /** All entries of one trigger firing, in recording order. */
  getByFiring(firingId: string): DebugTraceEntry[] {
    return this.lookup('firingId', firingId);
  }

  /** All entries for a given rule ID, in recording order. */
  getByRule(ruleId: string): DebugTraceEntry[] {
    return this.lookup('ruleId', ruleId);
  }

  /** All entries of a given type, in recording order. */
  getByType(type: TraceEntryType): DebugTraceEntry[] {
    return this.lookup('type', type);
  }

  /**
   * Get the most recent trace entries.
   * Returns entries in reverse chronological order (newest first).
   */
  getRecent(limit = 100): DebugTraceEntry[] {
    return this.entries.slice(-limit).reverse();
  }

  /**
   * Query trace entries with flexible filtering.
   */
  query(filter: TraceFilter): DebugTraceEntry[] {
    let result: DebugTraceEntry[];

    // Start with the most selective index
    if (filter.firingId !== undefined) {
      result = this.getByFiring(filter.firingId);
    } else if (filter.ruleId !== undefined) {
      result = this.getByRule(filter.ruleId);
    } else {
      result = [...this.entries];
    }

    if (filter.ruleId !== undefined) {
      result = result.filter(e => e.ruleId === filter.ruleId);
    }

    if (filter.types && filter.types.length > 0) {
      const types = new Set(filter.types);
      result = result.filter(e => types.has(e.type));
    }

    const { fromTimestamp, toTimestamp } = filter;
    if (fromTimestamp !== undefined) {
      result = result.filter(e => e.timestamp >= fromTimestamp);
    }
    if (toTimestamp !== undefined) {
      result = result.filter(e => e.timestamp <= toTimestamp);
    }

    if (filter.limit !== undefined && result.length > filter.limit) {
      result = result.slice(-filter.limit);
    }

    return result;
  }

  /**
   * Subscribe to new trace entries in real-time.
   * Returns an unsubscribe function.
   */
  subscribe(subscriber: TraceSubscriber): () => void {
    this.subscribers.add(subscriber);

    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /** Get the current number of stored entries */
  get size(): number {
    return this.entries.length;
  }

  /** Get statistics about the trace collector */
  getStats(): { entriesCount: number; maxEntries: number; subscribersCount: number } {
    return {
      entriesCount: this.entries.length,
      maxEntries: this.maxEntries,
      subscribersCount: this.subscribers.size
    };
  }

  /** Clear all stored entries and indexes */
  clear(): void {
    this.entries.length = 0;
    for (const index of Object.values(this.indexes)) {
      index.clear();
    }
  }

  private evictOldest(): void {
    // Remove approximately 10% when limit is reached
    const toRemove = Math.max(1, Math.ceil(this.maxEntries * 0.1));

    for (const removed of this.entries.splice(0, toRemove)) {
      this.unindex(removed);
    }
  }

  private index(entry: DebugTraceEntry): void {
    for (const [key, value] of this.indexKeys(entry)) {
      const index = this.indexes[key];
      let set = index.get(value);
      if (!set) {
        set = new Set();
        index.set(value, set);
      }
      set.add(entry);
    }
  }

  private unindex(entry: DebugTraceEntry): void {
    for (const [key, value] of this.indexKeys(entry)) {
      const index = this.indexes[key];
      const set = index.get(value);
      if (set) {
        set.delete(entry);
        if (set.size === 0) {
          index.delete(value);
        }
      }
    }
  }

  private indexKeys(entry: DebugTraceEntry): Array<[IndexKey, string]> {
    const keys: Array<[IndexKey, string]> = [['type', entry.type]];
    if (entry.firingId !== undefined) keys.push(['firingId', entry.firingId]);
    if (entry.ruleId !== undefined) keys.push(['ruleId', entry.ruleId]);
    return keys;
  }

  private lookup(key: IndexKey, value: string): DebugTraceEntry[] {
    // Sets keep insertion order, which is recording order
    const set = this.indexes[key].get(value);
    return set ? [...set] : [];
  }

  private notifySubscribers(entry: DebugTraceEntry): void {
    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error('[trace-collector] Subscriber error:', error);
      }
    }
  }
}
