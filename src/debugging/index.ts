export { TraceCollector, type TraceCollectorConfig } from './trace-collector.js';
export type {
  DebugTraceEntry,
  TraceEntryType,
  TraceFilter,
  TraceRecordOptions,
  TraceSubscriber,
} from './types.js';
