import { GenServer } from '@hamicek/noex';
import type { HandlerFactory } from '../types/handler.js';

/** Událost objevení / zmizení handler factory */
export type FactoryEvent =
  | { type: 'factory_added'; factory: HandlerFactory }
  | { type: 'factory_removed'; factory: HandlerFactory };

export interface FactoryEventHandlers {
  onFactoryAdded(factory: HandlerFactory): void;
  onFactoryRemoved(factory: HandlerFactory): void;
}

interface TrackerState {
  processed: number;
}

type EventReply =
  | { ok: true }
  | { ok: false; error: unknown };

function startServer(handlers: FactoryEventHandlers) {
  return GenServer.start({
    init: (): TrackerState => ({ processed: 0 }),

    handleCall(msg: FactoryEvent, state: TrackerState) {
      const next: TrackerState = { processed: state.processed + 1 };
      let reply: EventReply;
      try {
        dispatch(handlers, msg);
        reply = { ok: true };
      } catch (error) {
        reply = { ok: false, error };
      }
      return [reply, next] as const;
    },

    handleCast(_msg: FactoryEvent, state: TrackerState) {
      return state;
    },
  });
}

type TrackerRef = Awaited<ReturnType<typeof startServer>>;

function dispatch(handlers: FactoryEventHandlers, event: FactoryEvent): void {
  switch (event.type) {
    case 'factory_added':
      handlers.onFactoryAdded(event.factory);
      break;
    case 'factory_removed':
      handlers.onFactoryRemoved(event.factory);
      break;
  }
}

/**
 * Fronta událostí handler factories.
 *
 * Každá událost běží jako jeden GenServer call - průchody re-bindingu se
 * tak nikdy nepřekrývají. Promise vrácená z `added` / `removed` se splní,
 * až průchod doběhne.
 */
export class FactoryTracker {
  private processed = 0;

  private constructor(
    private readonly ref: TrackerRef,
    private readonly name: string
  ) {}

  static async start(handlers: FactoryEventHandlers, name = 'rule-engine'): Promise<FactoryTracker> {
    const ref = await startServer(handlers);
    return new FactoryTracker(ref, name);
  }

  added(factory: HandlerFactory): Promise<void> {
    return this.send({ type: 'factory_added', factory });
  }

  removed(factory: HandlerFactory): Promise<void> {
    return this.send({ type: 'factory_removed', factory });
  }

  isRunning(): boolean {
    return GenServer.isRunning(this.ref);
  }

  /** Počet zpracovaných událostí */
  get processedCount(): number {
    return this.processed;
  }

  async stop(): Promise<void> {
    if (this.isRunning()) {
      await GenServer.stop(this.ref);
    }
  }

  private async send(event: FactoryEvent): Promise<void> {
    if (!this.isRunning()) {
      throw new Error(`[${this.name}] Factory tracker is not running`);
    }

    const reply = await GenServer.call(this.ref, event);
    this.processed++;

    if (!reply.ok) {
      throw reply.error;
    }
  }
}
