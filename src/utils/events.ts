import type { Logger } from 'pino';

/**
 * Typed in-process event emitter; `Events` maps event name to payload type.
 */
export type EventEmitter<Events extends Record<string, unknown>> = {
  on: <E extends keyof Events>(event: E, handler: (data: Events[E]) => void) => void;
  off: <E extends keyof Events>(event: E, handler: (data: Events[E]) => void) => void;
  emit: <E extends keyof Events>(event: E, data: Events[E]) => void;
};

// Method syntax keeps parameters bivariant so one set can hold every handler type
type AnyHandler = { bivarianceHack(data: unknown): void }['bivarianceHack'];

export function createEventEmitter<Events extends Record<string, unknown>>(
  logger?: Logger
): EventEmitter<Events> {
  const handlers = new Map<keyof Events, Set<AnyHandler>>();

  function on<E extends keyof Events>(event: E, handler: (data: Events[E]) => void): void {
    let set = handlers.get(event);
    if (!set) {
      set = new Set<AnyHandler>();
      handlers.set(event, set);
    }
    set.add(handler);
  }

  function off<E extends keyof Events>(event: E, handler: (data: Events[E]) => void): void {
    handlers.get(event)?.delete(handler);
  }

  function emit<E extends keyof Events>(event: E, data: Events[E]): void {
    const set = handlers.get(event);
    if (!set) return;
    for (const h of set) {
      try {
        h(data);
      } catch (error) {
        logger?.error(
          { err: error, event: String(event) },
          `Error in event handler for ${String(event)}`
        );
      }
    }
  }

  return { on, off, emit };
}
