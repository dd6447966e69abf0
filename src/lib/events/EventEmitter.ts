/**
 * Map of event name to the argument tuple its handlers receive.
 */
export type EventMap<T> = { [K in keyof T]: unknown[] };

export type EventHandler<TArgs extends unknown[]> = (...args: TArgs) => void;

type HandlerRegistry<TEvents> = { [K in keyof TEvents]?: Set<EventHandler<Extract<TEvents[K], unknown[]>>> };

/**
 * Minimal synchronous event emitter.
 *
 * Handlers are kept in a Set, so registering the same handler twice has no
 * effect. A throwing handler is logged and does not stop the others.
 */
export class EventEmitter<TEvents extends EventMap<TEvents> = Record<string, unknown[]>> {
  private handlers: HandlerRegistry<TEvents> = {};

  on<K extends keyof TEvents>(event: K, handler: EventHandler<Extract<TEvents[K], unknown[]>>): void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Extract<TEvents[K], unknown[]>>>();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<Extract<TEvents[K], unknown[]>>): void {
    const set = this.handlers[event];
    if (!set) return;

    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<Extract<TEvents[K], unknown[]>>): void {
    const wrapper: EventHandler<Extract<TEvents[K], unknown[]>> = (...args) => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof TEvents>(event: K, ...args: Extract<TEvents[K], unknown[]>): void {
    const set = this.handlers[event];
    if (!set) return;

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of Array.from(set)) {
      try {
        handler(...args);
      } catch (error) {
        console.error(`[EventEmitter] Error in handler for "${String(event)}":`, error);
      }
    }
  }

  removeAllListeners<K extends keyof TEvents>(event?: K): void {
    if (event === undefined) {
      this.handlers = {};
    } else {
      delete this.handlers[event];
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
