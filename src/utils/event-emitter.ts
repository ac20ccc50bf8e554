/**
 * Type-safe event emitter for run progress notifications
 */

export type EventHandler<T = unknown> = (data: T) => void;

export type Unsubscribe = () => void;

export interface EventEmitter<TEvents extends Record<string, unknown>> {
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe;
  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void;
  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe;
  removeAllListeners(event?: keyof TEvents): void;
  listenerCount(event: keyof TEvents): number;
}

type AnyHandler<TEvents> = EventHandler<TEvents[keyof TEvents]>;

export class TypedEventEmitter<TEvents extends Record<string, unknown>>
  implements EventEmitter<TEvents>
{
  private handlers = new Map<keyof TEvents, Set<AnyHandler<TEvents>>>();

  /**
   * Subscribe to an event; the returned function unsubscribes
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    let registered = this.handlers.get(event);
    if (!registered) {
      registered = new Set();
      this.handlers.set(event, registered);
    }
    registered.add(handler as AnyHandler<TEvents>);
    return () => this.off(event, handler);
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const registered = this.handlers.get(event);
    if (!registered) return;

    registered.delete(handler as AnyHandler<TEvents>);
    if (registered.size === 0) {
      this.handlers.delete(event);
    }
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    const wrapper: EventHandler<TEvents[K]> = (data) => {
      this.off(event, wrapper);
      handler(data);
    };
    return this.on(event, wrapper);
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.handlers.get(event)?.size ?? 0;
  }

  /**
   * Deliver an event to a snapshot of the current handlers
   */
  protected emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const registered = this.handlers.get(event);
    if (!registered) return;

    for (const handler of Array.from(registered)) {
      handler(data);
    }
  }
}
