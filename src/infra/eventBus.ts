/**
 * Simple in-memory pub/sub event bus.
 * The governance service emits ledger events; the WebSocket handler broadcasts them.
 */

export type EventType =
  | 'initiative.created'
  | 'initiative.signaled'
  | 'initiative.terminated'
  | 'ledger.span.configured'
  | 'ledger.operation.rejected';

export type EventCallback = (event: EventType, data: unknown) => void;

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers.
   * A throwing listener is reported through `onListenerError` and does not stop delivery.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];

    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  /** Replace the handler for listener failures. Defaults to stderr. */
  setErrorHandler(handler: (event: EventType, error: unknown) => void): void {
    this.onListenerError = handler;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }

  private onListenerError: (event: EventType, error: unknown) => void = (event, error) => {
    console.error(`eventBus listener for ${event} failed`, error);
  };
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
