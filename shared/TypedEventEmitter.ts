// Type-safe event emitter keyed by an event → payload map
export type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [E in keyof Events]?: Set<EventHandler<Events[E]>> };

// Subscription side only, for collaborator interfaces
export interface EventSubscriber<Events extends object> {
  on<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void;
  off<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void;
}

export class TypedEventEmitter<Events extends object> implements EventSubscriber<Events> {
  private handlers: HandlerTable<Events> = {};

  // Register event handler
  on<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
    const existing = this.handlers[event];
    if (existing) {
      existing.add(handler);
    } else {
      this.handlers[event] = new Set([handler]);
    }
  }

  // Remove event handler
  off<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
    const handlers = this.handlers[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  // Register one-time event handler
  once<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
    const wrappedHandler: EventHandler<Events[E]> = payload => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    this.on(event, wrappedHandler);
  }

  // Emit event with payload; a throwing handler never stops the others
  emit<E extends keyof Events>(event: E, payload: Events[E]): void {
    const handlers = this.handlers[event];
    if (!handlers) return;

    for (const handler of Array.from(handlers)) {
      try {
        handler(payload);
      } catch (error) {
        this.onHandlerError(String(event), error);
      }
    }
  }

  // Remove all handlers
  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  // Get listener count
  listenerCount(event: keyof Events): number {
    return this.handlers[event]?.size ?? 0;
  }

  protected onHandlerError(event: string, error: unknown): void {
    console.error(`Error in event handler for ${event}:`, error);
  }
}
