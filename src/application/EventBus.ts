import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { isEventOfType } from '../domain/events/DomainEvents.js';

export type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

export type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for interpreter events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Typed handlers are stored wrapped, keyed by the original so `off()` can find them.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        try {
          handler(event);
        } catch {
          // A broken subscriber must not fail the query or skip other handlers.
        }
      }
    }

    for (const handler of this.wildcardHandlers) {
      try {
        handler(event);
      } catch {
        // Swallow handler errors.
      }
    }
  }
}
