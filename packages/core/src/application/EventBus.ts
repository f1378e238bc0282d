import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

type HandlerRegistry = { [T in EventType]?: Set<EventHandler<T>> };

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers: HandlerRegistry = {};
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const registry: { [K in T]?: Set<EventHandler<K>> } = this.handlers;
    const existing = registry[type] ?? new Set<EventHandler<T>>();
    existing.add(handler);
    registry[type] = existing;
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    this.dispatch(event.type, event);

    for (const handler of this.wildcardHandlers) {
      try {
        handler(event);
      } catch {
        // Subscriber failures never reach the pipeline.
      }
    }
  }

  private dispatch<T extends EventType>(type: T, event: EventPayload<T>): void {
    const handlers = this.handlers[type];
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(event);
      } catch {
        // Subscriber failures never reach the pipeline.
      }
    }
  }
}
