import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { Logger } from '../domain/ports/Logger.js';
import { noopLogger } from '../domain/ports/Logger.js';
import { toErrorMessage } from '../domain/errors/Zip2SqliteError.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type AnyHandler = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<AnyHandler>>();

  constructor(private readonly logger: Logger = noopLogger) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler as AnyHandler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn({ event: event.type, error: toErrorMessage(error) }, 'event handler threw');
      }
    }
  }
}
