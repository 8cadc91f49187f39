import { Injectable, Logger } from '@nestjs/common';
import type { IEventBus, EventHandler } from './event-bus.interface';
import type { DomainEvent } from './domain-event';
import { describeError } from '../domain/errors';

/**
 * Single-process event bus. Handlers for one event run concurrently.
 */
@Injectable()
export class InMemoryEventBus implements IEventBus {
  private readonly logger = new Logger(InMemoryEventBus.name);
  private readonly handlers = new Map<string, Set<EventHandler>>();

  async publish(event: DomainEvent): Promise<void> {
    const eventHandlers = this.handlers.get(event.eventType);

    if (!eventHandlers || eventHandlers.size === 0) {
      this.logger.debug(`No handlers registered for event: ${event.eventType}`);
      return;
    }

    this.logger.log(
      `Publishing ${event.eventType} for ${event.aggregateType}#${event.aggregateId}`,
    );

    const results = await Promise.allSettled(
      Array.from(eventHandlers).map((handler) => handler(event)),
    );

    const failures = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected',
    );
    for (const failure of failures) {
      this.logger.error(
        `Handler failed for event ${event.eventType}: ${describeError(failure.reason)}`,
      );
    }

    if (failures.length > 0) {
      throw failures[0].reason;
    }
  }

  subscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void {
    let eventHandlers = this.handlers.get(eventType);
    if (!eventHandlers) {
      eventHandlers = new Set();
      this.handlers.set(eventType, eventHandlers);
    }
    // Payload typing is the subscriber's contract with the publisher.
    eventHandlers.add(handler as EventHandler);
    this.logger.log(`Handler subscribed to: ${eventType}`);
  }

  unsubscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void {
    const eventHandlers = this.handlers.get(eventType);
    if (eventHandlers) {
      eventHandlers.delete(handler as EventHandler);
      if (eventHandlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  hasHandlers(eventType: string): boolean {
    const eventHandlers = this.handlers.get(eventType);
    return !!eventHandlers && eventHandlers.size > 0;
  }

  getRegisteredEventTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
