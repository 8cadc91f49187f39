import type { DomainEvent } from './domain-event';

export type EventHandler<T = unknown> = (
  event: DomainEvent<T>,
) => Promise<void>;

/**
 * In-process publish/subscribe contract between producers (e.g. account
 * registration) and the notification module.
 */
export interface IEventBus {
  /**
   * Runs every handler for the event's type. Rejects if any handler failed,
   * after all of them have run.
   */
  publish(event: DomainEvent): Promise<void>;

  subscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void;

  unsubscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void;

  hasHandlers(eventType: string): boolean;
}

export const EVENT_BUS = Symbol('EVENT_BUS');
