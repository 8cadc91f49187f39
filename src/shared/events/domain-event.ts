/**
 * Base interface for in-process domain events.
 */
export interface DomainEvent<T = unknown> {
  /** Topic, e.g. 'user.registered' */
  readonly eventType: string;

  readonly aggregateType: string;
  readonly aggregateId: string;
  readonly payload: T;
  readonly occurredAt: Date;

  /** Optional correlation ID for tracing across services */
  readonly correlationId?: string;
}

/**
 * Extend this to create concrete event types with type-safe payloads.
 */
export abstract class BaseDomainEvent<T = unknown> implements DomainEvent<T> {
  abstract readonly eventType: string;
  abstract readonly aggregateType: string;
  readonly occurredAt: Date;
  readonly correlationId?: string;

  constructor(
    readonly aggregateId: string,
    readonly payload: T,
    correlationId?: string,
  ) {
    this.occurredAt = new Date();
    this.correlationId = correlationId;
  }
}
