/**
 * Base class for domain errors.
 * Domain errors represent business rule violations.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ ENQUEUE ERRORS ============

export class InvalidNotificationRequestError extends DomainError {
  readonly code = 'INVALID_NOTIFICATION_REQUEST';

  constructor(public readonly violations: string[]) {
    super(`Invalid notification request: ${violations.join('; ')}`);
  }
}

// ============ JOB STATE ERRORS ============

export class InvalidJobTransitionError extends DomainError {
  readonly code = 'INVALID_JOB_TRANSITION';

  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Cannot transition notification job from ${from} to ${to}`);
  }
}

// ============ DELIVERY ERRORS ============

/**
 * Transient delivery failure. The worker counts it against the job's retry
 * budget and reschedules.
 */
export class DeliveryError extends DomainError {
  readonly code: string = 'DELIVERY_FAILED';

  constructor(
    public readonly channel: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RecipientNotFoundError extends DeliveryError {
  override readonly code = 'RECIPIENT_NOT_FOUND';

  constructor(
    channel: string,
    public readonly recipientId: number,
  ) {
    super(channel, `Recipient ${recipientId} has no deliverable address`);
  }
}

/**
 * Permanent: no handler is registered for the job's channel. The message is
 * what gets stored as the job's failed_reason.
 */
export class UnsupportedChannelError extends DomainError {
  readonly code = 'UNSUPPORTED_CHANNEL';

  constructor(public readonly channel: string) {
    super('no handler for channel');
  }
}

/**
 * Renders any thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
