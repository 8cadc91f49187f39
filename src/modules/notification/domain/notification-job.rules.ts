/**
 * Domain rules for NotificationJob.
 * Pure functions, no infrastructure dependencies.
 */

export const NOTIFICATION_JOB_STATUSES = [
  'PENDING',
  'SENDING',
  'SENT',
  'FAILED',
] as const;

export type NotificationJobStatus = (typeof NOTIFICATION_JOB_STATUSES)[number];

export const FAILED_REASON_MAX_LENGTH = 255;

// ============ STATUS STATE MACHINE ============

/**
 * Job status transitions:
 * - PENDING -> SENDING (claim)
 * - SENDING -> SENT (delivered)
 * - SENDING -> PENDING (retryable failure, rescheduled)
 * - SENDING -> FAILED (retries exhausted or no handler)
 * - SENT, FAILED -> (terminal)
 */
const VALID_TRANSITIONS: Record<NotificationJobStatus, NotificationJobStatus[]> =
  {
    PENDING: ['SENDING'],
    SENDING: ['SENT', 'PENDING', 'FAILED'],
    SENT: [],
    FAILED: [],
  };

export function canTransition(
  from: NotificationJobStatus,
  to: NotificationJobStatus,
): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: NotificationJobStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

// ============ RETRY RULES ============

/**
 * A failed attempt is final once the incremented count reaches the budget.
 */
export function hasExhaustedRetries(
  retriesCount: number,
  maxRetries: number,
): boolean {
  return retriesCount >= maxRetries;
}

export function nextAttemptAt(now: Date, backoffMs: number): Date {
  return new Date(now.getTime() + backoffMs);
}

export function truncateFailedReason(reason: string): string {
  return reason.length > FAILED_REASON_MAX_LENGTH
    ? reason.slice(0, FAILED_REASON_MAX_LENGTH)
    : reason;
}

// ============ READ TRACKING ============

export interface ReadState {
  channel: string;
  isRead: boolean;
}

/**
 * Only unread in-app jobs can be marked read; is_read never goes back.
 */
export function canMarkRead(state: ReadState): boolean {
  return state.channel === 'in_app' && !state.isRead;
}
