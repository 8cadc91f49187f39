import { InvalidJobTransitionError } from '../../../shared/domain/errors';
import {
  canMarkRead,
  canTransition,
  hasExhaustedRetries,
  nextAttemptAt,
  truncateFailedReason,
  type NotificationJobStatus,
} from './notification-job.rules';

export type MessageData = Record<string, unknown>;

/**
 * NotificationJob data interface (for persistence/transfer)
 */
export interface NotificationJobData {
  id: number;
  recipientId: number;
  /** Stored as text; may name a channel this build has no handler for */
  channel: string;
  notificationType: string;
  messageData: MessageData;
  status: NotificationJobStatus;
  retriesCount: number;
  maxRetries: number;
  failedReason: string | null;
  scheduledAt: Date;
  sentAt: Date | null;
  isRead: boolean;
  lockedAt: Date | null;
  lockedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type FailureOutcome = 'retry' | 'failed';

/**
 * NotificationJob Entity - owns the delivery state machine.
 * Every mutator validates the transition before touching state.
 */
export class NotificationJobEntity {
  readonly id: number;
  readonly recipientId: number;
  readonly channel: string;
  readonly notificationType: string;
  readonly messageData: MessageData;
  readonly maxRetries: number;
  readonly createdAt: Date;

  private _status: NotificationJobStatus;
  private _retriesCount: number;
  private _failedReason: string | null;
  private _scheduledAt: Date;
  private _sentAt: Date | null;
  private _isRead: boolean;
  private _lockedAt: Date | null;
  private _lockedBy: string | null;
  private _updatedAt: Date;

  constructor(data: NotificationJobData) {
    this.id = data.id;
    this.recipientId = data.recipientId;
    this.channel = data.channel;
    this.notificationType = data.notificationType;
    this.messageData = data.messageData;
    this.maxRetries = data.maxRetries;
    this.createdAt = data.createdAt;
    this._status = data.status;
    this._retriesCount = data.retriesCount;
    this._failedReason = data.failedReason;
    this._scheduledAt = data.scheduledAt;
    this._sentAt = data.sentAt;
    this._isRead = data.isRead;
    this._lockedAt = data.lockedAt;
    this._lockedBy = data.lockedBy;
    this._updatedAt = data.updatedAt;
  }

  // ============ GETTERS ============

  get status(): NotificationJobStatus {
    return this._status;
  }

  get retriesCount(): number {
    return this._retriesCount;
  }

  get failedReason(): string | null {
    return this._failedReason;
  }

  get scheduledAt(): Date {
    return this._scheduledAt;
  }

  get sentAt(): Date | null {
    return this._sentAt;
  }

  get isRead(): boolean {
    return this._isRead;
  }

  get lockedBy(): string | null {
    return this._lockedBy;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  isDue(now: Date): boolean {
    return this._status === 'PENDING' && this._scheduledAt <= now;
  }

  // ============ DOMAIN METHODS ============

  /**
   * @throws InvalidJobTransitionError unless PENDING
   */
  claim(workerId: string, now: Date): void {
    this.transitionTo('SENDING');
    this._lockedAt = now;
    this._lockedBy = workerId;
    this._updatedAt = now;
  }

  markSent(now: Date): void {
    this.transitionTo('SENT');
    this._sentAt = now;
    this.release(now);
  }

  /**
   * Counts a failed attempt against the retry budget. Either reschedules the
   * job `backoffMs` from now or fails it for good.
   */
  recordFailure(reason: string, now: Date, backoffMs: number): FailureOutcome {
    const retriesCount = this._retriesCount + 1;
    const exhausted = hasExhaustedRetries(retriesCount, this.maxRetries);

    this.transitionTo(exhausted ? 'FAILED' : 'PENDING');
    this._retriesCount = retriesCount;
    this._failedReason = truncateFailedReason(reason);
    if (!exhausted) {
      this._scheduledAt = nextAttemptAt(now, backoffMs);
    }
    this.release(now);

    return exhausted ? 'failed' : 'retry';
  }

  /**
   * Terminal failure without touching the retry count.
   */
  failPermanently(reason: string, now: Date): void {
    this.transitionTo('FAILED');
    this._failedReason = truncateFailedReason(reason);
    this.release(now);
  }

  /**
   * @returns false when the job is not an unread in-app job (no-op)
   */
  markRead(now: Date): boolean {
    if (!canMarkRead({ channel: this.channel, isRead: this._isRead })) {
      return false;
    }
    this._isRead = true;
    this._updatedAt = now;
    return true;
  }

  // ============ INTERNALS ============

  private transitionTo(next: NotificationJobStatus): void {
    if (!canTransition(this._status, next)) {
      throw new InvalidJobTransitionError(this._status, next);
    }
    this._status = next;
  }

  private release(now: Date): void {
    this._lockedAt = null;
    this._lockedBy = null;
    this._updatedAt = now;
  }

  // ============ SERIALIZATION ============

  toData(): NotificationJobData {
    return {
      id: this.id,
      recipientId: this.recipientId,
      channel: this.channel,
      notificationType: this.notificationType,
      messageData: this.messageData,
      status: this._status,
      retriesCount: this._retriesCount,
      maxRetries: this.maxRetries,
      failedReason: this._failedReason,
      scheduledAt: this._scheduledAt,
      sentAt: this._sentAt,
      isRead: this._isRead,
      lockedAt: this._lockedAt,
      lockedBy: this._lockedBy,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
    };
  }

  static fromData(data: NotificationJobData): NotificationJobEntity {
    return new NotificationJobEntity(data);
  }
}
