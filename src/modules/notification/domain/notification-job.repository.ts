import type {
  MessageData,
  NotificationJobEntity,
} from './notification-job.entity';

/**
 * NotificationJob Repository Interface (Port)
 *
 * The job table is the only shared mutable state between producers, workers
 * and live connections; every mutation goes through one of these methods.
 */

export interface NewNotificationJob {
  recipientId: number;
  channel: string;
  notificationType: string;
  messageData: MessageData;
  maxRetries: number;
  scheduledAt: Date;
}

export interface JobStatusCounts {
  pending: number;
  sending: number;
  sent: number;
  failed: number;
}

export interface NotificationJobRepository {
  /**
   * Insert a PENDING job with retries_count = 0.
   */
  insert(job: NewNotificationJob): Promise<NotificationJobEntity>;

  /**
   * Claim up to `limit` due jobs (PENDING, scheduled_at <= now), oldest due
   * first, skipping rows another transaction holds. Claimed rows are committed
   * as SENDING and locked by `workerId` before this resolves.
   */
  claimDueBatch(
    now: Date,
    limit: number,
    workerId: string,
  ): Promise<NotificationJobEntity[]>;

  /**
   * Persist the outcome of a delivery attempt, only if the row is still
   * SENDING under `workerId`.
   * @returns false if the row was released or taken over meanwhile
   */
  saveOutcome(job: NotificationJobEntity, workerId: string): Promise<boolean>;

  findById(id: number): Promise<NotificationJobEntity | null>;

  /**
   * SENT, in-app, unread jobs for a recipient, oldest created first.
   */
  findMissedInApp(recipientId: number): Promise<NotificationJobEntity[]>;

  /**
   * Flip is_read false -> true on an in-app job. When `recipientId` is given
   * (a client ack) the job must also belong to that recipient and be SENT.
   * @returns false for unknown, email or already-read jobs, and for acks of
   * jobs not yet sent
   */
  markRead(jobId: number, recipientId?: number): Promise<boolean>;

  /**
   * Return SENDING rows locked before `lockedBefore` to PENDING.
   * @returns number of rows released
   */
  releaseStale(lockedBefore: Date): Promise<number>;

  countByStatus(): Promise<JobStatusCounts>;
}

export const NOTIFICATION_JOB_REPOSITORY = Symbol('NOTIFICATION_JOB_REPOSITORY');
