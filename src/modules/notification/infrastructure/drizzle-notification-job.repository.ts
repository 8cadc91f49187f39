import { Injectable, Inject } from '@nestjs/common';
import { and, asc, eq, inArray, lte, sql } from 'drizzle-orm';
import type {
  JobStatusCounts,
  NewNotificationJob,
  NotificationJobRepository,
} from '../domain/notification-job.repository';
import {
  NotificationJobEntity,
  type NotificationJobData,
} from '../domain/notification-job.entity';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import {
  notificationJobs,
  type NotificationJobRow,
} from '../../../shared/infrastructure/database/schema';
import {
  LOCK_IDS,
  tryAcquireXactLock,
} from '../../../shared/domain/advisory-lock';

@Injectable()
export class DrizzleNotificationJobRepository
  implements NotificationJobRepository
{
  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async insert(job: NewNotificationJob): Promise<NotificationJobEntity> {
    const [row] = await this.db
      .insert(notificationJobs)
      .values({
        recipientId: job.recipientId,
        channel: job.channel,
        notificationType: job.notificationType,
        messageData: job.messageData,
        status: 'PENDING',
        retriesCount: 0,
        maxRetries: job.maxRetries,
        scheduledAt: job.scheduledAt,
        createdAt: job.scheduledAt,
        updatedAt: job.scheduledAt,
      })
      .returning();

    return this.toEntity(row);
  }

  /**
   * SELECT ... FOR UPDATE SKIP LOCKED, then a status-guarded UPDATE in the
   * same transaction. Rows another worker holds are skipped rather than
   * waited on; rows another worker already advanced fail the guard.
   */
  async claimDueBatch(
    now: Date,
    limit: number,
    workerId: string,
  ): Promise<NotificationJobEntity[]> {
    const claimed = await this.db.transaction(
      async (tx): Promise<NotificationJobRow[]> => {
        const due = await tx
          .select({ id: notificationJobs.id })
          .from(notificationJobs)
          .where(
            and(
              eq(notificationJobs.status, 'PENDING'),
              lte(notificationJobs.scheduledAt, now),
            ),
          )
          .orderBy(asc(notificationJobs.scheduledAt), asc(notificationJobs.id))
          .limit(limit)
          .for('update', { skipLocked: true });

        if (due.length === 0) {
          return [];
        }

        return tx
          .update(notificationJobs)
          .set({
            status: 'SENDING',
            lockedAt: now,
            lockedBy: workerId,
            updatedAt: now,
          })
          .where(
            and(
              inArray(
                notificationJobs.id,
                due.map((row) => row.id),
              ),
              eq(notificationJobs.status, 'PENDING'),
            ),
          )
          .returning();
      },
    );

    // UPDATE ... RETURNING does not preserve the SELECT order.
    return claimed
      .sort(
        (a, b) =>
          a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.id - b.id,
      )
      .map((row) => this.toEntity(row));
  }

  async saveOutcome(
    job: NotificationJobEntity,
    workerId: string,
  ): Promise<boolean> {
    const data = job.toData();

    const updated = await this.db
      .update(notificationJobs)
      .set({
        status: data.status,
        retriesCount: data.retriesCount,
        failedReason: data.failedReason,
        scheduledAt: data.scheduledAt,
        sentAt: data.sentAt,
        lockedAt: data.lockedAt,
        lockedBy: data.lockedBy,
        updatedAt: data.updatedAt,
      })
      .where(
        and(
          eq(notificationJobs.id, data.id),
          eq(notificationJobs.status, 'SENDING'),
          eq(notificationJobs.lockedBy, workerId),
        ),
      )
      .returning({ id: notificationJobs.id });

    return updated.length > 0;
  }

  async findById(id: number): Promise<NotificationJobEntity | null> {
    const [row] = await this.db
      .select()
      .from(notificationJobs)
      .where(eq(notificationJobs.id, id))
      .limit(1);

    return row ? this.toEntity(row) : null;
  }

  async findMissedInApp(recipientId: number): Promise<NotificationJobEntity[]> {
    const rows = await this.db
      .select()
      .from(notificationJobs)
      .where(
        and(
          eq(notificationJobs.recipientId, recipientId),
          eq(notificationJobs.channel, 'in_app'),
          eq(notificationJobs.status, 'SENT'),
          eq(notificationJobs.isRead, false),
        ),
      )
      .orderBy(asc(notificationJobs.createdAt), asc(notificationJobs.id));

    return rows.map((row) => this.toEntity(row));
  }

  /**
   * Without a recipient there is no status guard: a live push can reach the
   * client before the worker commits SENT for the same job. A client ack
   * only counts once the job is SENT.
   */
  async markRead(jobId: number, recipientId?: number): Promise<boolean> {
    const updated = await this.db
      .update(notificationJobs)
      .set({ isRead: true, updatedAt: sql`now()` })
      .where(
        and(
          eq(notificationJobs.id, jobId),
          eq(notificationJobs.channel, 'in_app'),
          eq(notificationJobs.isRead, false),
          ...(recipientId === undefined
            ? []
            : [
                eq(notificationJobs.recipientId, recipientId),
                eq(notificationJobs.status, 'SENT'),
              ]),
        ),
      )
      .returning({ id: notificationJobs.id });

    return updated.length > 0;
  }

  /**
   * Guarded by a transaction-scoped advisory lock so concurrent workers do
   * not sweep the same rows twice.
   */
  async releaseStale(lockedBefore: Date): Promise<number> {
    return this.db.transaction(async (tx) => {
      const acquired = await tryAcquireXactLock(
        tx,
        LOCK_IDS.RELEASE_STALE_NOTIFICATIONS,
      );
      if (!acquired) {
        return 0;
      }

      const released = await tx
        .update(notificationJobs)
        .set({
          status: 'PENDING',
          lockedAt: null,
          lockedBy: null,
          updatedAt: sql`now()`,
        })
        .where(
          and(
            eq(notificationJobs.status, 'SENDING'),
            lte(notificationJobs.lockedAt, lockedBefore),
          ),
        )
        .returning({ id: notificationJobs.id });

      return released.length;
    });
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const rows = await this.db
      .select({
        status: notificationJobs.status,
        count: sql<number>`count(*)::int`,
      })
      .from(notificationJobs)
      .groupBy(notificationJobs.status);

    const counts: JobStatusCounts = { pending: 0, sending: 0, sent: 0, failed: 0 };
    for (const row of rows) {
      if (row.status === 'PENDING') counts.pending = row.count;
      if (row.status === 'SENDING') counts.sending = row.count;
      if (row.status === 'SENT') counts.sent = row.count;
      if (row.status === 'FAILED') counts.failed = row.count;
    }
    return counts;
  }

  private toEntity(row: NotificationJobRow): NotificationJobEntity {
    const data: NotificationJobData = {
      id: row.id,
      recipientId: row.recipientId,
      channel: row.channel,
      notificationType: row.notificationType,
      messageData: row.messageData,
      status: row.status,
      retriesCount: row.retriesCount,
      maxRetries: row.maxRetries,
      failedReason: row.failedReason,
      scheduledAt: row.scheduledAt,
      sentAt: row.sentAt,
      isRead: row.isRead,
      lockedAt: row.lockedAt,
      lockedBy: row.lockedBy,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
    return NotificationJobEntity.fromData(data);
  }
}
