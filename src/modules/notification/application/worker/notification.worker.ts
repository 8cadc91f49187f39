import { Injectable, Inject, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { DeliveryHandlerRegistry } from '../delivery-handler.registry';
import {
  NOTIFICATION_JOB_REPOSITORY,
  type NotificationJobRepository,
} from '../../domain/notification-job.repository';
import type { NotificationJobEntity } from '../../domain/notification-job.entity';
import {
  UnsupportedChannelError,
  describeError,
} from '../../../../shared/domain/errors';
import { CLOCK, type Clock } from '../../../../shared/domain/clock.port';
import {
  NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../../../config/notification.config';

export interface BatchResult {
  /** Stale SENDING rows returned to PENDING before claiming */
  released: number;
  claimed: number;
  sent: number;
  retried: number;
  failed: number;
  /** Outcome not persisted: lock lost or storage error */
  skipped: number;
}

type DeliveryOutcome = 'sent' | 'retried' | 'failed';
type JobOutcome = DeliveryOutcome | 'skipped';

/**
 * NotificationWorker - one poll cycle of the delivery state machine:
 *
 * 1. Claim: due PENDING jobs move to SENDING in their own committed
 *    transaction, under this worker's lock id
 * 2. Deliver: every claimed job runs concurrently, so a slow SMTP server
 *    does not hold up in-app jobs in the same batch
 * 3. Persist: each outcome is written with a compare-and-swap on the lock,
 *    independently of the others
 */
@Injectable()
export class NotificationWorker {
  private readonly logger = new Logger(NotificationWorker.name);
  readonly workerId = `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;

  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    private readonly registry: DeliveryHandlerRegistry,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(NOTIFICATION_CONFIG) private readonly config: NotificationConfig,
  ) {
    this.logger.log(`NotificationWorker initialized with ID: ${this.workerId}`);
  }

  /**
   * Storage errors while releasing or claiming propagate to the caller;
   * nothing has been claimed at that point.
   */
  async processBatch(): Promise<BatchResult> {
    const startedAt = Date.now();
    const result: BatchResult = {
      released: 0,
      claimed: 0,
      sent: 0,
      retried: 0,
      failed: 0,
      skipped: 0,
    };

    if (this.config.staleSendingTimeoutMs > 0) {
      result.released = await this.releaseStale();
    }

    const claimed = await this.jobs.claimDueBatch(
      this.clock.now(),
      this.config.batchSize,
      this.workerId,
    );
    result.claimed = claimed.length;

    if (claimed.length === 0) {
      return result;
    }

    const outcomes = await Promise.all(
      claimed.map((job) => this.processJob(job)),
    );
    for (const outcome of outcomes) {
      result[outcome]++;
    }

    this.logger.log({
      message: 'Notification batch processed',
      workerId: this.workerId,
      ...result,
      durationMs: Date.now() - startedAt,
    });

    return result;
  }

  private async releaseStale(): Promise<number> {
    const lockedBefore = new Date(
      this.clock.now().getTime() - this.config.staleSendingTimeoutMs,
    );
    const released = await this.jobs.releaseStale(lockedBefore);

    if (released > 0) {
      this.logger.warn(
        `Released ${released} SENDING jobs locked before ${lockedBefore.toISOString()}`,
      );
    }
    return released;
  }

  private async processJob(job: NotificationJobEntity): Promise<JobOutcome> {
    const outcome = await this.deliver(job);

    try {
      const saved = await this.jobs.saveOutcome(job, this.workerId);
      if (!saved) {
        this.logger.warn(
          `Job #${job.id} is no longer locked by this worker; ${outcome} outcome discarded`,
        );
        return 'skipped';
      }
    } catch (error) {
      this.logger.error(
        `Failed to persist ${outcome} outcome for job #${job.id}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return 'skipped';
    }

    return outcome;
  }

  /**
   * Applies the delivery result to the entity. Never throws: an unknown
   * channel fails the job outright, any handler exception counts as a retry.
   */
  private async deliver(job: NotificationJobEntity): Promise<DeliveryOutcome> {
    const handler = this.registry.resolve(job.channel);

    if (!handler) {
      const error = new UnsupportedChannelError(job.channel);
      job.failPermanently(error.message, this.clock.now());
      this.logger.error(
        `Job #${job.id} failed permanently: ${error.message} "${job.channel}"`,
      );
      return 'failed';
    }

    try {
      await handler.send(job.recipientId, job.messageData, job.id);
    } catch (error) {
      const reason = describeError(error);
      const outcome = job.recordFailure(
        reason,
        this.clock.now(),
        this.config.retryBackoffMs,
      );

      if (outcome === 'failed') {
        this.logger.error(
          `Job #${job.id} (${job.channel}) failed after ${job.retriesCount}/${job.maxRetries} attempts: ${reason}`,
        );
        return 'failed';
      }

      this.logger.warn(
        `Job #${job.id} (${job.channel}) failed (retry ${job.retriesCount}/${job.maxRetries}), next attempt at ${job.scheduledAt.toISOString()}: ${reason}`,
      );
      return 'retried';
    }

    job.markSent(this.clock.now());
    this.logger.debug(`Job #${job.id} (${job.channel}) sent`);
    return 'sent';
  }
}
