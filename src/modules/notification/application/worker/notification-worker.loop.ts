import {
  Injectable,
  Inject,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { NotificationWorker, type BatchResult } from './notification.worker';
import { describeError } from '../../../../shared/domain/errors';
import {
  NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../../../config/notification.config';

const POLL_TIMEOUT = 'notification-worker-poll';

/**
 * Drives NotificationWorker forever: one batch, then the poll interval, then
 * the next batch. A batch that throws is logged and retried after the longer
 * error interval. At most one batch runs at a time.
 */
@Injectable()
export class NotificationWorkerLoop implements OnApplicationShutdown {
  private readonly logger = new Logger(NotificationWorkerLoop.name);
  private running = false;
  private inFlight: Promise<BatchResult> | null = null;

  constructor(
    private readonly worker: NotificationWorker,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(NOTIFICATION_CONFIG) private readonly config: NotificationConfig,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.log(
      `Worker loop started (batch ${this.config.batchSize}, poll ${this.config.pollIntervalMs}ms)`,
    );
    this.schedule(0);
  }

  /**
   * Cancels the next poll and waits for an in-flight batch to finish.
   */
  async stop(): Promise<void> {
    if (this.running) {
      this.running = false;
      this.logger.log('Worker loop stopping...');
    }
    if (this.schedulerRegistry.doesExist('timeout', POLL_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(POLL_TIMEOUT);
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  /**
   * Drain one batch now. Errors propagate to the caller.
   */
  async runOnce(): Promise<BatchResult> {
    if (this.inFlight) {
      throw new Error('A notification batch is already in progress');
    }
    return this.track();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  private track(): Promise<BatchResult> {
    const batch = this.worker.processBatch().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = batch;
    return batch;
  }

  private schedule(delayMs: number): void {
    if (!this.running) {
      return;
    }
    // start() after an un-awaited stop() may already have queued a poll
    if (this.schedulerRegistry.doesExist('timeout', POLL_TIMEOUT)) {
      return;
    }
    const timeout = setTimeout(() => void this.tick(), delayMs);
    this.schedulerRegistry.addTimeout(POLL_TIMEOUT, timeout);
  }

  private async tick(): Promise<void> {
    // Fired timeouts stay registered until removed.
    this.schedulerRegistry.deleteTimeout(POLL_TIMEOUT);

    let delayMs = this.config.pollIntervalMs;
    try {
      if (this.inFlight) {
        await this.inFlight;
      } else {
        await this.track();
      }
    } catch (error) {
      this.logger.error(
        `Notification batch crashed, retrying in ${this.config.errorRetryIntervalMs}ms: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      delayMs = this.config.errorRetryIntervalMs;
    }

    this.schedule(delayMs);
  }
}
