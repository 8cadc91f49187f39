import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NotificationWorker, type BatchResult } from './notification.worker';
import { DeliveryHandlerRegistry } from '../delivery-handler.registry';
import type { DeliveryHandler } from '../../domain/delivery-handler';
import { InMemoryNotificationJobRepository } from '../../../../shared/testing/in-memory-notification-job.repository';
import { DeliveryError } from '../../../../shared/domain/errors';
import {
  DEFAULT_NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../../../config/notification.config';

class ConnectionError extends Error {
  override name = 'ConnectionError';
}

const FIVE_MINUTES = 5 * 60_000;

describe('NotificationWorker', () => {
  let now: Date;
  let jobs: InMemoryNotificationJobRepository;
  let emailHandler: DeliveryHandler & { send: ReturnType<typeof vi.fn> };
  let inAppHandler: DeliveryHandler & { send: ReturnType<typeof vi.fn> };
  let config: NotificationConfig;

  const clock = { now: () => now };

  const createWorker = () =>
    new NotificationWorker(
      jobs,
      new DeliveryHandlerRegistry([emailHandler, inAppHandler]),
      clock,
      config,
    );

  const enqueue = (channel: string, recipientId = 1) =>
    jobs.insert({
      recipientId,
      channel,
      notificationType: 't',
      messageData: { subject: 'Hi' },
      maxRetries: 3,
      scheduledAt: now,
    });

  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };

  beforeEach(() => {
    now = new Date('2026-03-01T12:00:00Z');
    jobs = new InMemoryNotificationJobRepository();
    emailHandler = { channel: 'email', send: vi.fn().mockResolvedValue(undefined) };
    inAppHandler = { channel: 'in_app', send: vi.fn().mockResolvedValue(undefined) };
    config = { ...DEFAULT_NOTIFICATION_CONFIG };
  });

  describe('processBatch', () => {
    it('should do nothing when no job is due', async () => {
      await enqueue('email');
      advance(-1000);

      const result = await createWorker().processBatch();

      expect(result.claimed).toBe(0);
      expect(emailHandler.send).not.toHaveBeenCalled();
    });

    it('should mark a delivered job SENT and never process it again', async () => {
      const job = await enqueue('email');
      const worker = createWorker();

      const first = await worker.processBatch();
      advance(FIVE_MINUTES * 10);
      const second = await worker.processBatch();

      expect(first).toEqual({
        released: 0,
        claimed: 1,
        sent: 1,
        retried: 0,
        failed: 0,
        skipped: 0,
      });
      expect(second.claimed).toBe(0);
      expect(emailHandler.send).toHaveBeenCalledTimes(1);
      expect(emailHandler.send).toHaveBeenCalledWith(1, { subject: 'Hi' }, job.id);
      expect(jobs.get(job.id)).toMatchObject({
        status: 'SENT',
        sentAt: new Date('2026-03-01T12:00:00Z'),
        lockedBy: null,
      });
    });

    it('should reschedule a job whose handler raises a connection error', async () => {
      const job = await enqueue('email');
      emailHandler.send.mockRejectedValue(
        new ConnectionError('Connection refused by smtp.test:465'),
      );

      const result = await createWorker().processBatch();

      expect(result.retried).toBe(1);
      const stored = jobs.get(job.id);
      expect(stored?.status).toBe('PENDING');
      expect(stored?.retriesCount).toBe(1);
      expect(stored?.scheduledAt).toEqual(new Date('2026-03-01T12:05:00Z'));
      expect(stored?.failedReason).toContain('Connection refused by smtp.test:465');
      expect(stored?.sentAt).toBeNull();
    });

    it('should not retry before the backoff has elapsed', async () => {
      await enqueue('email');
      emailHandler.send.mockRejectedValue(new ConnectionError('down'));
      const worker = createWorker();

      await worker.processBatch();
      advance(FIVE_MINUTES - 1);
      const result = await worker.processBatch();

      expect(result.claimed).toBe(0);
      expect(emailHandler.send).toHaveBeenCalledTimes(1);
    });

    it('should fail a job for good after max_retries attempts', async () => {
      const job = await enqueue('email');
      emailHandler.send.mockRejectedValue(new ConnectionError('down'));
      const worker = createWorker();

      const results: BatchResult[] = [];
      for (let run = 0; run < 3; run++) {
        results.push(await worker.processBatch());
        advance(FIVE_MINUTES);
      }
      const afterFailure = await worker.processBatch();

      expect(results.map((r) => r.retried)).toEqual([1, 1, 0]);
      expect(results[2].failed).toBe(1);
      expect(afterFailure.claimed).toBe(0);
      expect(jobs.get(job.id)).toMatchObject({
        status: 'FAILED',
        retriesCount: 3,
        failedReason: 'down',
        sentAt: null,
      });
    });

    it('should fail unknown channels immediately without retrying', async () => {
      const job = await enqueue('sms');

      const result = await createWorker().processBatch();

      expect(result.failed).toBe(1);
      expect(jobs.get(job.id)).toMatchObject({
        status: 'FAILED',
        retriesCount: 0,
        failedReason: 'no handler for channel',
      });
    });

    it('should truncate long failure reasons to 255 characters', async () => {
      const job = await enqueue('email');
      emailHandler.send.mockRejectedValue(new Error('x'.repeat(1000)));

      await createWorker().processBatch();

      expect(jobs.get(job.id)?.failedReason).toHaveLength(255);
    });

    it('should isolate jobs in the same batch from each other', async () => {
      const email = await enqueue('email');
      const inApp = await enqueue('in_app');
      emailHandler.send.mockRejectedValue(
        new DeliveryError('email', 'SMTP delivery failed: timeout'),
      );

      const result = await createWorker().processBatch();

      expect(result).toMatchObject({ claimed: 2, sent: 1, retried: 1 });
      expect(jobs.get(email.id)?.status).toBe('PENDING');
      expect(jobs.get(inApp.id)?.status).toBe('SENT');
    });

    it('should deliver jobs of one batch concurrently', async () => {
      await enqueue('email');
      await enqueue('in_app');
      let releaseEmail: () => void = () => undefined;
      emailHandler.send.mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            releaseEmail = () => resolve();
          }),
      );

      const batch = createWorker().processBatch();
      await vi.waitFor(() => expect(inAppHandler.send).toHaveBeenCalled());
      releaseEmail();

      await expect(batch).resolves.toMatchObject({ sent: 2 });
    });

    it('should claim oldest due jobs first, up to the batch size', async () => {
      config = { ...config, batchSize: 2 };
      const first = await enqueue('email', 1);
      advance(1000);
      const second = await enqueue('email', 2);
      advance(1000);
      await enqueue('email', 3);

      await createWorker().processBatch();

      expect(emailHandler.send.mock.calls.map((call) => call[2])).toEqual([
        first.id,
        second.id,
      ]);
    });

    it('should let exactly one of two racing workers claim a job', async () => {
      const job = await enqueue('in_app');
      const workerA = createWorker();
      const workerB = createWorker();

      const [a, b] = await Promise.all([
        workerA.processBatch(),
        workerB.processBatch(),
      ]);

      expect(a.claimed + b.claimed).toBe(1);
      expect(inAppHandler.send).toHaveBeenCalledTimes(1);
      expect(jobs.get(job.id)?.status).toBe('SENT');
    });

    it('should discard an outcome when the lock was lost mid-delivery', async () => {
      const job = await enqueue('email');
      emailHandler.send.mockImplementation(async () => {
        await jobs.releaseStale(new Date('2100-01-01T00:00:00Z'));
      });

      const result = await createWorker().processBatch();

      expect(result).toMatchObject({ claimed: 1, sent: 0, skipped: 1 });
      expect(jobs.get(job.id)?.status).toBe('PENDING');
    });

    it('should keep going when persisting one outcome fails', async () => {
      const failing = await enqueue('email');
      const healthy = await enqueue('in_app');
      const saveOutcome = jobs.saveOutcome.bind(jobs);
      vi.spyOn(jobs, 'saveOutcome').mockImplementation(async (job, workerId) => {
        if (job.id === failing.id) {
          throw new Error('deadlock detected');
        }
        return saveOutcome(job, workerId);
      });

      const result = await createWorker().processBatch();

      expect(result).toMatchObject({ claimed: 2, sent: 1, skipped: 1 });
      expect(jobs.get(healthy.id)?.status).toBe('SENT');
      expect(jobs.get(failing.id)?.status).toBe('SENDING');
    });

    it('should propagate claim failures', async () => {
      vi.spyOn(jobs, 'claimDueBatch').mockRejectedValue(
        new Error('connection terminated'),
      );

      await expect(createWorker().processBatch()).rejects.toThrow(
        'connection terminated',
      );
    });
  });

  describe('stale SENDING recovery', () => {
    it('should leave SENDING rows alone when disabled', async () => {
      const job = await enqueue('email');
      await jobs.claimDueBatch(now, 10, 'crashed-worker');
      advance(FIVE_MINUTES * 100);

      const result = await createWorker().processBatch();

      expect(result.released).toBe(0);
      expect(jobs.get(job.id)?.status).toBe('SENDING');
    });

    it('should release and redeliver rows locked longer than the timeout', async () => {
      config = { ...config, staleSendingTimeoutMs: FIVE_MINUTES };
      const job = await enqueue('email');
      await jobs.claimDueBatch(now, 10, 'crashed-worker');
      advance(FIVE_MINUTES + 1);

      const result = await createWorker().processBatch();

      expect(result).toMatchObject({ released: 1, claimed: 1, sent: 1 });
      expect(jobs.get(job.id)?.status).toBe('SENT');
    });

    it('should not release rows still within the timeout', async () => {
      config = { ...config, staleSendingTimeoutMs: FIVE_MINUTES };
      await enqueue('email');
      await jobs.claimDueBatch(now, 10, 'busy-worker');
      advance(FIVE_MINUTES - 1);

      const result = await createWorker().processBatch();

      expect(result).toMatchObject({ released: 0, claimed: 0 });
    });
  });
});
