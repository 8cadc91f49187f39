import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { SchedulerRegistry } from '@nestjs/schedule';
import { NotificationWorkerLoop } from './notification-worker.loop';
import { NotificationWorker, type BatchResult } from './notification.worker';
import {
  DEFAULT_NOTIFICATION_CONFIG,
  NOTIFICATION_CONFIG,
} from '../../../../config/notification.config';

const emptyBatch: BatchResult = {
  released: 0,
  claimed: 0,
  sent: 0,
  retried: 0,
  failed: 0,
  skipped: 0,
};

describe('NotificationWorkerLoop', () => {
  let processBatch: ReturnType<typeof vi.fn>;
  let registry: SchedulerRegistry;
  let loop: NotificationWorkerLoop;

  beforeEach(async () => {
    processBatch = vi.fn().mockResolvedValue(emptyBatch);
    registry = new SchedulerRegistry();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NotificationWorkerLoop,
        { provide: NotificationWorker, useValue: { processBatch } },
        { provide: SchedulerRegistry, useValue: registry },
        {
          provide: NOTIFICATION_CONFIG,
          useValue: {
            ...DEFAULT_NOTIFICATION_CONFIG,
            pollIntervalMs: 10_000,
            errorRetryIntervalMs: 30_000,
          },
        },
      ],
    }).compile();

    loop = module.get(NotificationWorkerLoop);
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await loop.stop();
    vi.useRealTimers();
  });

  it('should run a batch immediately, then once per poll interval', async () => {
    loop.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(processBatch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(9_999);
    expect(processBatch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(processBatch).toHaveBeenCalledTimes(2);
  });

  it('should back off on the error interval after a crashed batch', async () => {
    processBatch.mockRejectedValueOnce(new Error('database is down'));
    loop.start();

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(processBatch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(20_000);
    expect(processBatch).toHaveBeenCalledTimes(2);
    expect(loop.isRunning).toBe(true);
  });

  it('should not start a second schedule when started twice', async () => {
    loop.start();
    loop.start();

    await vi.advanceTimersByTimeAsync(0);

    expect(processBatch).toHaveBeenCalledTimes(1);
  });

  it('should cancel the next poll on stop', async () => {
    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    await loop.stop();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(processBatch).toHaveBeenCalledTimes(1);
    expect(registry.doesExist('timeout', 'notification-worker-poll')).toBe(false);
  });

  it('should let an in-flight batch finish on stop', async () => {
    let finish: () => void = () => undefined;
    processBatch.mockImplementationOnce(
      () =>
        new Promise<BatchResult>((resolve) => {
          finish = () => resolve(emptyBatch);
        }),
    );
    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    let stopped = false;
    const stopping = loop.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finish();
    await stopping;
    expect(stopped).toBe(true);
  });

  it('should keep a single poll when restarted before the running batch ends', async () => {
    let finish: () => void = () => undefined;
    processBatch.mockImplementationOnce(
      () =>
        new Promise<BatchResult>((resolve) => {
          finish = () => resolve(emptyBatch);
        }),
    );
    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    const stopping = loop.stop();
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    finish();
    await stopping;
    await vi.advanceTimersByTimeAsync(0);

    expect(processBatch).toHaveBeenCalledTimes(1);
    expect(registry.doesExist('timeout', 'notification-worker-poll')).toBe(true);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(processBatch).toHaveBeenCalledTimes(2);
  });

  describe('runOnce', () => {
    it('should return the batch result', async () => {
      processBatch.mockResolvedValue({ ...emptyBatch, claimed: 2, sent: 2 });

      await expect(loop.runOnce()).resolves.toMatchObject({
        claimed: 2,
        sent: 2,
      });
    });

    it('should refuse to overlap a running batch', async () => {
      let finish: () => void = () => undefined;
      processBatch.mockImplementationOnce(
        () =>
          new Promise<BatchResult>((resolve) => {
            finish = () => resolve(emptyBatch);
          }),
      );
      const first = loop.runOnce();

      await expect(loop.runOnce()).rejects.toThrow(
        'A notification batch is already in progress',
      );
      finish();
      await expect(first).resolves.toEqual(emptyBatch);
    });

    it('should propagate batch errors', async () => {
      processBatch.mockRejectedValue(new Error('database is down'));

      await expect(loop.runOnce()).rejects.toThrow('database is down');
    });
  });
});
