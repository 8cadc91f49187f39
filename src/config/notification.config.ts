import { ConfigService } from '@nestjs/config';
import type { FanoutBackend } from './env.validation';

export interface NotificationConfig {
  maxRetries: number;
  batchSize: number;
  pollIntervalMs: number;
  errorRetryIntervalMs: number;
  retryBackoffMs: number;
  /** 0 = never release SENDING rows */
  staleSendingTimeoutMs: number;
  fanoutBackend: FanoutBackend;
  maxBufferedBytes: number;
}

export const NOTIFICATION_CONFIG = Symbol('NOTIFICATION_CONFIG');

export const DEFAULT_NOTIFICATION_CONFIG: NotificationConfig = {
  maxRetries: 3,
  batchSize: 10,
  pollIntervalMs: 10_000,
  errorRetryIntervalMs: 30_000,
  retryBackoffMs: 5 * 60_000,
  staleSendingTimeoutMs: 0,
  fanoutBackend: 'postgres',
  maxBufferedBytes: 1_048_576,
};

export function loadNotificationConfig(
  configService: ConfigService,
): NotificationConfig {
  const d = DEFAULT_NOTIFICATION_CONFIG;
  return {
    maxRetries: configService.get<number>('NOTIFICATION_MAX_RETRIES', d.maxRetries),
    batchSize: configService.get<number>(
      'NOTIFICATION_WORKER_BATCH_SIZE',
      d.batchSize,
    ),
    pollIntervalMs: configService.get<number>(
      'NOTIFICATION_WORKER_POLL_INTERVAL_MS',
      d.pollIntervalMs,
    ),
    errorRetryIntervalMs: configService.get<number>(
      'NOTIFICATION_WORKER_ERROR_RETRY_INTERVAL_MS',
      d.errorRetryIntervalMs,
    ),
    retryBackoffMs: configService.get<number>(
      'NOTIFICATION_RETRY_BACKOFF_MS',
      d.retryBackoffMs,
    ),
    staleSendingTimeoutMs: configService.get<number>(
      'NOTIFICATION_STALE_SENDING_TIMEOUT_MS',
      d.staleSendingTimeoutMs,
    ),
    fanoutBackend: configService.get<FanoutBackend>(
      'NOTIFICATION_FANOUT_BACKEND',
      d.fanoutBackend,
    ),
    maxBufferedBytes: configService.get<number>(
      'REALTIME_MAX_BUFFERED_BYTES',
      d.maxBufferedBytes,
    ),
  };
}
