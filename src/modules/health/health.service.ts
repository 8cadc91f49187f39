import { Injectable, Inject } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import { DRIZZLE } from '../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../shared/infrastructure/database/database.module';
import {
  NOTIFICATION_JOB_REPOSITORY,
  type JobStatusCounts,
  type NotificationJobRepository,
} from '../notification/domain/notification-job.repository';
import { CLOCK, type Clock } from '../../shared/domain/clock.port';
import { describeError } from '../../shared/domain/errors';

export interface HealthReport {
  status: 'ok' | 'error';
  timestamp: string;
  database: 'connected' | 'disconnected';
  /** notification_jobs rows by status */
  queue?: JobStatusCounts;
  error?: string;
}

@Injectable()
export class HealthService {
  constructor(
    @Inject(DRIZZLE) private readonly db: DrizzleClient,
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async check(): Promise<HealthReport> {
    const timestamp = this.clock.now().toISOString();

    try {
      await this.db.execute(sql`SELECT 1`);
    } catch (error) {
      return {
        status: 'error',
        timestamp,
        database: 'disconnected',
        error: describeError(error),
      };
    }

    try {
      const queue = await this.jobs.countByStatus();
      return { status: 'ok', timestamp, database: 'connected', queue };
    } catch (error) {
      return {
        status: 'error',
        timestamp,
        database: 'connected',
        error: describeError(error),
      };
    }
  }
}
