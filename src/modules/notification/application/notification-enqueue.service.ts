import { Injectable, Inject, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { EnqueueNotificationDto } from './dto/enqueue-notification.dto';
import { PreferenceGate } from './preference-gate.service';
import {
  NOTIFICATION_JOB_REPOSITORY,
  type NotificationJobRepository,
} from '../domain/notification-job.repository';
import type { NotificationChannel } from '../domain/notification-channel';
import type { MessageData } from '../domain/notification-job.entity';
import { InvalidNotificationRequestError } from '../../../shared/domain/errors';
import { CLOCK, type Clock } from '../../../shared/domain/clock.port';
import {
  NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../../config/notification.config';

/**
 * Entry point for producers. Injected wherever a notification needs sending;
 * the returned id is the durable job, or null when the recipient opted out.
 */
@Injectable()
export class NotificationEnqueueService {
  private readonly logger = new Logger(NotificationEnqueueService.name);

  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    private readonly preferenceGate: PreferenceGate,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(NOTIFICATION_CONFIG) private readonly config: NotificationConfig,
  ) {}

  /**
   * @throws InvalidNotificationRequestError for a malformed request
   * Storage errors propagate unchanged.
   */
  async enqueue(
    recipientId: number,
    channel: NotificationChannel,
    messageData: MessageData,
    notificationType = 'general',
  ): Promise<number | null> {
    const request = this.validate({
      recipientId,
      channel,
      messageData,
      notificationType,
    });

    const decision = await this.preferenceGate.check(
      request.recipientId,
      request.channel,
    );
    if (!decision.allowed) {
      this.logger.log(
        `Skipped ${request.notificationType} via ${request.channel} for recipient ${request.recipientId}: ${decision.reason}`,
      );
      return null;
    }

    const job = await this.jobs.insert({
      recipientId: request.recipientId,
      channel: request.channel,
      notificationType: request.notificationType,
      messageData: request.messageData,
      maxRetries: this.config.maxRetries,
      scheduledAt: this.clock.now(),
    });

    this.logger.debug(
      `Enqueued job #${job.id} (${request.notificationType} via ${request.channel}) for recipient ${request.recipientId}`,
    );
    return job.id;
  }

  private validate(input: Record<string, unknown>): EnqueueNotificationDto {
    const request = plainToInstance(EnqueueNotificationDto, input);
    const errors = validateSync(request);

    if (errors.length > 0) {
      throw new InvalidNotificationRequestError(
        errors.flatMap((error) => Object.values(error.constraints ?? {})),
      );
    }
    return request;
  }
}
