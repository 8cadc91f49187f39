import { Injectable, Inject, Logger, Optional } from '@nestjs/common';
import type { DeliveryHandler } from '../../domain/delivery-handler';
import type { MessageData } from '../../domain/notification-job.entity';
import {
  FANOUT_BUS,
  groupName,
  type FanoutBus,
} from '../../../realtime/domain/fanout-bus';
import { DeliveryError, describeError } from '../../../../shared/domain/errors';

/**
 * Hands the payload to the fanout layer. Success means the layer accepted
 * it, not that any client was connected or read it.
 */
@Injectable()
export class InAppDeliveryHandler implements DeliveryHandler {
  readonly channel = 'in_app';
  private readonly logger = new Logger(InAppDeliveryHandler.name);

  constructor(
    @Optional() @Inject(FANOUT_BUS) private readonly fanout?: FanoutBus,
  ) {}

  async send(
    recipientId: number,
    messageData: MessageData,
    jobId: number,
  ): Promise<void> {
    if (!this.fanout) {
      throw new DeliveryError(this.channel, 'Realtime fanout layer is not configured');
    }

    try {
      await this.fanout.publish({ recipientId, jobId, data: messageData });
    } catch (error) {
      if (error instanceof DeliveryError) {
        throw error;
      }
      throw new DeliveryError(
        this.channel,
        `Fanout layer unavailable: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.logger.debug(`Job #${jobId} published to ${groupName(recipientId)}`);
  }
}
