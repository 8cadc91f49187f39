import type { MessageData } from './notification-job.entity';
import type { NotificationChannel } from './notification-channel';

/**
 * One implementation per channel. `send` resolves once the channel has
 * accepted the message and throws (normally a DeliveryError) otherwise.
 * Handlers never retry; the worker owns the retry policy.
 */
export interface DeliveryHandler {
  readonly channel: NotificationChannel;
  send(recipientId: number, messageData: MessageData, jobId: number): Promise<void>;
}

export const DELIVERY_HANDLERS = Symbol('DELIVERY_HANDLERS');
