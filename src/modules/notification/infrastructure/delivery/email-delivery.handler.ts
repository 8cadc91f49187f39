import { Injectable, Inject, Logger } from '@nestjs/common';
import type { DeliveryHandler } from '../../domain/delivery-handler';
import type { MessageData } from '../../domain/notification-job.entity';
import {
  RECIPIENT_DIRECTORY,
  type RecipientDirectory,
} from '../../domain/recipient-directory.port';
import {
  DeliveryError,
  RecipientNotFoundError,
  describeError,
} from '../../../../shared/domain/errors';
import {
  MAIL_TRANSPORT,
  type MailMessage,
  type MailTransport,
} from '../../../../shared/infrastructure/email/mail-transport';

export const DEFAULT_SUBJECT = 'No Subject';
export const DEFAULT_BODY_TEXT = 'No text content.';

const nonEmptyString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

/**
 * Email payloads carry `subject`, `body_text` and an optional `body_html`.
 */
export function composeEmail(to: string, messageData: MessageData): MailMessage {
  return {
    to,
    subject: nonEmptyString(messageData.subject) ?? DEFAULT_SUBJECT,
    text: nonEmptyString(messageData.body_text) ?? DEFAULT_BODY_TEXT,
    html: nonEmptyString(messageData.body_html),
  };
}

@Injectable()
export class EmailDeliveryHandler implements DeliveryHandler {
  readonly channel = 'email';
  private readonly logger = new Logger(EmailDeliveryHandler.name);

  constructor(
    @Inject(RECIPIENT_DIRECTORY)
    private readonly directory: RecipientDirectory,
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
  ) {}

  async send(
    recipientId: number,
    messageData: MessageData,
    jobId: number,
  ): Promise<void> {
    if (!this.transport.isConfigured()) {
      throw new DeliveryError(this.channel, 'Email transport is not configured');
    }

    const recipient = await this.directory.findById(recipientId);
    if (!recipient || !recipient.email) {
      throw new RecipientNotFoundError(this.channel, recipientId);
    }

    const message = composeEmail(recipient.email, messageData);

    try {
      const { messageId } = await this.transport.send(message);
      this.logger.log(`Job #${jobId}: email sent to ${recipient.email} (${messageId})`);
    } catch (error) {
      throw new DeliveryError(
        this.channel,
        `SMTP delivery failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
