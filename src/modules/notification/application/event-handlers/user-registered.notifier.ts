import { Injectable, Inject, Logger, OnModuleInit } from '@nestjs/common';
import {
  EVENT_BUS,
  USER_REGISTERED,
  type DomainEvent,
  type IEventBus,
  type UserRegisteredPayload,
} from '../../../../shared/events';
import { NotificationEnqueueService } from '../notification-enqueue.service';
import { EmailVerificationTokenService } from '../email-verification-token.service';
import type { MessageData } from '../../domain/notification-job.entity';

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

export function welcomeEmail(email: string, verificationUrl: string): MessageData {
  return {
    subject: 'Welcome! Please verify your email',
    body_text:
      `Hi ${email},\n\nThanks for signing up. Please verify your email address by opening the link below:\n\n` +
      `${verificationUrl}\n\nThe link expires in 24 hours.`,
    body_html:
      `<p>Hi <b>${escapeHtml(email)}</b>,</p><p>Thanks for signing up. Please verify your email address:</p>` +
      `<p><a href="${escapeHtml(verificationUrl)}">Verify your email</a></p><p>The link expires in 24 hours.</p>`,
  };
}

export function welcomeInApp(email: string): MessageData {
  return {
    title: 'Welcome aboard!',
    body: `Hi ${email}, have a look around.`,
  };
}

/**
 * Turns account registration into a welcome email and a welcome in-app
 * notification. Opted-out channels are skipped by the enqueue service.
 */
@Injectable()
export class UserRegisteredNotifier implements OnModuleInit {
  private readonly logger = new Logger(UserRegisteredNotifier.name);

  constructor(
    @Inject(EVENT_BUS) private readonly eventBus: IEventBus,
    private readonly notifications: NotificationEnqueueService,
    private readonly verificationTokens: EmailVerificationTokenService,
  ) {}

  onModuleInit() {
    this.eventBus.subscribe<UserRegisteredPayload>(
      USER_REGISTERED,
      this.onUserRegistered.bind(this),
    );
    this.logger.log('User registration notifier registered');
  }

  private async onUserRegistered(
    event: DomainEvent<UserRegisteredPayload>,
  ): Promise<void> {
    const { userId, email } = event.payload;

    const emailJobId = await this.notifications.enqueue(
      userId,
      'email',
      welcomeEmail(email, this.verificationTokens.verificationUrl(userId)),
      'welcome_email',
    );
    if (emailJobId !== null) {
      this.logger.log(`Welcome email enqueued for user ${userId} (job ${emailJobId})`);
    }

    const inAppJobId = await this.notifications.enqueue(
      userId,
      'in_app',
      welcomeInApp(email),
      'welcome_in_app',
    );
    if (inAppJobId !== null) {
      this.logger.log(
        `Welcome in-app notification enqueued for user ${userId} (job ${inAppJobId})`,
      );
    }
  }
}
