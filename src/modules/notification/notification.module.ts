import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { FanoutModule } from '../realtime/fanout.module';
import { NOTIFICATION_JOB_REPOSITORY } from './domain/notification-job.repository';
import { COMMUNICATION_PREFERENCE_REPOSITORY } from './domain/communication-preference.repository';
import { RECIPIENT_DIRECTORY } from './domain/recipient-directory.port';
import { DELIVERY_HANDLERS, type DeliveryHandler } from './domain/delivery-handler';
import { DrizzleNotificationJobRepository } from './infrastructure/drizzle-notification-job.repository';
import { DrizzleCommunicationPreferenceRepository } from './infrastructure/drizzle-communication-preference.repository';
import { DrizzleRecipientDirectory } from './infrastructure/drizzle-recipient-directory';
import { EmailDeliveryHandler } from './infrastructure/delivery/email-delivery.handler';
import { InAppDeliveryHandler } from './infrastructure/delivery/in-app-delivery.handler';
import { PreferenceGate } from './application/preference-gate.service';
import { NotificationEnqueueService } from './application/notification-enqueue.service';
import { DeliveryHandlerRegistry } from './application/delivery-handler.registry';
import { EmailVerificationTokenService } from './application/email-verification-token.service';
import { UserRegisteredNotifier } from './application/event-handlers/user-registered.notifier';
import { MAIL_TRANSPORT } from '../../shared/infrastructure/email/mail-transport';
import { SmtpMailTransport } from '../../shared/infrastructure/email/smtp-mail-transport.service';
import { jwtModuleOptions } from '../../shared/infrastructure/auth/jwt-module.options';
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';

@Module({
  imports: [JwtModule.registerAsync(jwtModuleOptions), FanoutModule],
  providers: [
    {
      provide: NOTIFICATION_JOB_REPOSITORY,
      useClass: DrizzleNotificationJobRepository,
    },
    {
      provide: COMMUNICATION_PREFERENCE_REPOSITORY,
      useClass: DrizzleCommunicationPreferenceRepository,
    },
    {
      provide: RECIPIENT_DIRECTORY,
      useClass: DrizzleRecipientDirectory,
    },
    { provide: CLOCK, useClass: SystemClock },
    { provide: MAIL_TRANSPORT, useClass: SmtpMailTransport },
    EmailDeliveryHandler,
    InAppDeliveryHandler,
    {
      provide: DELIVERY_HANDLERS,
      inject: [EmailDeliveryHandler, InAppDeliveryHandler],
      useFactory: (...handlers: DeliveryHandler[]) => handlers,
    },
    DeliveryHandlerRegistry,
    PreferenceGate,
    NotificationEnqueueService,
    EmailVerificationTokenService,
    UserRegisteredNotifier,
  ],
  exports: [
    NOTIFICATION_JOB_REPOSITORY,
    RECIPIENT_DIRECTORY,
    CLOCK,
    DeliveryHandlerRegistry,
    NotificationEnqueueService,
  ],
})
export class NotificationModule {}
