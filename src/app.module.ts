import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { HealthModule } from './modules/health/health.module';
import { NotificationModule } from './modules/notification/notification.module';
import { NotificationWorkerModule } from './modules/notification/notification-worker.module';
import { RealtimeModule } from './modules/realtime/realtime.module';
import { DatabaseModule } from './shared/infrastructure/database/database.module';
import { EventsModule } from './shared/events';
import { NotificationConfigModule } from './config/notification-config.module';
import { validateEnvironment } from './config/env.validation';

/**
 * API process: health endpoint, live notification gateway and the enqueue
 * service. The worker loop is only started here when
 * NOTIFICATION_WORKER_EMBEDDED is set; see main.ts.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    NotificationConfigModule.forRoot(),
    DatabaseModule,
    EventsModule,
    NotificationModule,
    NotificationWorkerModule,
    RealtimeModule,
    HealthModule,
  ],
})
export class AppModule {}
