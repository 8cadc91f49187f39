import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { NotificationWorkerModule } from './modules/notification/notification-worker.module';
import { DatabaseModule } from './shared/infrastructure/database/database.module';
import { EventsModule } from './shared/events';
import { NotificationConfigModule } from './config/notification-config.module';
import type { NotificationConfig } from './config/notification.config';
import { validateEnvironment } from './config/env.validation';

/**
 * Standalone worker process: no HTTP server, no gateway.
 */
@Module({})
export class WorkerModule {
  static forRoot(overrides: Partial<NotificationConfig> = {}): DynamicModule {
    return {
      module: WorkerModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: '.env',
          validate: validateEnvironment,
        }),
        NotificationConfigModule.forRoot(overrides),
        DatabaseModule,
        EventsModule,
        NotificationWorkerModule,
      ],
    };
  }
}
