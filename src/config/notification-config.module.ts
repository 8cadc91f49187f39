import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  NOTIFICATION_CONFIG,
  loadNotificationConfig,
  type NotificationConfig,
} from './notification.config';

@Module({})
export class NotificationConfigModule {
  /**
   * @param overrides values that win over the environment, e.g. worker CLI flags
   */
  static forRoot(overrides: Partial<NotificationConfig> = {}): DynamicModule {
    return {
      module: NotificationConfigModule,
      global: true,
      providers: [
        {
          provide: NOTIFICATION_CONFIG,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): NotificationConfig => ({
            ...loadNotificationConfig(configService),
            ...overrides,
          }),
        },
      ],
      exports: [NOTIFICATION_CONFIG],
    };
  }
}
