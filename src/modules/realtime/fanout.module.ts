import { Module } from '@nestjs/common';
import { FANOUT_BUS } from './domain/fanout-bus';
import { InMemoryFanoutBus } from './infrastructure/in-memory-fanout-bus';
import { PostgresFanoutBus } from './infrastructure/postgres-fanout-bus';
import {
  NOTIFICATION_CONFIG,
  type NotificationConfig,
} from '../../config/notification.config';

/**
 * Shared by the in-app delivery handler (publisher) and the gateway
 * (subscriber). NOTIFICATION_FANOUT_BACKEND=memory only works when both run
 * in the same process.
 */
@Module({
  providers: [
    InMemoryFanoutBus,
    PostgresFanoutBus,
    {
      provide: FANOUT_BUS,
      inject: [NOTIFICATION_CONFIG, InMemoryFanoutBus, PostgresFanoutBus],
      useFactory: (
        config: NotificationConfig,
        memory: InMemoryFanoutBus,
        postgres: PostgresFanoutBus,
      ) => (config.fanoutBackend === 'memory' ? memory : postgres),
    },
  ],
  exports: [FANOUT_BUS],
})
export class FanoutModule {}
