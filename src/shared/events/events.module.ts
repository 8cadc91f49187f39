import { Module, Global } from '@nestjs/common';
import { EVENT_BUS } from './event-bus.interface';
import { InMemoryEventBus } from './in-memory-event-bus';

/**
 * Global so producers and subscribers in any module share one EVENT_BUS.
 */
@Global()
@Module({
  providers: [
    {
      provide: EVENT_BUS,
      useClass: InMemoryEventBus,
    },
  ],
  exports: [EVENT_BUS],
})
export class EventsModule {}
