import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { NotificationModule } from './notification.module';
import { NotificationWorker } from './application/worker/notification.worker';
import { NotificationWorkerLoop } from './application/worker/notification-worker.loop';

@Module({
  imports: [ScheduleModule.forRoot(), NotificationModule],
  providers: [NotificationWorker, NotificationWorkerLoop],
  exports: [NotificationWorker, NotificationWorkerLoop],
})
export class NotificationWorkerModule {}
