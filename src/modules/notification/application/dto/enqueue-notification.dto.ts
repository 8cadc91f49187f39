import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { NOTIFICATION_CHANNELS } from '../../domain/notification-channel';
import type { NotificationChannel } from '../../domain/notification-channel';
import type { MessageData } from '../../domain/notification-job.entity';

export class EnqueueNotificationDto {
  @IsInt()
  @Min(1)
  recipientId!: number;

  @IsIn(NOTIFICATION_CHANNELS)
  channel!: NotificationChannel;

  @IsObject()
  messageData!: MessageData;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  notificationType!: string;
}
