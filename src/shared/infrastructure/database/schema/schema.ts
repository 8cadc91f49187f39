import {
  pgTable,
  serial,
  integer,
  text,
  varchar,
  timestamp,
  boolean,
  jsonb,
  uniqueIndex,
  index,
  pgEnum,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// ============ ENUMS ============

export const notificationJobStatusEnum = pgEnum('notification_job_status', [
  'PENDING', // Waiting for a worker
  'SENDING', // Claimed by a worker, delivery in flight
  'SENT',
  'FAILED', // Terminal: retries exhausted or no handler
]);

export const preferredChannelEnum = pgEnum('preferred_channel', [
  'email',
  'in_app',
]);

// ============ USERS (recipient directory, owned by the accounts service) ============

export const users = pgTable(
  'users',
  {
    id: serial('id').primaryKey(),
    email: text('email').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    isVerified: boolean('is_verified').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [uniqueIndex('ux_users_email').on(table.email)],
);

// ============ NOTIFICATION JOBS ============

export const notificationJobs = pgTable(
  'notification_jobs',
  {
    id: serial('id').primaryKey(),
    // Deliberately not a foreign key: producers may enqueue for users this
    // database does not know about yet.
    recipientId: integer('recipient_id').notNull(),
    // Plain text so a channel can be persisted before its handler ships.
    channel: varchar('channel', { length: 20 }).notNull(),
    notificationType: varchar('notification_type', { length: 50 })
      .notNull()
      .default('general'),
    messageData: jsonb('message_data')
      .$type<Record<string, unknown>>()
      .notNull(),
    status: notificationJobStatusEnum('status').notNull().default('PENDING'),
    retriesCount: integer('retries_count').notNull().default(0),
    maxRetries: integer('max_retries').notNull().default(3),
    failedReason: varchar('failed_reason', { length: 255 }),
    scheduledAt: timestamp('scheduled_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    isRead: boolean('is_read').notNull().default(false),
    lockedAt: timestamp('locked_at', { withTimezone: true }),
    lockedBy: text('locked_by'), // Worker instance ID
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Poll query: status = PENDING AND scheduled_at <= now
    index('ix_notification_jobs_status_scheduled').on(
      table.status,
      table.scheduledAt,
    ),
    index('ix_notification_jobs_recipient').on(table.recipientId),
    // Missed-notification replay on reconnect
    index('ix_notification_jobs_unread_in_app')
      .on(table.recipientId, table.createdAt)
      .where(
        sql`${table.channel} = 'in_app' AND ${table.status} = 'SENT' AND ${table.isRead} = false`,
      ),
  ],
);

// ============ COMMUNICATION PREFERENCES ============

export const userCommunicationPreferences = pgTable(
  'user_communication_preferences',
  {
    id: serial('id').primaryKey(),
    recipientId: integer('recipient_id').notNull(),
    prefersEmail: boolean('prefers_email').notNull().default(true),
    prefersInApp: boolean('prefers_in_app').notNull().default(true),
    defaultChannel: preferredChannelEnum('default_channel')
      .notNull()
      .default('in_app'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('ux_preferences_recipient').on(table.recipientId),
  ],
);

// ============ TYPE EXPORTS ============

export type UserRow = typeof users.$inferSelect;

export type NotificationJobRow = typeof notificationJobs.$inferSelect;
export type NewNotificationJobRow = typeof notificationJobs.$inferInsert;

export type UserCommunicationPreferenceRow =
  typeof userCommunicationPreferences.$inferSelect;
