import type { NotificationChannel } from './notification-channel';

export interface CommunicationPreference {
  recipientId: number;
  prefersEmail: boolean;
  prefersInApp: boolean;
  defaultChannel: NotificationChannel;
}

export interface CommunicationPreferenceRepository {
  /**
   * @returns null when the recipient never stored preferences
   */
  findByRecipientId(recipientId: number): Promise<CommunicationPreference | null>;
}

export const COMMUNICATION_PREFERENCE_REPOSITORY = Symbol(
  'COMMUNICATION_PREFERENCE_REPOSITORY',
);
