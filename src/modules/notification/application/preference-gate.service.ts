import { Injectable, Inject } from '@nestjs/common';
import {
  COMMUNICATION_PREFERENCE_REPOSITORY,
  type CommunicationPreference,
  type CommunicationPreferenceRepository,
} from '../domain/communication-preference.repository';

export type PreferenceDecision =
  | { allowed: true; reason: 'no-preference-record' | 'opted-in' | 'unmanaged-channel' }
  | { allowed: false; reason: 'opted-out' };

/**
 * Channels a preference record can veto. Any other channel is always allowed.
 */
const PREFERENCE_FLAGS: Record<
  string,
  keyof Pick<CommunicationPreference, 'prefersEmail' | 'prefersInApp'>
> = {
  email: 'prefersEmail',
  in_app: 'prefersInApp',
};

/**
 * Default-allow: recipients without a record receive every channel.
 */
@Injectable()
export class PreferenceGate {
  constructor(
    @Inject(COMMUNICATION_PREFERENCE_REPOSITORY)
    private readonly preferences: CommunicationPreferenceRepository,
  ) {}

  async check(recipientId: number, channel: string): Promise<PreferenceDecision> {
    const preference = await this.preferences.findByRecipientId(recipientId);
    if (!preference) {
      return { allowed: true, reason: 'no-preference-record' };
    }

    const flag = PREFERENCE_FLAGS[channel];
    if (!flag) {
      return { allowed: true, reason: 'unmanaged-channel' };
    }

    return preference[flag]
      ? { allowed: true, reason: 'opted-in' }
      : { allowed: false, reason: 'opted-out' };
  }
}
