import { BaseDomainEvent } from './domain-event';

export const USER_REGISTERED = 'user.registered';

export interface UserRegisteredPayload {
  userId: number;
  email: string;
}

/**
 * Published by account registration once the user row is committed.
 */
export class UserRegisteredEvent extends BaseDomainEvent<UserRegisteredPayload> {
  readonly eventType = USER_REGISTERED;
  readonly aggregateType = 'user';

  constructor(payload: UserRegisteredPayload, correlationId?: string) {
    super(String(payload.userId), payload, correlationId);
  }
}
