import { Injectable, Inject } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import type {
  CommunicationPreference,
  CommunicationPreferenceRepository,
} from '../domain/communication-preference.repository';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import { userCommunicationPreferences } from '../../../shared/infrastructure/database/schema';

@Injectable()
export class DrizzleCommunicationPreferenceRepository
  implements CommunicationPreferenceRepository
{
  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async findByRecipientId(
    recipientId: number,
  ): Promise<CommunicationPreference | null> {
    const [row] = await this.db
      .select({
        recipientId: userCommunicationPreferences.recipientId,
        prefersEmail: userCommunicationPreferences.prefersEmail,
        prefersInApp: userCommunicationPreferences.prefersInApp,
        defaultChannel: userCommunicationPreferences.defaultChannel,
      })
      .from(userCommunicationPreferences)
      .where(eq(userCommunicationPreferences.recipientId, recipientId))
      .limit(1);

    return row ?? null;
  }
}
