import { Injectable, Inject } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import type {
  Recipient,
  RecipientDirectory,
} from '../domain/recipient-directory.port';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import { users } from '../../../shared/infrastructure/database/schema';

@Injectable()
export class DrizzleRecipientDirectory implements RecipientDirectory {
  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async findById(id: number): Promise<Recipient | null> {
    const [row] = await this.db
      .select({ id: users.id, email: users.email, isActive: users.isActive })
      .from(users)
      .where(eq(users.id, id))
      .limit(1);

    return row ?? null;
  }
}
