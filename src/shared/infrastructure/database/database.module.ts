import { Module, Global, Inject, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  createDrizzleClient,
  createPostgresClient,
  type PostgresClient,
} from './drizzle.client';

export const DRIZZLE = Symbol('DRIZZLE');
export const POSTGRES = Symbol('POSTGRES');

export type {
  DrizzleClient,
  DrizzleTransaction,
  PostgresClient,
} from './drizzle.client';

@Global()
@Module({
  providers: [
    {
      provide: POSTGRES,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createPostgresClient(configService.getOrThrow<string>('DATABASE_URL')),
    },
    {
      provide: DRIZZLE,
      inject: [POSTGRES],
      useFactory: (client: PostgresClient) => createDrizzleClient(client),
    },
  ],
  exports: [DRIZZLE, POSTGRES],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(POSTGRES) private readonly client: PostgresClient) {}

  async onApplicationShutdown(): Promise<void> {
    await this.client.end({ timeout: 5 });
  }
}
