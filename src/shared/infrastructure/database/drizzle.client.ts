import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export const createPostgresClient = (connectionString: string) =>
  postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

export const createDrizzleClient = (client: postgres.Sql) =>
  drizzle(client, { schema });

export type PostgresClient = postgres.Sql;
export type DrizzleClient = ReturnType<typeof createDrizzleClient>;
export type DrizzleTransaction = Parameters<
  Parameters<DrizzleClient['transaction']>[0]
>[0];
