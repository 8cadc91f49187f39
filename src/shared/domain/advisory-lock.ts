import { sql } from 'drizzle-orm';
import type { DrizzleTransaction } from '../infrastructure/database/drizzle.client';

/**
 * PostgreSQL transaction-scoped advisory locks.
 *
 * `pg_try_advisory_xact_lock` returns immediately and the lock is released
 * when the surrounding transaction commits or rolls back, so callers never
 * unlock explicitly. This matters with a pooled driver: a session lock taken
 * on one pooled connection cannot be released from another.
 *
 * Range: 200000+ reserved for notification maintenance jobs.
 */
export const LOCK_IDS = {
  RELEASE_STALE_NOTIFICATIONS: 200001,
} as const;

export type LockId = (typeof LOCK_IDS)[keyof typeof LOCK_IDS];

/**
 * Try to take an advisory lock for the lifetime of `tx`.
 *
 * @returns true if acquired, false if another transaction holds it
 */
export async function tryAcquireXactLock(
  tx: DrizzleTransaction,
  lockId: LockId,
): Promise<boolean> {
  const rows = await tx.execute<{ acquired: boolean }>(
    sql`SELECT pg_try_advisory_xact_lock(${lockId}) as acquired`,
  );

  return rows[0]?.acquired === true;
}
