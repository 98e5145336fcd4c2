import { Logger } from '@nestjs/common';
import type { Queryable } from '../core/database/pg.service';
import { safeExecAsync } from './safe-exec';

const logger = new Logger('pg-lock');

export type AdvisoryLockKey = [number, number];

export function advisoryLockKey(name: string): AdvisoryLockKey {
  // two djb2-style 32-bit hashes make the (int, int) key pair
  let a = 5381;
  let b = 52711;
  for (let i = 0; i < name.length; i++) {
    const c = name.charCodeAt(i);
    a = ((a << 5) + a + c) | 0;
    b = ((b << 5) + b + c) | 0;
  }
  return [a, b];
}

/** Session-level lock: the same connection must release it. */
export async function pgTryAdvisoryLock(
  db: Queryable,
  name: string,
): Promise<{ ok: boolean; key: AdvisoryLockKey }> {
  const key = advisoryLockKey(name);
  return safeExecAsync(
    async () => {
      const res = await db.query<{ ok: boolean }>(
        'SELECT pg_try_advisory_lock($1::int, $2::int) AS ok',
        key,
      );
      return { ok: res.rows[0]?.ok === true, key };
    },
    () => ({ ok: false, key }),
    logger,
    `pg_try_advisory_lock(${name}) failed`,
  );
}

export async function pgAdvisoryUnlock(
  db: Queryable,
  key: AdvisoryLockKey,
): Promise<void> {
  await safeExecAsync(
    async () => {
      await db.query('SELECT pg_advisory_unlock($1::int, $2::int)', key);
    },
    () => undefined,
    logger,
    'pg_advisory_unlock failed',
  );
}

/** Transaction-level lock: released by COMMIT or ROLLBACK, waits when busy. */
export async function pgAdvisoryXactLock(
  db: Queryable,
  name: string,
  shared: boolean,
): Promise<void> {
  const fn = shared ? 'pg_advisory_xact_lock_shared' : 'pg_advisory_xact_lock';
  await db.query(`SELECT ${fn}($1::int, $2::int)`, advisoryLockKey(name));
}
