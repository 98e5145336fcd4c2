import { Injectable, Logger } from '@nestjs/common';
import type { PoolClient } from 'pg';
import { PgService, type Queryable } from './pg.service';
import type { DataStore, LockOutcome, StoreSession } from './database.types';
import { PgSettingsRepository } from './repositories/settings.repository';
import { PgClientsRepository } from './repositories/clients.repository';
import { PgTransactionsRepository } from './repositories/transactions.repository';
import { PgLineItemsRepository } from './repositories/line-items.repository';
import { PgLedgerRepository } from './repositories/ledger.repository';
import { PgEngineFailuresRepository } from './repositories/engine-failures.repository';
import {
  pgAdvisoryUnlock,
  pgAdvisoryXactLock,
  pgTryAdvisoryLock,
} from '../../shared/pg-lock.util';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

const SAVEPOINT_NAME = /^[a-z_][a-z0-9_]{0,62}$/;
export const HOOK_SWITCH_LOCK = 'hooks:switches';

export const createPgSession = (db: Queryable): StoreSession => ({
  settings: new PgSettingsRepository(db),
  clients: new PgClientsRepository(db),
  transactions: new PgTransactionsRepository(db),
  lineItems: new PgLineItemsRepository(db),
  ledger: new PgLedgerRepository(db),
  failures: new PgEngineFailuresRepository(db),
  async savepoint<T>(name: string, action: () => Promise<T>): Promise<T> {
    if (!SAVEPOINT_NAME.test(name)) {
      throw new Error(`Invalid savepoint name: ${name}`);
    }
    await db.query(`SAVEPOINT ${name}`);
    try {
      const result = await action();
      await db.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (err) {
      await db.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw err;
    }
  },
  lockHookSwitches: (mode) =>
    pgAdvisoryXactLock(db, HOOK_SWITCH_LOCK, mode === 'shared'),
});

@Injectable()
export class PgDataStore implements DataStore {
  private readonly logger = new Logger(PgDataStore.name);

  constructor(private readonly pg: PgService) {}

  async transaction<T>(
    action: (session: StoreSession) => Promise<T>,
  ): Promise<T> {
    const client = await this.pg.connect();
    const db = this.pg.bind(client);
    try {
      await db.query('BEGIN');
      const result = await action(createPgSession(db));
      await db.query('COMMIT');
      return result;
    } catch (err) {
      await this.rollback(db);
      throw err;
    } finally {
      client.release();
    }
  }

  async withExclusiveLock<T>(
    name: string,
    action: () => Promise<T>,
  ): Promise<LockOutcome<T>> {
    const client: PoolClient = await this.pg.connect();
    const db = this.pg.bind(client);
    try {
      const lock = await pgTryAdvisoryLock(db, name);
      if (!lock.ok) return { acquired: false };
      try {
        return { acquired: true, result: await action() };
      } finally {
        await pgAdvisoryUnlock(db, lock.key);
      }
    } finally {
      client.release();
    }
  }

  private async rollback(db: Queryable) {
    try {
      await db.query('ROLLBACK');
    } catch (err) {
      logIgnoredError(err, 'ROLLBACK failed', this.logger);
    }
  }
}
