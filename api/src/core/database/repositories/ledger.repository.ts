import type { Queryable } from '../pg.service';
import type { LedgerRepository } from '../database.types';
import {
  BONUS_OPERATION_TYPES,
  type BonusOperationType,
  type LedgerEntryRecord,
  type NewLedgerEntry,
} from '../entities';
import { parseMinorUnits } from '../../../shared/money.util';

type LedgerRow = {
  id: string;
  client_id: string;
  transaction_id: string | null;
  operation_type: string;
  amount: string;
  balance_before: string;
  balance_after: string;
  description: string | null;
  bonus_percent: string | null;
  transaction_sum: string | null;
  processed_at: string;
  created_at: string;
  updated_at: string;
};

const LEDGER_COLUMNS = `id, client_id, transaction_id, operation_type, amount,
  balance_before, balance_after, description, bonus_percent, transaction_sum,
  processed_at, created_at, updated_at`;

const toOperationType = (value: string): BonusOperationType => {
  const found = BONUS_OPERATION_TYPES.find((type) => type === value);
  if (!found) throw new Error(`Unknown bonus operation type: ${value}`);
  return found;
};

const toLedgerEntry = (row: LedgerRow): LedgerEntryRecord => ({
  id: row.id,
  clientId: row.client_id,
  transactionId: row.transaction_id,
  operationType: toOperationType(row.operation_type),
  amount: parseMinorUnits(row.amount),
  balanceBefore: parseMinorUnits(row.balance_before),
  balanceAfter: parseMinorUnits(row.balance_after),
  description: row.description,
  bonusPercent: row.bonus_percent,
  transactionSum: row.transaction_sum,
  processedAt: row.processed_at,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgLedgerRepository implements LedgerRepository {
  constructor(private readonly db: Queryable) {}

  async existsForTransaction(transactionId: string): Promise<boolean> {
    const res = await this.db.query<{ found: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM transaction_bonus WHERE transaction_id = $1
       ) AS found`,
      [transactionId],
    );
    return res.rows[0]?.found === true;
  }

  async insert(entry: NewLedgerEntry): Promise<LedgerEntryRecord> {
    const res = await this.db.query<LedgerRow>(
      `INSERT INTO transaction_bonus
         (client_id, transaction_id, operation_type, amount, balance_before,
          balance_after, description, bonus_percent, transaction_sum, processed_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, COALESCE($10::timestamp, NOW()))
       RETURNING ${LEDGER_COLUMNS}`,
      [
        entry.clientId,
        entry.transactionId,
        entry.operationType,
        entry.amount,
        entry.balanceBefore,
        entry.balanceAfter,
        entry.description,
        entry.bonusPercent,
        entry.transactionSum,
        entry.processedAt,
      ],
    );
    return toLedgerEntry(res.rows[0]);
  }

  async listByClient(
    clientId: string,
    options: { limit?: number; newestFirst?: boolean } = {},
  ): Promise<LedgerEntryRecord[]> {
    const direction = options.newestFirst ? 'DESC' : 'ASC';
    const values: unknown[] = [clientId];
    let limitClause = '';
    if (options.limit !== undefined) {
      values.push(options.limit);
      limitClause = 'LIMIT $2';
    }
    const res = await this.db.query<LedgerRow>(
      `SELECT ${LEDGER_COLUMNS}
         FROM transaction_bonus
        WHERE client_id = $1
        ORDER BY id ${direction}
        ${limitClause}`,
      values,
    );
    return res.rows.map(toLedgerEntry);
  }

  async sumByClient(): Promise<Map<string, number>> {
    const res = await this.db.query<{ client_id: string; total: string }>(
      `SELECT client_id, SUM(amount)::text AS total
         FROM transaction_bonus
        GROUP BY client_id`,
    );
    return new Map(
      res.rows.map((row) => [row.client_id, parseMinorUnits(row.total)]),
    );
  }

  async totals(): Promise<{ earned: number; spent: number }> {
    const res = await this.db.query<{ earned: string; spent: string }>(
      `SELECT
         COALESCE(SUM(amount) FILTER (WHERE amount > 0), 0)::text AS earned,
         COALESCE(SUM(ABS(amount)) FILTER (WHERE amount < 0), 0)::text AS spent
       FROM transaction_bonus`,
    );
    const row = res.rows[0];
    return {
      earned: parseMinorUnits(row?.earned),
      spent: parseMinorUnits(row?.spent),
    };
  }

  async deleteAll(): Promise<number> {
    const res = await this.db.query('DELETE FROM transaction_bonus');
    return res.rowCount ?? 0;
  }
}
