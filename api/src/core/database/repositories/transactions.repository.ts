import type { Queryable } from '../pg.service';
import type { TransactionsRepository } from '../database.types';
import type {
  BonusCursor,
  LineItemTotals,
  NewTransaction,
  TransactionPatch,
  TransactionRecord,
} from '../entities';

type TransactionRow = {
  transaction_id: string;
  client_id: string | null;
  spot_id: string | null;
  date_close: string | null;
  sum: string;
  payed_sum: string | null;
  payed_bonus: string | null;
  bonus: string | null;
  discount: string | null;
  created_at: string;
  updated_at: string;
};

const TRANSACTION_COLUMNS = `transaction_id, client_id, spot_id, date_close, sum,
  payed_sum, payed_bonus, bonus, discount, created_at, updated_at`;

const PATCH_COLUMNS: Record<keyof TransactionPatch, string> = {
  clientId: 'client_id',
  spotId: 'spot_id',
  dateClose: 'date_close',
  sum: 'sum',
  payedSum: 'payed_sum',
  payedBonus: 'payed_bonus',
  bonusPercent: 'bonus',
};

const PATCH_KEYS: ReadonlyArray<keyof TransactionPatch> = [
  'clientId',
  'spotId',
  'dateClose',
  'sum',
  'payedSum',
  'payedBonus',
  'bonusPercent',
];

const toTransaction = (row: TransactionRow): TransactionRecord => ({
  transactionId: row.transaction_id,
  clientId: row.client_id,
  spotId: row.spot_id,
  dateClose: row.date_close,
  sum: row.sum,
  payedSum: row.payed_sum,
  payedBonus: row.payed_bonus,
  bonusPercent: row.bonus ?? '0',
  discount: row.discount ?? '0',
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgTransactionsRepository implements TransactionsRepository {
  constructor(private readonly db: Queryable) {}

  async findById(transactionId: string): Promise<TransactionRecord | null> {
    const res = await this.db.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE transaction_id = $1`,
      [transactionId],
    );
    return res.rows[0] ? toTransaction(res.rows[0]) : null;
  }

  async insert(input: NewTransaction): Promise<TransactionRecord> {
    const res = await this.db.query<TransactionRow>(
      `INSERT INTO transactions
         (transaction_id, client_id, spot_id, date_close, sum, payed_sum, payed_bonus, bonus)
       VALUES ($1, $2, $3, $4::timestamp, $5, $6, $7, COALESCE($8::numeric, 0))
       RETURNING ${TRANSACTION_COLUMNS}`,
      [
        input.transactionId,
        input.clientId ?? null,
        input.spotId ?? null,
        input.dateClose ?? null,
        input.sum,
        input.payedSum ?? null,
        input.payedBonus ?? null,
        input.bonusPercent ?? null,
      ],
    );
    return toTransaction(res.rows[0]);
  }

  async update(
    transactionId: string,
    patch: TransactionPatch,
  ): Promise<TransactionRecord | null> {
    const assignments: string[] = [];
    const values: unknown[] = [transactionId];
    for (const key of PATCH_KEYS) {
      const value = patch[key];
      if (value === undefined) continue;
      values.push(value);
      const column = PATCH_COLUMNS[key];
      const cast = column === 'date_close' ? '::timestamp' : '';
      assignments.push(`${column} = $${values.length}${cast}`);
    }
    if (!assignments.length) return this.findById(transactionId);
    const res = await this.db.query<TransactionRow>(
      `UPDATE transactions
          SET ${assignments.join(', ')}, updated_at = NOW()
        WHERE transaction_id = $1
        RETURNING ${TRANSACTION_COLUMNS}`,
      values,
    );
    return res.rows[0] ? toTransaction(res.rows[0]) : null;
  }

  async setDiscount(transactionId: string, discount: string): Promise<boolean> {
    const res = await this.db.query(
      `UPDATE transactions
          SET discount = $2::numeric, updated_at = NOW()
        WHERE transaction_id = $1`,
      [transactionId, discount],
    );
    return (res.rowCount ?? 0) > 0;
  }

  async setDiscounts(
    rows: ReadonlyArray<{ transactionId: string; discount: string }>,
  ): Promise<number> {
    if (!rows.length) return 0;
    const res = await this.db.query(
      `UPDATE transactions AS t
          SET discount = d.discount, updated_at = NOW()
         FROM unnest($1::bigint[], $2::numeric[]) AS d(transaction_id, discount)
        WHERE t.transaction_id = d.transaction_id`,
      [rows.map((row) => row.transactionId), rows.map((row) => row.discount)],
    );
    return res.rowCount ?? 0;
  }

  async countAll(): Promise<number> {
    const res = await this.db.query<{ total: number }>(
      'SELECT COUNT(*)::int AS total FROM transactions',
    );
    return res.rows[0]?.total ?? 0;
  }

  async countEligibleForBonus(startDate: string): Promise<number> {
    const res = await this.db.query<{ total: number }>(
      `SELECT COUNT(*)::int AS total
         FROM transactions
        WHERE client_id IS NOT NULL
          AND date_close IS NOT NULL
          AND date_close::date >= $1::date`,
      [startDate],
    );
    return res.rows[0]?.total ?? 0;
  }

  listEligibleForBonus(
    startDate: string,
    after: BonusCursor | null,
    limit: number,
  ): Promise<TransactionRecord[]> {
    return this.listBonusCandidates(startDate, after, limit, false);
  }

  listUnpostedForBonus(
    startDate: string,
    after: BonusCursor | null,
    limit: number,
  ): Promise<TransactionRecord[]> {
    return this.listBonusCandidates(startDate, after, limit, true);
  }

  private async listBonusCandidates(
    startDate: string,
    after: BonusCursor | null,
    limit: number,
    unpostedOnly: boolean,
  ): Promise<TransactionRecord[]> {
    const values: unknown[] = [startDate];
    const where = [
      'client_id IS NOT NULL',
      'date_close IS NOT NULL',
      'date_close::date >= $1::date',
    ];
    if (after) {
      values.push(after.dateClose, after.transactionId);
      where.push('(date_close, transaction_id) > ($2::timestamp, $3::bigint)');
    }
    if (unpostedOnly) {
      where.push(
        'NOT EXISTS (SELECT 1 FROM transaction_bonus tb WHERE tb.transaction_id = transactions.transaction_id)',
      );
    }
    values.push(limit);
    const res = await this.db.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS}
         FROM transactions
        WHERE ${where.join('\n          AND ')}
        ORDER BY date_close, transaction_id
        LIMIT $${values.length}`,
      values,
    );
    return res.rows.map(toTransaction);
  }

  async lineItemTotals(
    transactionIds?: readonly string[],
  ): Promise<LineItemTotals[]> {
    const filter = transactionIds
      ? 'WHERE t.transaction_id = ANY($1::bigint[])'
      : '';
    const res = await this.db.query<{
      transaction_id: string;
      line_total: string;
      payed_sum: string | null;
      payed_bonus: string | null;
      discount: string | null;
    }>(
      `SELECT t.transaction_id,
              SUM(tp.sum)::text AS line_total,
              t.payed_sum, t.payed_bonus, t.discount
         FROM transactions t
         JOIN transaction_products tp ON tp.transaction_id = t.transaction_id
         ${filter}
        GROUP BY t.transaction_id, t.payed_sum, t.payed_bonus, t.discount
        ORDER BY t.transaction_id`,
      transactionIds ? [[...transactionIds]] : [],
    );
    return res.rows.map((row) => ({
      transactionId: row.transaction_id,
      lineTotal: row.line_total,
      payedSum: row.payed_sum,
      payedBonus: row.payed_bonus,
      discount: row.discount ?? '0',
    }));
  }

  async sumPositiveDiscounts(): Promise<string> {
    const res = await this.db.query<{ total: string }>(
      `SELECT COALESCE(SUM(discount), 0)::numeric(14,2)::text AS total
         FROM transactions
        WHERE discount > 0`,
    );
    return res.rows[0]?.total ?? '0.00';
  }
}
