import type { Queryable } from '../pg.service';
import { PgLedgerRepository } from './ledger.repository';

type Row = Record<string, unknown>;

const fakeDb = (rows: Row[], rowCount = rows.length) => {
  const query = jest.fn(async (_text: string, _values?: unknown[]) => ({
    rows,
    rowCount,
  }));
  return { query, db: query as unknown as Queryable['query'] };
};

const ledgerRow = (overrides: Row = {}): Row => ({
  id: '41',
  client_id: '7',
  transaction_id: '1001',
  operation_type: 'EARN',
  amount: '500',
  balance_before: '1000',
  balance_after: '1500',
  description: 'Нарахування 5.00% бонусів за транзакцію #1001',
  bonus_percent: '5.00',
  transaction_sum: '100.00',
  processed_at: '2025-09-02 10:00:00',
  created_at: '2025-09-02 10:00:01',
  updated_at: '2025-09-02 10:00:01',
  ...overrides,
});

describe('PgLedgerRepository', () => {
  it('maps an inserted row to minor-unit numbers', async () => {
    const { query, db } = fakeDb([ledgerRow()]);
    const repo = new PgLedgerRepository({ query: db });

    const entry = await repo.insert({
      clientId: '7',
      transactionId: '1001',
      operationType: 'EARN',
      amount: 500,
      balanceBefore: 1000,
      balanceAfter: 1500,
      description: 'Нарахування 5.00% бонусів за транзакцію #1001',
      bonusPercent: '5.00',
      transactionSum: '100.00',
      processedAt: null,
    });

    expect(entry).toMatchObject({
      id: '41',
      operationType: 'EARN',
      amount: 500,
      balanceBefore: 1000,
      balanceAfter: 1500,
    });
    expect(query.mock.calls[0][1]).toEqual([
      '7',
      '1001',
      'EARN',
      500,
      1000,
      1500,
      'Нарахування 5.00% бонусів за транзакцію #1001',
      '5.00',
      '100.00',
      null,
    ]);
  });

  it('rejects an operation type the engine does not know', async () => {
    const { db } = fakeDb([ledgerRow({ operation_type: 'BONUS' })]);
    const repo = new PgLedgerRepository({ query: db });

    await expect(repo.listByClient('7')).rejects.toThrow(
      'Unknown bonus operation type: BONUS',
    );
  });

  it('pages newest first', async () => {
    const { query, db } = fakeDb([]);
    const repo = new PgLedgerRepository({ query: db });

    await repo.listByClient('7', { limit: 5, newestFirst: true });

    const [text, values] = query.mock.calls[0];
    expect(text).toContain('ORDER BY id DESC');
    expect(text).toContain('LIMIT $2');
    expect(values).toEqual(['7', 5]);
  });

  it('reads totals as numbers', async () => {
    const { db } = fakeDb([{ earned: '800', spent: '1000' }]);
    const repo = new PgLedgerRepository({ query: db });

    await expect(repo.totals()).resolves.toEqual({ earned: 800, spent: 1000 });
  });

  it('sums per client', async () => {
    const { db } = fakeDb([
      { client_id: '7', total: '-400' },
      { client_id: '8', total: '200' },
    ]);
    const repo = new PgLedgerRepository({ query: db });

    const sums = await repo.sumByClient();

    expect([...sums]).toEqual([
      ['7', -400],
      ['8', 200],
    ]);
  });

  it('reports how many entries were wiped', async () => {
    const { db } = fakeDb([], 4);
    const repo = new PgLedgerRepository({ query: db });

    await expect(repo.deleteAll()).resolves.toBe(4);
  });
});
