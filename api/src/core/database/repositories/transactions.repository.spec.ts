import type { Queryable } from '../pg.service';
import { PgTransactionsRepository } from './transactions.repository';

type Row = Record<string, unknown>;

const saleRow = (overrides: Row = {}): Row => ({
  transaction_id: '1001',
  client_id: '7',
  spot_id: '1',
  date_close: '2025-09-02 10:00:00',
  sum: '100.00',
  payed_sum: '50.00',
  payed_bonus: null,
  bonus: null,
  discount: null,
  created_at: '2025-09-02 10:00:00',
  updated_at: '2025-09-02 10:00:00',
  ...overrides,
});

const repoWith = (rows: Row[], rowCount = rows.length) => {
  const query = jest.fn(async (_text: string, _values?: unknown[]) => ({
    rows,
    rowCount,
  }));
  const repo = new PgTransactionsRepository({
    query: query as unknown as Queryable['query'],
  });
  return { query, repo };
};

describe('PgTransactionsRepository', () => {
  it('reads missing percent and discount as zero', async () => {
    const { repo } = repoWith([saleRow()]);

    await expect(repo.findById('1001')).resolves.toMatchObject({
      transactionId: '1001',
      payedSum: '50.00',
      payedBonus: null,
      bonusPercent: '0',
      discount: '0',
    });
  });

  it('updates only the columns present in the patch', async () => {
    const { query, repo } = repoWith([saleRow({ payed_sum: '5.00' })]);

    const updated = await repo.update('1001', {
      payedSum: '5.00',
      dateClose: '2025-09-03 12:00:00',
    });

    const [text, values] = query.mock.calls[0];
    expect(text).toContain(
      'SET date_close = $2::timestamp, payed_sum = $3, updated_at = NOW()',
    );
    expect(values).toEqual(['1001', '2025-09-03 12:00:00', '5.00']);
    expect(updated?.payedSum).toBe('5.00');
  });

  it('falls back to a read for an empty patch', async () => {
    const { query, repo } = repoWith([saleRow()]);

    await repo.update('1001', {});

    expect(query.mock.calls[0][0]).toContain('SELECT');
    expect(query.mock.calls[0][1]).toEqual(['1001']);
  });

  it('pages eligible sales by closing time and id after a cursor', async () => {
    const { query, repo } = repoWith([]);

    await repo.listEligibleForBonus(
      '2025-09-01',
      { dateClose: '2025-09-02 10:00:00', transactionId: '10' },
      500,
    );

    const [text, values] = query.mock.calls[0];
    expect(text).toContain(
      '(date_close, transaction_id) > ($2::timestamp, $3::bigint)',
    );
    expect(values).toEqual(['2025-09-01', '2025-09-02 10:00:00', '10', 500]);
  });

  it('lists only sales without ledger entries when asked for unposted ones', async () => {
    const { query, repo } = repoWith([]);

    await repo.listUnpostedForBonus('2025-09-01', null, 100);

    const [text, values] = query.mock.calls[0];
    expect(text).toContain(
      'NOT EXISTS (SELECT 1 FROM transaction_bonus tb WHERE tb.transaction_id = transactions.transaction_id)',
    );
    expect(text).not.toContain('(date_close, transaction_id) >');
    expect(text).toContain('LIMIT $2');
    expect(values).toEqual(['2025-09-01', 100]);
  });

  it('writes discounts in a single statement', async () => {
    const { query, repo } = repoWith([], 2);

    const updated = await repo.setDiscounts([
      { transactionId: '1', discount: '50.00' },
      { transactionId: '2', discount: '0.00' },
    ]);

    expect(updated).toBe(2);
    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0][1]).toEqual([
      ['1', '2'],
      ['50.00', '0.00'],
    ]);
  });

  it('skips the round trip for an empty discount list', async () => {
    const { query, repo } = repoWith([]);
    await expect(repo.setDiscounts([])).resolves.toBe(0);
    expect(query).not.toHaveBeenCalled();
  });
});
