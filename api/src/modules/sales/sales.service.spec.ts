import {
  ClientNotFoundError,
  DuplicateTransactionError,
} from '../../core/errors/domain.errors';
import { MetricsService } from '../../core/metrics/metrics.service';
import {
  createEngineHarness,
  enableBonusSystem,
  type EngineHarness,
} from '../../../test/support/testing-app';
import { BonusReconciliationService } from '../bonus-ledger/bonus-reconciliation.service';
import { DiscountService } from '../discounts/discount.service';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import { normalizeTimestamp, SalesService } from './sales.service';

describe('SalesService with the engines attached', () => {
  let harness: EngineHarness;
  let sales: SalesService;

  const ledger = () => harness.store.tables.ledger;
  const balanceOf = (clientId: string) =>
    harness.store.tables.clients.get(clientId)?.bonus;

  beforeEach(async () => {
    harness = await createEngineHarness();
    sales = harness.get(SalesService);
    await enableBonusSystem(harness.store);
    await sales.upsertClient({ clientId: '7', firstname: 'Olena' });
    await sales.upsertClient({ clientId: '8', firstname: 'Taras' });
  });

  afterEach(async () => {
    delete process.env.DISCOUNT_FAIL_OPEN;
    jest.restoreAllMocks();
    await harness.close();
  });

  it('normalizes closing timestamps to the stored form', () => {
    expect(normalizeTimestamp('2025-09-02T14:05')).toBe('2025-09-02 14:05:00');
    expect(normalizeTimestamp('2025-09-02 14:05:09')).toBe('2025-09-02 14:05:09');
    expect(normalizeTimestamp(null)).toBeNull();
    expect(normalizeTimestamp(undefined)).toBeUndefined();
  });

  it('posts SPEND then EARN and reconciles the discount for a closed sale', async () => {
    const result = await sales.createTransaction({
      transactionId: '1001',
      clientId: '7',
      dateClose: '2025-09-02T14:05',
      sum: '100.00',
      payedSum: '90.00',
      payedBonus: '10.00',
      bonusPercent: '5',
      items: [{ sum: '60.00' }, { sum: '40.00', productId: '3', quantity: '2' }],
    });

    expect(result.transaction).toMatchObject({
      dateClose: '2025-09-02 14:05:00',
      bonusPercent: '5.00',
      discount: '0.00',
    });
    expect(result.items.map((item) => item.sum)).toEqual(['60.00', '40.00']);
    expect(
      ledger().map(({ operationType, amount, balanceBefore, balanceAfter }) => ({
        operationType,
        amount,
        balanceBefore,
        balanceAfter,
      })),
    ).toEqual([
      { operationType: 'SPEND', amount: -1000, balanceBefore: 0, balanceAfter: -1000 },
      { operationType: 'EARN', amount: 500, balanceBefore: -1000, balanceAfter: -500 },
    ]);
    expect(balanceOf('7')).toBe(-500);
  });

  it('keeps balances equal to ledger sums and the chains unbroken', async () => {
    const closed = (
      transactionId: string,
      clientId: string,
      day: string,
      fields: { sum: string; bonusPercent: string; payedBonus?: string },
    ) =>
      sales.createTransaction({
        transactionId,
        clientId,
        dateClose: `2025-09-${day} 12:00:00`,
        ...fields,
      });

    await closed('1', '7', '02', { sum: '200.00', bonusPercent: '5' });
    await closed('2', '7', '03', { sum: '50.00', bonusPercent: '5', payedBonus: '8.00' });
    await closed('3', '8', '03', { sum: '19.99', bonusPercent: '3' });
    await sales.createTransaction({
      transactionId: '4',
      clientId: '7',
      dateClose: null,
      sum: '70.00',
      bonusPercent: '5',
    });
    await closed('5', '7', '04', { sum: '10.00', bonusPercent: '0', payedBonus: '4.50' });

    expect(balanceOf('7')).toBe(0);
    expect(balanceOf('8')).toBe(60);
    for (const entry of ledger()) {
      expect(entry.balanceAfter).toBe(entry.balanceBefore + entry.amount);
    }
    const report = await harness.get(BonusReconciliationService).checkConsistency();
    expect(report).toEqual({ checkedClients: 2, inconsistentClients: 0, clients: [] });
  });

  it('posts a sale once even when its insert event is delivered again', async () => {
    await sales.createTransaction({
      transactionId: '1001',
      clientId: '7',
      dateClose: '2025-09-02 14:05:00',
      sum: '100.00',
      payedBonus: '10.00',
      bonusPercent: '5',
    });
    const hooks = harness.get(TransactionHooksService);

    await harness.store.transaction(async (session) => {
      const transaction = await session.transactions.findById('1001');
      if (!transaction) throw new Error('transaction 1001 missing');
      await hooks.publish(session, { type: 'transaction.inserted', transaction });
    });

    expect(ledger()).toHaveLength(2);
    expect(balanceOf('7')).toBe(-500);
  });

  describe('gating', () => {
    it.each([
      ['without a client', { clientId: null }],
      ['without a closing time', { dateClose: null }],
      ['closed before the start date', { dateClose: '2025-08-31 23:59:59' }],
    ])('posts nothing for a sale %s', async (_label, overrides) => {
      await sales.createTransaction({
        transactionId: '1001',
        clientId: '7',
        dateClose: '2025-09-02 14:05:00',
        sum: '100.00',
        payedBonus: '10.00',
        bonusPercent: '5',
        ...overrides,
      });
      expect(ledger()).toEqual([]);
      expect(balanceOf('7')).toBe(0);
    });

    it('posts nothing while the bonus system is switched off', async () => {
      await harness.store.seed((session) =>
        session.settings.upsert('bonus_system_enabled', 'false', null),
      );
      await sales.createTransaction({
        transactionId: '1001',
        clientId: '7',
        dateClose: '2025-09-02 14:05:00',
        sum: '100.00',
        bonusPercent: '5',
      });
      expect(ledger()).toEqual([]);
    });
  });

  it('leaves existing postings alone when a sale is updated', async () => {
    await sales.createTransaction({
      transactionId: '1001',
      clientId: '7',
      dateClose: '2025-09-02 14:05:00',
      sum: '100.00',
      payedBonus: '10.00',
      bonusPercent: '5',
    });

    const updated = await sales.updateTransaction('1001', { bonusPercent: '10' });

    expect(updated.bonusPercent).toBe('10.00');
    expect(ledger()).toHaveLength(2);
    expect(balanceOf('7')).toBe(-500);
  });

  it('recomputes the discount on every line item and payment change', async () => {
    const created = await sales.createTransaction({
      transactionId: '3001',
      clientId: '7',
      dateClose: '2025-09-03 10:00:00',
      sum: '100.00',
      payedSum: '50.00',
      bonusPercent: '0',
      items: [{ sum: '70.00' }, { sum: '30.00' }],
    });
    expect(created.transaction.discount).toBe('50.00');

    const edited = await sales.updateLineItem('2', { sum: '10.00' });
    expect(edited.transaction.discount).toBe('30.00');

    const removed = await sales.removeLineItem('1');
    expect(removed.item.sum).toBe('70.00');
    expect(removed.transaction.discount).toBe('0.00');

    const repaid = await sales.updateTransaction('3001', { payedSum: '5.00' });
    expect(repaid.discount).toBe('5.00');

    const apply = jest.spyOn(harness.get(DiscountService), 'applyToTransaction');
    await sales.updateTransaction('3001', { spotId: '2', payedSum: '5.0' });
    expect(apply).not.toHaveBeenCalled();
  });

  it('rejects a duplicate sale and a sale for an unknown client', async () => {
    await sales.createTransaction({ transactionId: '1', sum: '10.00' });

    await expect(
      sales.createTransaction({ transactionId: '1', sum: '10.00' }),
    ).rejects.toBeInstanceOf(DuplicateTransactionError);
    await expect(
      sales.createTransaction({ transactionId: '2', clientId: '99', sum: '10.00' }),
    ).rejects.toBeInstanceOf(ClientNotFoundError);
    expect(harness.store.tables.transactions.has('2')).toBe(false);
  });

  describe('hook failures', () => {
    it('commits the sale without ledger entries when bonus posting fails', async () => {
      jest
        .spyOn(harness.store.ledger, 'insert')
        .mockRejectedValueOnce(new Error('disk full'));

      const result = await sales.createTransaction({
        transactionId: '1001',
        clientId: '7',
        dateClose: '2025-09-02 14:05:00',
        sum: '100.00',
        payedBonus: '10.00',
        bonusPercent: '5',
      });

      expect(result.transaction.transactionId).toBe('1001');
      expect(ledger()).toEqual([]);
      expect(balanceOf('7')).toBe(0);
      expect(harness.store.tables.failures).toEqual([
        expect.objectContaining({
          engine: 'bonus',
          transactionId: '1001',
          eventType: 'transaction.inserted',
          errorMessage: 'disk full',
          resolvedAt: null,
        }),
      ]);
      await expect(
        harness.get(MetricsService).counterValue('engine_failures_total', { engine: 'bonus' }),
      ).resolves.toBe(1);
    });

    it('aborts the write when the discount hook fails', async () => {
      await sales.createTransaction({ transactionId: '4001', sum: '10.00' });
      jest
        .spyOn(harness.store.lineItems, 'totalForTransaction')
        .mockRejectedValueOnce(new Error('statement timeout'));

      await expect(sales.addLineItem('4001', { sum: '10.00' })).rejects.toThrow(
        'statement timeout',
      );
      expect(harness.store.tables.lineItems.size).toBe(0);
      expect(harness.store.tables.failures).toEqual([]);
    });

    it('contains the discount failure when DISCOUNT_FAIL_OPEN is set', async () => {
      process.env.DISCOUNT_FAIL_OPEN = '1';
      await sales.createTransaction({ transactionId: '4001', sum: '10.00' });
      jest
        .spyOn(harness.store.lineItems, 'totalForTransaction')
        .mockRejectedValueOnce(new Error('statement timeout'));

      const written = await sales.addLineItem('4001', { sum: '10.00' });

      expect(written.item.sum).toBe('10.00');
      expect(written.transaction.discount).toBe('0.00');
      expect(harness.store.tables.failures).toEqual([
        expect.objectContaining({
          engine: 'discount',
          transactionId: '4001',
          eventType: 'line_item.changed',
          errorMessage: 'statement timeout',
        }),
      ]);
    });
  });
});
