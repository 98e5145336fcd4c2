import { TransactionNotFoundError } from '../../core/errors/domain.errors';
import { createEngineHarness, type EngineHarness } from '../../../test/support/testing-app';
import { SalesService } from '../sales/sales.service';
import { DiscountControlService } from './discount-control.service';
import { DiscountService } from './discount.service';

describe('DiscountService', () => {
  let harness: EngineHarness;
  let discounts: DiscountService;

  beforeEach(async () => {
    harness = await createEngineHarness();
    discounts = harness.get(DiscountService);
    await harness.get(DiscountControlService).manageDiscountTriggers(false);
    const sales = harness.get(SalesService);
    await sales.createTransaction({
      transactionId: '1',
      sum: '100.00',
      payedSum: '50.00',
      items: [{ sum: '70.00' }, { sum: '30.00' }],
    });
    await sales.createTransaction({
      transactionId: '2',
      sum: '20.00',
      payedSum: '15.00',
      payedBonus: '10.00',
      items: [{ sum: '20.00' }],
    });
    await sales.createTransaction({ transactionId: '3', sum: '5.00', payedSum: '1.00' });
  });

  afterEach(() => harness.close());

  describe('calculateSingleDiscount', () => {
    it('subtracts both payments from the line total', async () => {
      await expect(discounts.calculateSingleDiscount('1')).resolves.toEqual({
        transactionId: '1',
        itemCount: 2,
        lineTotal: '100.00',
        payedSum: '50.00',
        payedBonus: null,
        discount: '50.00',
      });
    });

    it('never goes below zero', async () => {
      const result = await discounts.calculateSingleDiscount('2');
      expect(result.discount).toBe('0.00');
    });

    it('gives zero to a sale without line items', async () => {
      await expect(discounts.calculateSingleDiscount('3')).resolves.toMatchObject({
        itemCount: 0,
        lineTotal: '0.00',
        discount: '0.00',
      });
    });

    it('does not write the result', async () => {
      await discounts.calculateSingleDiscount('1');
      expect(harness.store.tables.transactions.get('1')?.discount).toBe('0.00');
    });

    it('rejects an unknown sale', async () => {
      await expect(discounts.calculateSingleDiscount('404')).rejects.toBeInstanceOf(
        TransactionNotFoundError,
      );
    });
  });

  describe('recalculateDiscounts', () => {
    it('rewrites the requested sales that have line items', async () => {
      const rows = await discounts.recalculateDiscounts(['1', '2', '3', '404']);

      expect(rows).toEqual([
        {
          transactionId: '1',
          oldDiscount: '0.00',
          newDiscount: '50.00',
          updated: true,
          changed: true,
        },
        {
          transactionId: '2',
          oldDiscount: '0.00',
          newDiscount: '0.00',
          updated: true,
          changed: false,
        },
      ]);
      expect(harness.store.tables.transactions.get('1')?.discount).toBe('50.00');
    });

    it('does nothing for an empty list', async () => {
      await expect(discounts.recalculateDiscounts([])).resolves.toEqual([]);
    });
  });
});
