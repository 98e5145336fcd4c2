import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import { TransactionNotFoundError } from '../../core/errors/domain.errors';
import { MetricsService } from '../../core/metrics/metrics.service';
import { formatHundredths, toHundredths } from '../../shared/money.util';
import { logEvent, countMetric } from '../../shared/logging/event-log.util';
import { computeDiscount } from './discount.util';

export type DiscountCalculation = {
  transactionId: string;
  itemCount: number;
  lineTotal: string;
  payedSum: string | null;
  payedBonus: string | null;
  discount: string;
};

export type DiscountUpdate = {
  transactionId: string;
  oldDiscount: string;
  newDiscount: string;
  /** The row was rewritten. */
  updated: boolean;
  /** The stored value differs from the previous one. */
  changed: boolean;
};

@Injectable()
export class DiscountService {
  private readonly logger = new Logger(DiscountService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly metrics: MetricsService,
  ) {}

  /** Reads without writing; a sale without line items has a zero discount. */
  async calculateSingleDiscount(
    transactionId: string,
    session?: StoreSession,
  ): Promise<DiscountCalculation> {
    const run = async (s: StoreSession): Promise<DiscountCalculation> => {
      const tx = await s.transactions.findById(transactionId);
      if (!tx) throw new TransactionNotFoundError(transactionId);
      const { itemCount, total } =
        await s.lineItems.totalForTransaction(transactionId);
      return {
        transactionId,
        itemCount,
        lineTotal: formatHundredths(toHundredths(total)),
        payedSum: tx.payedSum,
        payedBonus: tx.payedBonus,
        discount:
          itemCount > 0
            ? computeDiscount(total, tx.payedSum, tx.payedBonus)
            : '0.00',
      };
    };
    return session ? run(session) : this.store.transaction(run);
  }

  /** Hook path: recompute and store the discount of one sale. */
  async applyToTransaction(
    session: StoreSession,
    transactionId: string,
    source: string,
  ): Promise<string | null> {
    const tx = await session.transactions.findById(transactionId);
    if (!tx) return null;
    const calculation = await this.calculateSingleDiscount(transactionId, session);
    await session.transactions.setDiscount(transactionId, calculation.discount);
    countMetric(this.metrics, 'discount_recalculations_total', { source });
    this.logger.debug(
      `discount of transaction ${transactionId}: ${tx.discount} -> ${calculation.discount}`,
    );
    return calculation.discount;
  }

  /** Recomputes the given sales that have line items; others are left out. */
  async recalculateDiscounts(
    transactionIds: readonly string[],
  ): Promise<DiscountUpdate[]> {
    if (!transactionIds.length) return [];
    const updates = await this.store.transaction(async (session) => {
      const totals = await session.transactions.lineItemTotals(transactionIds);
      const rows = totals.map((row) => ({
        transactionId: row.transactionId,
        oldDiscount: formatHundredths(toHundredths(row.discount)),
        newDiscount: computeDiscount(row.lineTotal, row.payedSum, row.payedBonus),
      }));
      await session.transactions.setDiscounts(
        rows.map((row) => ({
          transactionId: row.transactionId,
          discount: row.newDiscount,
        })),
      );
      return rows.map(
        (row): DiscountUpdate => ({
          ...row,
          updated: true,
          changed: row.oldDiscount !== row.newDiscount,
        }),
      );
    });
    countMetric(
      this.metrics,
      'discount_recalculations_total',
      { source: 'batch' },
      updates.length,
    );
    logEvent(this.logger, 'discount.batch_recalculated', {
      requested: transactionIds.length,
      updated: updates.length,
      changed: updates.filter((row) => row.changed).length,
    });
    return updates;
  }
}
