import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
} from '../../core/database/database.types';
import { RecalculationInProgressError } from '../../core/errors/domain.errors';
import { MetricsService } from '../../core/metrics/metrics.service';
import { logEvent, countMetric } from '../../shared/logging/event-log.util';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import { computeDiscount } from './discount.util';

export const DISCOUNT_RECALC_LOCK = 'discount:recalculate';

export type DiscountRecalculationResult = {
  /** Every transaction in the table. */
  totalTransactions: number;
  /** Transactions with at least one line item, all rewritten. */
  updatedCount: number;
  /** Sum of positive discounts, major units. */
  totalDiscount: string;
};

@Injectable()
export class DiscountControlService {
  private readonly logger = new Logger(DiscountControlService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly hooks: TransactionHooksService,
    private readonly metrics: MetricsService,
  ) {}

  async manageDiscountTriggers(enable: boolean): Promise<string> {
    await this.store.transaction(async (session) => {
      await this.hooks.setEnabled('discount_line_items', enable, session);
      await this.hooks.setEnabled('discount_payments', enable, session);
    });
    logEvent(this.logger, 'discount.triggers_toggled', { enabled: enable });
    return enable ? 'Discount triggers ENABLED' : 'Discount triggers DISABLED';
  }

  /**
   * One aggregated pass over every sale with line items, with the payments
   * hook switched off for the duration.
   */
  async recalculateAllDiscounts(): Promise<DiscountRecalculationResult> {
    const outcome = await this.store.withExclusiveLock(
      DISCOUNT_RECALC_LOCK,
      () =>
        this.store.transaction(async (session) => {
          const totalTransactions = await session.transactions.countAll();
          await this.hooks.setEnabled('discount_payments', false, session);
          const totals = await session.transactions.lineItemTotals();
          const updatedCount = await session.transactions.setDiscounts(
            totals.map((row) => ({
              transactionId: row.transactionId,
              discount: computeDiscount(
                row.lineTotal,
                row.payedSum,
                row.payedBonus,
              ),
            })),
          );
          await this.hooks.setEnabled('discount_payments', true, session);
          const totalDiscount =
            await session.transactions.sumPositiveDiscounts();
          return { totalTransactions, updatedCount, totalDiscount };
        }),
    );
    if (!outcome.acquired) {
      throw new RecalculationInProgressError('Discount recalculation');
    }
    countMetric(
      this.metrics,
      'discount_recalculations_total',
      { source: 'bulk' },
      outcome.result.updatedCount,
    );
    logEvent(this.logger, 'discount.recalculated', { ...outcome.result });
    return outcome.result;
  }
}
