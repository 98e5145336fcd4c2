import { Injectable, Logger } from '@nestjs/common';
import type { StoreSession } from '../../core/database/database.types';
import type { LedgerEntryRecord } from '../../core/database/entities';
import {
  BalanceConflictError,
  ClientNotFoundError,
} from '../../core/errors/domain.errors';
import { MetricsService } from '../../core/metrics/metrics.service';
import { logEvent, countMetric } from '../../shared/logging/event-log.util';
import { planPosting, type PostableTransaction } from './bonus-posting.util';

export type BonusPostingStatus = 'posted' | 'nothing_to_post' | 'already_posted';

export type BonusPostingResult = {
  status: BonusPostingStatus;
  entries: LedgerEntryRecord[];
  balanceBefore: number | null;
  balanceAfter: number | null;
};

const skipped = (status: BonusPostingStatus): BonusPostingResult => ({
  status,
  entries: [],
  balanceBefore: null,
  balanceAfter: null,
});

/**
 * Posts the ledger entries of one closed sale and moves the client balance.
 * Callers have already checked the gating rules.
 */
@Injectable()
export class BonusPostingService {
  private readonly logger = new Logger(BonusPostingService.name);

  constructor(private readonly metrics: MetricsService) {}

  async postTransaction(
    session: StoreSession,
    tx: PostableTransaction,
    options: { skipIfPosted: boolean },
  ): Promise<BonusPostingResult> {
    if (
      options.skipIfPosted &&
      (await session.ledger.existsForTransaction(tx.transactionId))
    ) {
      return skipped('already_posted');
    }
    const probe = planPosting(tx, 0);
    if (!probe.entries.length) return skipped('nothing_to_post');

    const balanceBefore = await session.clients.lockBalance(tx.clientId);
    if (balanceBefore === null) throw new ClientNotFoundError(tx.clientId);
    const plan = planPosting(tx, balanceBefore);

    const entries: LedgerEntryRecord[] = [];
    for (const entry of plan.entries) {
      entries.push(await session.ledger.insert(entry));
    }
    const swapped = await session.clients.compareAndSetBalance(
      tx.clientId,
      plan.balanceBefore,
      plan.balanceAfter,
    );
    if (!swapped) throw new BalanceConflictError(tx.clientId, plan.balanceBefore);

    for (const entry of entries) {
      countMetric(this.metrics, 'bonus_ledger_entries_total', {
        type: entry.operationType,
      });
      countMetric(
        this.metrics,
        'bonus_ledger_amount_total',
        { type: entry.operationType },
        Math.abs(entry.amount),
      );
    }
    logEvent(this.logger, 'bonus.posted', {
      transactionId: tx.transactionId,
      clientId: tx.clientId,
      entries: entries.map((entry) => ({
        type: entry.operationType,
        amount: entry.amount,
      })),
      balanceBefore: plan.balanceBefore,
      balanceAfter: plan.balanceAfter,
    });
    return {
      status: 'posted',
      entries,
      balanceBefore: plan.balanceBefore,
      balanceAfter: plan.balanceAfter,
    };
  }
}
