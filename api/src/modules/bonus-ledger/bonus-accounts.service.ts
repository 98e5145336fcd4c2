import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
} from '../../core/database/database.types';
import type { LedgerEntryRecord } from '../../core/database/entities';
import {
  BalanceConflictError,
  ClientNotFoundError,
  InvalidAdjustmentError,
} from '../../core/errors/domain.errors';
import { MetricsService } from '../../core/metrics/metrics.service';
import { formatHundredths } from '../../shared/money.util';
import { logEvent, countMetric } from '../../shared/logging/event-log.util';

export type AdjustmentType = 'ADJUST' | 'EXPIRE';

export type BalanceAdjustment = {
  clientId: string;
  /** Signed, minor units. */
  amount: number;
  operationType: AdjustmentType;
  description?: string | null;
};

export type ClientBonusView = {
  clientId: string;
  name: string | null;
  balance: number;
  /** Major units, two decimals. */
  balanceFormatted: string;
  entries: LedgerEntryRecord[];
};

const defaultDescription = (type: AdjustmentType, amount: number) =>
  type === 'EXPIRE'
    ? `Згоряння ${formatHundredths(-amount)} бонусів`
    : `Ручне коригування бонусів на ${formatHundredths(amount)}`;

/** Manual balance moves and the balance view read by the Telegram bot. */
@Injectable()
export class BonusAccountsService {
  private readonly logger = new Logger(BonusAccountsService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly metrics: MetricsService,
  ) {}

  async adjustBalance(input: BalanceAdjustment): Promise<LedgerEntryRecord> {
    if (!Number.isSafeInteger(input.amount) || input.amount === 0) {
      throw new InvalidAdjustmentError(
        'Adjustment amount must be a non-zero whole number of minor units',
      );
    }
    if (input.operationType === 'EXPIRE' && input.amount > 0) {
      throw new InvalidAdjustmentError('EXPIRE can only lower the balance');
    }
    const entry = await this.store.transaction(async (session) => {
      const before = await session.clients.lockBalance(input.clientId);
      if (before === null) throw new ClientNotFoundError(input.clientId);
      const after = before + input.amount;
      const saved = await session.ledger.insert({
        clientId: input.clientId,
        transactionId: null,
        operationType: input.operationType,
        amount: input.amount,
        balanceBefore: before,
        balanceAfter: after,
        description:
          input.description?.trim() ||
          defaultDescription(input.operationType, input.amount),
        bonusPercent: null,
        transactionSum: null,
        processedAt: null,
      });
      const swapped = await session.clients.compareAndSetBalance(
        input.clientId,
        before,
        after,
      );
      if (!swapped) throw new BalanceConflictError(input.clientId, before);
      return saved;
    });
    countMetric(this.metrics, 'bonus_ledger_entries_total', {
      type: entry.operationType,
    });
    countMetric(
      this.metrics,
      'bonus_ledger_amount_total',
      { type: entry.operationType },
      Math.abs(entry.amount),
    );
    logEvent(this.logger, 'bonus.adjusted', {
      clientId: entry.clientId,
      type: entry.operationType,
      amount: entry.amount,
      balanceAfter: entry.balanceAfter,
    });
    return entry;
  }

  async getClientBonus(clientId: string, limit = 10): Promise<ClientBonusView> {
    return this.store.transaction(async (session) => {
      const client = await session.clients.findById(clientId);
      if (!client) throw new ClientNotFoundError(clientId);
      const entries = await session.ledger.listByClient(clientId, {
        limit,
        newestFirst: true,
      });
      const name =
        [client.firstname, client.lastname].filter(Boolean).join(' ') || null;
      return {
        clientId,
        name,
        balance: client.bonus,
        balanceFormatted: formatHundredths(client.bonus),
        entries,
      };
    });
  }
}
