import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import type {
  BonusCursor,
  TransactionRecord,
} from '../../core/database/entities';
import { RecalculationInProgressError } from '../../core/errors/domain.errors';
import { AppConfigService } from '../../core/config/app-config.service';
import { MetricsService } from '../../core/metrics/metrics.service';
import { logEvent } from '../../shared/logging/event-log.util';
import { loadBonusStartDate } from '../settings/bonus-config';
import {
  SETTING_BONUS_ENABLED,
  SETTING_BONUS_RECALC_CHECKPOINT,
} from '../settings/settings.constants';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import { BonusPostingService } from './bonus-posting.service';
import { hasPostingPrerequisites } from './bonus-posting.util';
import {
  readCheckpoint,
  writeCheckpoint,
  type BonusRecalcCheckpoint,
} from './bonus-recalc-checkpoint';

export const BONUS_RECALC_LOCK = 'bonus:recalculate';

export type BonusRecalculationOptions = {
  /** Continue after the stored checkpoint instead of wiping. */
  resume?: boolean;
  batchSize?: number;
};

export type BonusRecalculationResult = {
  totalTransactions: number;
  updatedTransactions: number;
  /** Minor units over the whole ledger. */
  totalEarned: number;
  totalSpent: number;
};

@Injectable()
export class BonusControlService {
  private readonly logger = new Logger(BonusControlService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly hooks: TransactionHooksService,
    private readonly posting: BonusPostingService,
    private readonly config: AppConfigService,
    private readonly metrics: MetricsService,
  ) {}

  /** Flips the automatic hook and the `bonus_system_enabled` flag together. */
  async manageBonusTriggers(enable: boolean): Promise<string> {
    await this.store.transaction(async (session) => {
      await this.hooks.setEnabled('bonus_posting', enable, session);
      await session.settings.upsert(
        SETTING_BONUS_ENABLED,
        enable ? 'true' : 'false',
        null,
      );
    });
    logEvent(this.logger, 'bonus.triggers_toggled', { enabled: enable });
    return enable
      ? 'Bonus triggers ENABLED successfully'
      : 'Bonus triggers DISABLED successfully';
  }

  async getCheckpoint(): Promise<BonusRecalcCheckpoint | null> {
    return this.store.transaction((session) => readCheckpoint(session.settings));
  }

  /**
   * Rebuilds the ledger from closed sales in `(date_close, transaction_id)`
   * order, one database transaction per batch. An interrupted run leaves the
   * hook off and its checkpoint behind; `resume` picks it up from there. The
   * closing transaction turns the hook back on and posts whatever sales were
   * written meanwhile.
   */
  async recalculateAllBonuses(
    options: BonusRecalculationOptions = {},
  ): Promise<BonusRecalculationResult> {
    const outcome = await this.store.withExclusiveLock(BONUS_RECALC_LOCK, () =>
      this.runRecalculation(options),
    );
    if (!outcome.acquired) {
      throw new RecalculationInProgressError('Bonus recalculation');
    }
    return outcome.result;
  }

  private async runRecalculation(
    options: BonusRecalculationOptions,
  ): Promise<BonusRecalculationResult> {
    const batchSize = options.batchSize ?? this.config.getBonusRecalcBatchSize();
    if (!Number.isSafeInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    const started = Date.now();

    const prepared = await this.store.transaction(async (session) => {
      const startDate = await loadBonusStartDate(session.settings);
      let checkpoint = options.resume
        ? await readCheckpoint(session.settings)
        : null;
      const resumed = checkpoint !== null;
      if (!checkpoint) {
        await this.hooks.setEnabled('bonus_posting', false, session);
        const deleted = await session.ledger.deleteAll();
        const reset = await session.clients.resetAllBalances();
        checkpoint = {
          cursor: null,
          processed: 0,
          startedAt: new Date().toISOString(),
        };
        await writeCheckpoint(session.settings, checkpoint);
        logEvent(this.logger, 'bonus.recalculation_wiped', {
          deletedEntries: deleted,
          resetClients: reset,
        });
      }
      const total = await session.transactions.countEligibleForBonus(startDate);
      return { startDate, checkpoint, resumed, total };
    });

    const { startDate, total, resumed } = prepared;
    logEvent(this.logger, 'bonus.recalculation_started', {
      total,
      resumed,
      processed: prepared.checkpoint.processed,
      batchSize,
    });

    let checkpoint = prepared.checkpoint;
    for (;;) {
      const next = await this.store.transaction(async (session) => {
        const batch = await session.transactions.listEligibleForBonus(
          startDate,
          checkpoint.cursor,
          batchSize,
        );
        for (const tx of batch) {
          if (!hasPostingPrerequisites(tx, startDate)) continue;
          await this.posting.postTransaction(session, tx, {
            skipIfPosted: false,
          });
        }
        const last = batch[batch.length - 1];
        if (!last?.dateClose) return { checkpoint, size: batch.length };
        const advanced: BonusRecalcCheckpoint = {
          cursor: { dateClose: last.dateClose, transactionId: last.transactionId },
          processed: checkpoint.processed + batch.length,
          startedAt: checkpoint.startedAt,
        };
        await writeCheckpoint(session.settings, advanced);
        return { checkpoint: advanced, size: batch.length };
      });
      checkpoint = next.checkpoint;
      if (next.size > 0) {
        this.logger.log(
          `bonus recalculation: processed ${checkpoint.processed} of ${total}`,
        );
      }
      if (next.size < batchSize) break;
    }

    const final = await this.store.transaction(async (session) => {
      await this.hooks.setEnabled('bonus_posting', true, session);
      const swept = await this.postMissed(session, startDate, batchSize);
      await session.settings.delete(SETTING_BONUS_RECALC_CHECKPOINT);
      return {
        swept,
        total: await session.transactions.countEligibleForBonus(startDate),
        totals: await session.ledger.totals(),
      };
    });
    if (final.swept > 0) {
      logEvent(this.logger, 'bonus.recalculation_swept', { posted: final.swept });
    }

    const result: BonusRecalculationResult = {
      totalTransactions: final.total,
      updatedTransactions: checkpoint.processed + final.swept,
      totalEarned: final.totals.earned,
      totalSpent: final.totals.spent,
    };
    this.metrics.observe('bonus_recalculation_duration_ms', Date.now() - started);
    logEvent(this.logger, 'bonus.recalculation_completed', {
      ...result,
      durationMs: Date.now() - started,
    });
    return result;
  }

  /**
   * Posts eligible sales that have no ledger entry yet: those written while
   * the hook was off, behind the cursor or after the last batch was read.
   * Runs with the switch lock held, so no such write is still in flight.
   */
  private async postMissed(
    session: StoreSession,
    startDate: string,
    batchSize: number,
  ): Promise<number> {
    let posted = 0;
    let cursor: BonusCursor | null = null;
    for (;;) {
      const batch: TransactionRecord[] =
        await session.transactions.listUnpostedForBonus(startDate, cursor, batchSize);
      for (const tx of batch) {
        if (!hasPostingPrerequisites(tx, startDate)) continue;
        const outcome = await this.posting.postTransaction(session, tx, {
          skipIfPosted: true,
        });
        if (outcome.status === 'posted') posted += 1;
      }
      const last = batch[batch.length - 1];
      if (!last?.dateClose || batch.length < batchSize) return posted;
      cursor = { dateClose: last.dateClose, transactionId: last.transactionId };
    }
  }
}
