import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
} from '../../core/database/database.types';
import type {
  EngineFailureRecord,
  LedgerEntryRecord,
} from '../../core/database/entities';
import { formatError } from '../../shared/logging/ignore-error.util';
import { logEvent } from '../../shared/logging/event-log.util';
import { loadBonusStartDate } from '../settings/bonus-config';
import { EngineFailuresService } from '../hooks/engine-failures.service';
import { BonusPostingService } from './bonus-posting.service';
import { hasPostingPrerequisites } from './bonus-posting.util';

export type ChainBreak = {
  entryId: string;
  field: 'balance_before' | 'balance_after';
  expected: number;
  actual: number;
};

export type ClientConsistency = {
  clientId: string;
  balance: number;
  ledgerSum: number;
  drift: number;
  entryCount: number;
  chainBreaks: ChainBreak[];
  consistent: boolean;
};

export type ConsistencyReport = {
  checkedClients: number;
  inconsistentClients: number;
  /** Every checked client for a single-client check, otherwise only the broken ones. */
  clients: ClientConsistency[];
};

export type RetryOutcome = 'posted' | 'already_posted' | 'skipped' | 'failed';

export type RetryReport = {
  attempted: number;
  posted: number;
  skipped: number;
  failed: number;
  results: Array<{
    failureId: string;
    transactionId: string | null;
    outcome: RetryOutcome;
    error?: string;
  }>;
};

/** Ledger entries of one client, oldest first, against its stored balance. */
export const inspectLedgerChain = (
  clientId: string,
  balance: number,
  entries: readonly LedgerEntryRecord[],
): ClientConsistency => {
  const chainBreaks: ChainBreak[] = [];
  let ledgerSum = 0;
  let previousAfter = 0;
  for (const entry of entries) {
    ledgerSum += entry.amount;
    if (entry.balanceBefore !== previousAfter) {
      chainBreaks.push({
        entryId: entry.id,
        field: 'balance_before',
        expected: previousAfter,
        actual: entry.balanceBefore,
      });
    }
    const expectedAfter = entry.balanceBefore + entry.amount;
    if (entry.balanceAfter !== expectedAfter) {
      chainBreaks.push({
        entryId: entry.id,
        field: 'balance_after',
        expected: expectedAfter,
        actual: entry.balanceAfter,
      });
    }
    previousAfter = entry.balanceAfter;
  }
  const drift = balance - ledgerSum;
  return {
    clientId,
    balance,
    ledgerSum,
    drift,
    entryCount: entries.length,
    chainBreaks,
    consistent: drift === 0 && chainBreaks.length === 0,
  };
};

@Injectable()
export class BonusReconciliationService {
  private readonly logger = new Logger(BonusReconciliationService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly failures: EngineFailuresService,
    private readonly posting: BonusPostingService,
  ) {}

  async checkConsistency(clientId?: string): Promise<ConsistencyReport> {
    const report = await this.store.transaction(async (session) => {
      const balances = await session.clients.listBalances(
        clientId ? [clientId] : undefined,
      );
      const sums = clientId ? null : await session.ledger.sumByClient();
      const checked: ClientConsistency[] = [];
      for (const { clientId: id, bonus } of balances) {
        // clients with no ledger and a zero balance cannot be off
        if (sums && !sums.has(id) && bonus === 0) {
          checked.push(inspectLedgerChain(id, bonus, []));
          continue;
        }
        const entries = await session.ledger.listByClient(id);
        checked.push(inspectLedgerChain(id, bonus, entries));
      }
      return checked;
    });
    const broken = report.filter((client) => !client.consistent);
    logEvent(this.logger, 'bonus.consistency_checked', {
      clientId: clientId ?? null,
      checked: report.length,
      inconsistent: broken.length,
    });
    return {
      checkedClients: report.length,
      inconsistentClients: broken.length,
      clients: clientId ? report : broken,
    };
  }

  listFailures(limit?: number): Promise<EngineFailureRecord[]> {
    return this.failures.listUnresolved('bonus', limit);
  }

  /**
   * Replays unresolved bonus failures. A failure is resolved once its sale has
   * ledger entries or can no longer be posted; failed replays stay open.
   */
  async retryFailedPostings(limit = 100): Promise<RetryReport> {
    const pending = await this.listFailures(limit);
    const report: RetryReport = {
      attempted: pending.length,
      posted: 0,
      skipped: 0,
      failed: 0,
      results: [],
    };
    for (const failure of pending) {
      try {
        const outcome = await this.store.transaction(async (session) => {
          const tx = failure.transactionId
            ? await session.transactions.findById(failure.transactionId)
            : null;
          let result: RetryOutcome = 'skipped';
          if (tx && (await session.ledger.existsForTransaction(tx.transactionId))) {
            result = 'already_posted';
          } else if (tx) {
            const startDate = await loadBonusStartDate(session.settings);
            if (hasPostingPrerequisites(tx, startDate)) {
              const posted = await this.posting.postTransaction(session, tx, {
                skipIfPosted: true,
              });
              result = posted.status === 'posted' ? 'posted' : 'skipped';
            }
          }
          await session.failures.markResolved(failure.id);
          return result;
        });
        if (outcome === 'posted') report.posted += 1;
        else report.skipped += 1;
        report.results.push({
          failureId: failure.id,
          transactionId: failure.transactionId,
          outcome,
        });
      } catch (err) {
        report.failed += 1;
        report.results.push({
          failureId: failure.id,
          transactionId: failure.transactionId,
          outcome: 'failed',
          error: formatError(err),
        });
        this.logger.warn(
          `retry of bonus failure ${failure.id} failed: ${formatError(err)}`,
        );
      }
    }
    logEvent(this.logger, 'bonus.failures_retried', {
      attempted: report.attempted,
      posted: report.posted,
      skipped: report.skipped,
      failed: report.failed,
    });
    return report;
  }
}
