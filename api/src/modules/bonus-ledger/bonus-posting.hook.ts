import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import type { StoreSession } from '../../core/database/database.types';
import { EngineFailuresService } from '../hooks/engine-failures.service';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import type {
  HookContext,
  SalesEvent,
  TransactionHook,
} from '../hooks/hook.types';
import { BonusPostingService } from './bonus-posting.service';
import { isEligibleForBonus } from './bonus-posting.util';

/**
 * Automatic posting on transaction writes. Fail-open: an error is contained
 * by EngineFailuresService and the write commits without ledger entries.
 */
@Injectable()
export class BonusPostingHook implements TransactionHook, OnModuleInit {
  readonly name = 'bonus_posting';
  readonly priority = 20;
  private readonly logger = new Logger(BonusPostingHook.name);

  constructor(
    private readonly hooks: TransactionHooksService,
    private readonly failures: EngineFailuresService,
    private readonly posting: BonusPostingService,
  ) {}

  onModuleInit() {
    this.hooks.register(this);
  }

  matches(event: SalesEvent): boolean {
    return (
      event.type === 'transaction.inserted' ||
      event.type === 'transaction.updated'
    );
  }

  async handle(
    session: StoreSession,
    event: SalesEvent,
    context: HookContext,
  ): Promise<void> {
    if (event.type === 'line_item.changed') return;
    const tx = event.transaction;
    await this.failures.runContained(
      session,
      { engine: 'bonus', eventType: event.type, transactionId: tx.transactionId },
      async () => {
        const config = await context.bonusConfig();
        if (!isEligibleForBonus(tx, config)) return;
        // updates never re-derive postings; the bulk recompute does
        if (event.type === 'transaction.updated') {
          this.logger.debug(
            `update of transaction ${tx.transactionId} leaves its postings as they are`,
          );
          return;
        }
        await this.posting.postTransaction(session, tx, { skipIfPosted: true });
      },
    );
  }
}
