import { Injectable, OnModuleInit } from '@nestjs/common';
import type { StoreSession } from '../../core/database/database.types';
import { AppConfigService } from '../../core/config/app-config.service';
import { EngineFailuresService } from '../hooks/engine-failures.service';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';
import {
  eventTransactionId,
  type HookName,
  type SalesEvent,
  type TransactionHook,
} from '../hooks/hook.types';
import { DiscountService } from './discount.service';
import { paymentsChanged } from './discount.util';

/**
 * Fail-closed by default: an error aborts the write that published the event.
 * DISCOUNT_FAIL_OPEN=1 contains it like the bonus hook does.
 */
@Injectable()
abstract class DiscountHook implements TransactionHook, OnModuleInit {
  abstract readonly name: HookName;
  readonly priority = 10;

  constructor(
    protected readonly hooks: TransactionHooksService,
    protected readonly failures: EngineFailuresService,
    protected readonly discounts: DiscountService,
    protected readonly config: AppConfigService,
  ) {}

  onModuleInit() {
    this.hooks.register(this);
  }

  abstract matches(event: SalesEvent): boolean;

  async handle(session: StoreSession, event: SalesEvent): Promise<void> {
    const transactionId = eventTransactionId(event);
    const apply = async () => {
      await this.discounts.applyToTransaction(session, transactionId, this.name);
    };
    if (!this.config.isDiscountFailOpen()) {
      await apply();
      return;
    }
    await this.failures.runContained(
      session,
      { engine: 'discount', eventType: event.type, transactionId },
      apply,
    );
  }
}

@Injectable()
export class DiscountLineItemsHook extends DiscountHook {
  readonly name = 'discount_line_items';

  matches(event: SalesEvent): boolean {
    return event.type === 'line_item.changed';
  }
}

@Injectable()
export class DiscountPaymentsHook extends DiscountHook {
  readonly name = 'discount_payments';

  matches(event: SalesEvent): boolean {
    return (
      event.type === 'transaction.updated' &&
      paymentsChanged(event.previous, event.transaction)
    );
  }
}
