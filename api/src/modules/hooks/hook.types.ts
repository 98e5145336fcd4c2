import type { StoreSession } from '../../core/database/database.types';
import type { TransactionRecord } from '../../core/database/entities';
import type { BonusSystemConfig } from '../settings/bonus-config';

export const HOOK_NAMES = [
  'discount_line_items',
  'discount_payments',
  'bonus_posting',
] as const;
export type HookName = (typeof HOOK_NAMES)[number];

export type LineItemOperation = 'insert' | 'update' | 'delete';

export type TransactionInsertedEvent = {
  type: 'transaction.inserted';
  transaction: TransactionRecord;
};

export type TransactionUpdatedEvent = {
  type: 'transaction.updated';
  previous: TransactionRecord;
  transaction: TransactionRecord;
};

export type LineItemChangedEvent = {
  type: 'line_item.changed';
  operation: LineItemOperation;
  transactionId: string;
};

export type SalesEvent =
  | TransactionInsertedEvent
  | TransactionUpdatedEvent
  | LineItemChangedEvent;

/** Per-publish context; the bonus settings are read at most once per write. */
export type HookContext = {
  bonusConfig(): Promise<BonusSystemConfig>;
};

export interface TransactionHook {
  readonly name: HookName;
  /** Lower runs first. */
  readonly priority: number;
  matches(event: SalesEvent): boolean;
  handle(
    session: StoreSession,
    event: SalesEvent,
    context: HookContext,
  ): Promise<void>;
}

export type HookStatus = {
  name: HookName;
  enabled: boolean;
  registered: boolean;
};

export const eventTransactionId = (event: SalesEvent): string =>
  event.type === 'line_item.changed'
    ? event.transactionId
    : event.transaction.transactionId;
