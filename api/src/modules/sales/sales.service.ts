import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DATA_STORE,
  type DataStore,
  type StoreSession,
} from '../../core/database/database.types';
import type {
  ClientRecord,
  LineItemPatch,
  LineItemRecord,
  NewClient,
  NewLineItem,
  NewTransaction,
  TransactionPatch,
  TransactionRecord,
} from '../../core/database/entities';
import {
  ClientNotFoundError,
  DuplicateTransactionError,
  LineItemNotFoundError,
  TransactionNotFoundError,
} from '../../core/errors/domain.errors';
import { logEvent } from '../../shared/logging/event-log.util';
import { TransactionHooksService } from '../hooks/transaction-hooks.service';

export type LineItemInput = Omit<NewLineItem, 'transactionId'>;

export type CreateTransactionInput = NewTransaction & {
  items?: LineItemInput[];
};

export type TransactionWithItems = {
  transaction: TransactionRecord;
  items: LineItemRecord[];
};

export type LineItemWrite = {
  item: LineItemRecord;
  transaction: TransactionRecord;
};

/** `2025-09-02T14:05` is stored the way PostgreSQL prints it back. */
export const normalizeTimestamp = (
  value: string | null | undefined,
): string | null | undefined => {
  if (value === null || value === undefined) return value;
  const [date, time = '00:00:00'] = value.trim().split(/[ T]/);
  return `${date} ${time.length === 5 ? `${time}:00` : time}`;
};

/**
 * Write path for the POS sync job and the web API. Every write publishes its
 * event inside the same database transaction, so hook side effects commit or
 * roll back with it.
 */
@Injectable()
export class SalesService {
  private readonly logger = new Logger(SalesService.name);

  constructor(
    @Inject(DATA_STORE) private readonly store: DataStore,
    private readonly hooks: TransactionHooksService,
  ) {}

  upsertClient(input: NewClient): Promise<ClientRecord> {
    return this.store.transaction((session) => session.clients.upsert(input));
  }

  async createTransaction(
    input: CreateTransactionInput,
  ): Promise<TransactionWithItems> {
    const { items = [], ...fields } = input;
    const result = await this.store.transaction(async (session) => {
      if (await session.transactions.findById(fields.transactionId)) {
        throw new DuplicateTransactionError(fields.transactionId);
      }
      await this.assertClient(session, fields.clientId);
      const transaction = await session.transactions.insert({
        ...fields,
        dateClose: normalizeTimestamp(fields.dateClose),
      });
      await this.hooks.publish(session, {
        type: 'transaction.inserted',
        transaction,
      });
      const saved: LineItemRecord[] = [];
      for (const item of items) {
        saved.push(
          await this.insertLineItem(session, {
            ...item,
            transactionId: transaction.transactionId,
          }),
        );
      }
      return {
        transaction: await this.reload(session, transaction.transactionId),
        items: saved,
      };
    });
    logEvent(this.logger, 'sales.transaction_created', {
      transactionId: result.transaction.transactionId,
      clientId: result.transaction.clientId,
      items: result.items.length,
    });
    return result;
  }

  async updateTransaction(
    transactionId: string,
    patch: TransactionPatch,
  ): Promise<TransactionRecord> {
    return this.store.transaction(async (session) => {
      const previous = await session.transactions.findById(transactionId);
      if (!previous) throw new TransactionNotFoundError(transactionId);
      await this.assertClient(session, patch.clientId);
      const transaction = await session.transactions.update(transactionId, {
        ...patch,
        dateClose: normalizeTimestamp(patch.dateClose),
      });
      if (!transaction) throw new TransactionNotFoundError(transactionId);
      await this.hooks.publish(session, {
        type: 'transaction.updated',
        previous,
        transaction,
      });
      return this.reload(session, transactionId);
    });
  }

  async addLineItem(
    transactionId: string,
    input: LineItemInput,
  ): Promise<LineItemWrite> {
    return this.store.transaction(async (session) => {
      if (!(await session.transactions.findById(transactionId))) {
        throw new TransactionNotFoundError(transactionId);
      }
      const item = await this.insertLineItem(session, {
        ...input,
        transactionId,
      });
      return { item, transaction: await this.reload(session, transactionId) };
    });
  }

  async updateLineItem(
    id: string,
    patch: LineItemPatch,
  ): Promise<LineItemWrite> {
    return this.store.transaction(async (session) => {
      const item = await session.lineItems.update(id, patch);
      if (!item) throw new LineItemNotFoundError(id);
      await this.hooks.publish(session, {
        type: 'line_item.changed',
        operation: 'update',
        transactionId: item.transactionId,
      });
      return {
        item,
        transaction: await this.reload(session, item.transactionId),
      };
    });
  }

  async removeLineItem(id: string): Promise<LineItemWrite> {
    return this.store.transaction(async (session) => {
      const item = await session.lineItems.delete(id);
      if (!item) throw new LineItemNotFoundError(id);
      await this.hooks.publish(session, {
        type: 'line_item.changed',
        operation: 'delete',
        transactionId: item.transactionId,
      });
      return {
        item,
        transaction: await this.reload(session, item.transactionId),
      };
    });
  }

  private async insertLineItem(
    session: StoreSession,
    input: NewLineItem,
  ): Promise<LineItemRecord> {
    const item = await session.lineItems.insert(input);
    await this.hooks.publish(session, {
      type: 'line_item.changed',
      operation: 'insert',
      transactionId: item.transactionId,
    });
    return item;
  }

  private async assertClient(
    session: StoreSession,
    clientId: string | null | undefined,
  ) {
    if (!clientId) return;
    if (!(await session.clients.findById(clientId))) {
      throw new ClientNotFoundError(clientId);
    }
  }

  private async reload(
    session: StoreSession,
    transactionId: string,
  ): Promise<TransactionRecord> {
    const transaction = await session.transactions.findById(transactionId);
    if (!transaction) throw new TransactionNotFoundError(transactionId);
    return transaction;
  }
}
