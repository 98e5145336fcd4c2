import type {
  BonusCursor,
  ClientRecord,
  DbTimestamp,
  EngineFailureRecord,
  EngineName,
  LedgerEntryRecord,
  LineItemPatch,
  LineItemRecord,
  LineItemTotals,
  NewClient,
  NewEngineFailure,
  NewLedgerEntry,
  NewLineItem,
  NewTransaction,
  SettingRecord,
  TransactionPatch,
  TransactionRecord,
} from './entities';

export const DATA_STORE = Symbol('DATA_STORE');

export interface SettingsRepository {
  get(key: string): Promise<SettingRecord | null>;
  getMany(keys: readonly string[]): Promise<Map<string, string>>;
  /** Insert or update; a null description keeps the stored one. */
  upsert(key: string, value: string, description: string | null): Promise<void>;
  delete(key: string): Promise<boolean>;
}

export interface ClientsRepository {
  findById(clientId: string): Promise<ClientRecord | null>;
  upsert(input: NewClient): Promise<ClientRecord>;
  /** Locks the client row for the rest of the transaction; null when absent. */
  lockBalance(clientId: string): Promise<number | null>;
  compareAndSetBalance(
    clientId: string,
    expected: number,
    next: number,
  ): Promise<boolean>;
  resetAllBalances(): Promise<number>;
  listBalances(
    clientIds?: readonly string[],
  ): Promise<Array<Pick<ClientRecord, 'clientId' | 'bonus'>>>;
}

export interface TransactionsRepository {
  findById(transactionId: string): Promise<TransactionRecord | null>;
  insert(input: NewTransaction): Promise<TransactionRecord>;
  update(
    transactionId: string,
    patch: TransactionPatch,
  ): Promise<TransactionRecord | null>;
  setDiscount(transactionId: string, discount: string): Promise<boolean>;
  setDiscounts(
    rows: ReadonlyArray<{ transactionId: string; discount: string }>,
  ): Promise<number>;
  countAll(): Promise<number>;
  countEligibleForBonus(startDate: string): Promise<number>;
  listEligibleForBonus(
    startDate: string,
    after: BonusCursor | null,
    limit: number,
  ): Promise<TransactionRecord[]>;
  /** Like `listEligibleForBonus`, restricted to sales with no ledger entry. */
  listUnpostedForBonus(
    startDate: string,
    after: BonusCursor | null,
    limit: number,
  ): Promise<TransactionRecord[]>;
  /** One aggregated join: only transactions with at least one line item. */
  lineItemTotals(
    transactionIds?: readonly string[],
  ): Promise<LineItemTotals[]>;
  sumPositiveDiscounts(): Promise<string>;
}

export interface LineItemsRepository {
  insert(input: NewLineItem): Promise<LineItemRecord>;
  update(id: string, patch: LineItemPatch): Promise<LineItemRecord | null>;
  delete(id: string): Promise<LineItemRecord | null>;
  totalForTransaction(
    transactionId: string,
  ): Promise<{ itemCount: number; total: string }>;
}

export interface LedgerRepository {
  existsForTransaction(transactionId: string): Promise<boolean>;
  insert(entry: NewLedgerEntry): Promise<LedgerEntryRecord>;
  /** Oldest first unless `newestFirst` is set. */
  listByClient(
    clientId: string,
    options?: { limit?: number; newestFirst?: boolean },
  ): Promise<LedgerEntryRecord[]>;
  sumByClient(): Promise<Map<string, number>>;
  /** Sum of positive amounts and of absolute negative amounts. */
  totals(): Promise<{ earned: number; spent: number }>;
  deleteAll(): Promise<number>;
}

export interface EngineFailuresRepository {
  record(input: NewEngineFailure): Promise<EngineFailureRecord>;
  listUnresolved(
    engine?: EngineName,
    limit?: number,
  ): Promise<EngineFailureRecord[]>;
  markResolved(id: string, resolvedAt?: DbTimestamp): Promise<void>;
  countUnresolved(): Promise<Map<EngineName, number>>;
}

export interface StoreSession {
  readonly settings: SettingsRepository;
  readonly clients: ClientsRepository;
  readonly transactions: TransactionsRepository;
  readonly lineItems: LineItemsRepository;
  readonly ledger: LedgerRepository;
  readonly failures: EngineFailuresRepository;
  /**
   * Runs `action` so that its writes are undone on failure while the
   * surrounding transaction stays usable. The error is rethrown.
   */
  savepoint<T>(name: string, action: () => Promise<T>): Promise<T>;
  /**
   * Transaction-scoped lock on the hook switches. Writers take it shared
   * before reading them; whoever flips a switch takes it exclusive.
   */
  lockHookSwitches(mode: HookSwitchLockMode): Promise<void>;
}

export type HookSwitchLockMode = 'shared' | 'exclusive';

export type LockOutcome<T> =
  | { acquired: true; result: T }
  | { acquired: false };

export interface DataStore {
  transaction<T>(action: (session: StoreSession) => Promise<T>): Promise<T>;
  /** Cross-process mutual exclusion for long jobs spanning many transactions. */
  withExclusiveLock<T>(
    name: string,
    action: () => Promise<T>,
  ): Promise<LockOutcome<T>>;
}
