export const BONUS_OPERATION_TYPES = ['EARN', 'SPEND', 'ADJUST', 'EXPIRE'] as const;
export type BonusOperationType = (typeof BONUS_OPERATION_TYPES)[number];

/**
 * PostgreSQL `timestamp` (without time zone) as the server prints it,
 * e.g. `2025-09-02 14:05:00`. Kept verbatim so the calendar date of a sale
 * never shifts with the process time zone.
 */
export type DbTimestamp = string;

export type ClientRecord = {
  clientId: string;
  firstname: string | null;
  lastname: string | null;
  phone: string | null;
  /** Running bonus balance in minor units. */
  bonus: number;
  createdAt: DbTimestamp;
  updatedAt: DbTimestamp;
};

export type NewClient = {
  clientId: string;
  firstname?: string | null;
  lastname?: string | null;
  phone?: string | null;
};

/** Money columns stay decimal strings in major units (`numeric(10,2)`). */
export type TransactionRecord = {
  transactionId: string;
  clientId: string | null;
  spotId: string | null;
  dateClose: DbTimestamp | null;
  sum: string;
  payedSum: string | null;
  payedBonus: string | null;
  bonusPercent: string;
  discount: string;
  createdAt: DbTimestamp;
  updatedAt: DbTimestamp;
};

export type NewTransaction = {
  transactionId: string;
  clientId?: string | null;
  spotId?: string | null;
  dateClose?: DbTimestamp | null;
  sum: string;
  payedSum?: string | null;
  payedBonus?: string | null;
  bonusPercent?: string;
};

export type TransactionPatch = Partial<
  Pick<
    TransactionRecord,
    | 'clientId'
    | 'spotId'
    | 'dateClose'
    | 'sum'
    | 'payedSum'
    | 'payedBonus'
    | 'bonusPercent'
  >
>;

export type LineItemRecord = {
  id: string;
  transactionId: string;
  productId: string | null;
  quantity: string;
  sum: string;
  createdAt: DbTimestamp;
  updatedAt: DbTimestamp;
};

export type NewLineItem = {
  transactionId: string;
  productId?: string | null;
  quantity?: string;
  sum: string;
};

export type LineItemPatch = Partial<
  Pick<LineItemRecord, 'productId' | 'quantity' | 'sum'>
>;

export type LedgerEntryRecord = {
  id: string;
  clientId: string;
  transactionId: string | null;
  operationType: BonusOperationType;
  /** Signed, minor units. */
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  description: string | null;
  bonusPercent: string | null;
  transactionSum: string | null;
  processedAt: DbTimestamp;
  createdAt: DbTimestamp;
  updatedAt: DbTimestamp;
};

export type NewLedgerEntry = Omit<
  LedgerEntryRecord,
  'id' | 'createdAt' | 'updatedAt' | 'processedAt'
> & {
  /** Defaults to the insert time when the event has no timestamp of its own. */
  processedAt: DbTimestamp | null;
};

export type SettingRecord = {
  key: string;
  value: string;
  description: string | null;
  createdAt: DbTimestamp;
  updatedAt: DbTimestamp;
};

export type EngineName = 'bonus' | 'discount';

export type EngineFailureRecord = {
  id: string;
  engine: EngineName;
  transactionId: string | null;
  eventType: string;
  errorMessage: string;
  createdAt: DbTimestamp;
  resolvedAt: DbTimestamp | null;
};

export type NewEngineFailure = Pick<
  EngineFailureRecord,
  'engine' | 'transactionId' | 'eventType' | 'errorMessage'
>;

/** Position of the bulk bonus recompute in `(date_close, transaction_id)` order. */
export type BonusCursor = {
  dateClose: DbTimestamp;
  transactionId: string;
};

export type LineItemTotals = {
  transactionId: string;
  lineTotal: string;
  payedSum: string | null;
  payedBonus: string | null;
  discount: string;
};
