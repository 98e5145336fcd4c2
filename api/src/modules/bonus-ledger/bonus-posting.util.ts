import type {
  NewLedgerEntry,
  TransactionRecord,
} from '../../core/database/entities';
import {
  formatHundredths,
  roundHalfAwayFromZero,
  toHundredths,
  toHundredthsOrZero,
} from '../../shared/money.util';
import type { BonusSystemConfig } from '../settings/bonus-config';

export type BonusAmounts = {
  /** Minor units, > 0 only when the sale earns bonus. */
  earnedMinor: number;
  /** Minor units paid with bonus. */
  spentMinor: number;
  /** Percent in hundredths (5% -> 500). */
  percentHundredths: number;
};

export type PlannedPosting = {
  entries: NewLedgerEntry[];
  balanceBefore: number;
  balanceAfter: number;
};

export type PostableTransaction = TransactionRecord & {
  clientId: string;
  dateClose: string;
};

export const spendDescription = (transactionId: string) =>
  `Оплата бонусами за транзакцію #${transactionId}`;

export const earnDescription = (
  percentHundredths: number,
  transactionId: string,
) =>
  `Нарахування ${formatHundredths(percentHundredths)}% бонусів за транзакцію #${transactionId}`;

/** Client and closing time present, closed on or after the start date. */
export const hasPostingPrerequisites = (
  tx: TransactionRecord,
  startDate: string,
): tx is PostableTransaction =>
  tx.clientId !== null &&
  tx.dateClose !== null &&
  tx.dateClose.slice(0, 10) >= startDate;

export const isEligibleForBonus = (
  tx: TransactionRecord,
  config: BonusSystemConfig,
): tx is PostableTransaction =>
  config.enabled && hasPostingPrerequisites(tx, config.startDate);

/**
 * earned = round(sum * percent / 100, 2), spent = payed_bonus, both in minor
 * units. Integer hundredths throughout: sum_minor * percent_h / 10000 is the
 * earned amount in minor units before rounding.
 */
export const computeBonusAmounts = (tx: TransactionRecord): BonusAmounts => {
  const percentHundredths = toHundredths(tx.bonusPercent);
  const sumMinor = toHundredths(tx.sum);
  const earnedMinor =
    percentHundredths > 0
      ? roundHalfAwayFromZero(sumMinor * percentHundredths, 10_000)
      : 0;
  return {
    earnedMinor,
    spentMinor: toHundredthsOrZero(tx.payedBonus),
    percentHundredths,
  };
};

/** SPEND first, then EARN, each chained on the running balance. */
export const planPosting = (
  tx: PostableTransaction,
  balanceBefore: number,
): PlannedPosting => {
  const { earnedMinor, spentMinor, percentHundredths } =
    computeBonusAmounts(tx);
  const entries: NewLedgerEntry[] = [];
  let balance = balanceBefore;
  if (spentMinor > 0) {
    entries.push({
      clientId: tx.clientId,
      transactionId: tx.transactionId,
      operationType: 'SPEND',
      amount: -spentMinor,
      balanceBefore: balance,
      balanceAfter: balance - spentMinor,
      description: spendDescription(tx.transactionId),
      bonusPercent: null,
      transactionSum: null,
      processedAt: tx.dateClose,
    });
    balance -= spentMinor;
  }
  if (earnedMinor > 0) {
    entries.push({
      clientId: tx.clientId,
      transactionId: tx.transactionId,
      operationType: 'EARN',
      amount: earnedMinor,
      balanceBefore: balance,
      balanceAfter: balance + earnedMinor,
      description: earnDescription(percentHundredths, tx.transactionId),
      bonusPercent: formatHundredths(percentHundredths),
      transactionSum: tx.sum,
      processedAt: tx.dateClose,
    });
    balance += earnedMinor;
  }
  return { entries, balanceBefore, balanceAfter: balance };
};
