import type { TransactionRecord } from '../../core/database/entities';
import {
  formatHundredths,
  toHundredths,
  toHundredthsOrZero,
  type DecimalLike,
} from '../../shared/money.util';

/** max(line_total - payed_sum - payed_bonus, 0) in hundredths; null payments count as 0. */
export const computeDiscountHundredths = (
  lineTotal: DecimalLike,
  payedSum: DecimalLike | null,
  payedBonus: DecimalLike | null,
): number =>
  Math.max(
    toHundredths(lineTotal) -
      toHundredthsOrZero(payedSum) -
      toHundredthsOrZero(payedBonus),
    0,
  );

export const computeDiscount = (
  lineTotal: DecimalLike,
  payedSum: DecimalLike | null,
  payedBonus: DecimalLike | null,
): string => formatHundredths(computeDiscountHundredths(lineTotal, payedSum, payedBonus));

const sameAmount = (a: string | null, b: string | null) => {
  if (a === null || b === null) return a === b;
  return toHundredths(a) === toHundredths(b);
};

/** Payment fields compared the way `IS DISTINCT FROM` does: null differs from 0. */
export const paymentsChanged = (
  previous: Pick<TransactionRecord, 'payedSum' | 'payedBonus'>,
  next: Pick<TransactionRecord, 'payedSum' | 'payedBonus'>,
): boolean =>
  !sameAmount(previous.payedSum, next.payedSum) ||
  !sameAmount(previous.payedBonus, next.payedBonus);
