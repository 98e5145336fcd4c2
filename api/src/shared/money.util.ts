export type DecimalLike = string | number;

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d*))?$/;

/**
 * Integer division rounded half away from zero, the way PostgreSQL `ROUND`
 * treats numerics.
 */
export const roundHalfAwayFromZero = (
  numerator: number,
  denominator: number,
): number => {
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
    throw new RangeError(
      `roundHalfAwayFromZero expects integers, got ${numerator}/${denominator}`,
    );
  }
  if (denominator <= 0) {
    throw new RangeError('roundHalfAwayFromZero expects a positive divisor');
  }
  const quotient = Math.floor(
    (Math.abs(numerator) * 2 + denominator) / (denominator * 2),
  );
  if (quotient === 0) return 0;
  return numerator < 0 ? -quotient : quotient;
};

/**
 * Converts a decimal amount (major units, or a percentage) into integer
 * hundredths. Strings are parsed digit by digit so `"0.29"` never turns into
 * `28.999…`; anything past the second decimal rounds half away from zero.
 */
export const toHundredths = (value: DecimalLike): number => {
  const raw = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(raw);
  if (!match) {
    const num = Number(raw);
    if (raw !== '' && Number.isFinite(num)) {
      return Math.round(num * 100) || 0;
    }
    throw new RangeError(`Not a decimal amount: "${String(value)}"`);
  }
  const [, sign, whole, fraction = ''] = match;
  const digits = fraction.padEnd(3, '0');
  let hundredths = Number(whole) * 100 + Number(digits.slice(0, 2));
  if (Number(digits[2]) >= 5) hundredths += 1;
  if (!Number.isSafeInteger(hundredths)) {
    throw new RangeError(`Decimal amount out of range: "${raw}"`);
  }
  if (hundredths === 0) return 0;
  return sign === '-' ? -hundredths : hundredths;
};

export const toHundredthsOrZero = (
  value: DecimalLike | null | undefined,
): number => (value === null || value === undefined ? 0 : toHundredths(value));

export const formatHundredths = (hundredths: number): string => {
  const rounded = Math.round(hundredths);
  const abs = Math.abs(rounded);
  const whole = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, '0');
  return `${rounded < 0 ? '-' : ''}${whole}.${cents}`;
};

/** Reads a numeric column that stores integer minor units. */
export const parseMinorUnits = (
  value: string | number | null | undefined,
): number => {
  if (value === null || value === undefined || value === '') return 0;
  const num = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(num)) {
    throw new RangeError(`Not a numeric balance: "${String(value)}"`);
  }
  return Math.round(num) || 0;
};
