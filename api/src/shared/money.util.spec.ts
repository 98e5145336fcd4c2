import {
  formatHundredths,
  parseMinorUnits,
  roundHalfAwayFromZero,
  toHundredths,
  toHundredthsOrZero,
} from './money.util';

describe('money.util', () => {
  describe('roundHalfAwayFromZero', () => {
    it('rounds halves away from zero in both directions', () => {
      expect(roundHalfAwayFromZero(5, 10)).toBe(1);
      expect(roundHalfAwayFromZero(-5, 10)).toBe(-1);
      expect(roundHalfAwayFromZero(15, 10)).toBe(2);
      expect(roundHalfAwayFromZero(-15, 10)).toBe(-2);
    });

    it('rounds below half towards zero', () => {
      expect(roundHalfAwayFromZero(4, 10)).toBe(0);
      expect(roundHalfAwayFromZero(14, 10)).toBe(1);
      expect(roundHalfAwayFromZero(-14, 10)).toBe(-1);
    });

    it('rejects fractions and non-positive divisors', () => {
      expect(() => roundHalfAwayFromZero(1.5, 1)).toThrow(RangeError);
      expect(() => roundHalfAwayFromZero(1, 0)).toThrow(RangeError);
    });
  });

  describe('toHundredths', () => {
    it('parses decimal strings digit by digit', () => {
      expect(toHundredths('0.29')).toBe(29);
      expect(toHundredths('100.00')).toBe(10000);
      expect(toHundredths('10')).toBe(1000);
      expect(toHundredths(' 12.3 ')).toBe(1230);
    });

    it('rounds the third decimal half away from zero', () => {
      expect(toHundredths('1.005')).toBe(101);
      expect(toHundredths('12.344')).toBe(1234);
      expect(toHundredths('-2.505')).toBe(-251);
    });

    it('accepts numbers and exponent notation', () => {
      expect(toHundredths(0.1)).toBe(10);
      expect(toHundredths('1e3')).toBe(100000);
    });

    it('never returns negative zero', () => {
      expect(Object.is(toHundredths('-0.00'), 0)).toBe(true);
    });

    it('rejects text that is not a number', () => {
      expect(() => toHundredths('abc')).toThrow(RangeError);
      expect(() => toHundredths('')).toThrow(RangeError);
    });

    it('treats null as zero in the OrZero variant', () => {
      expect(toHundredthsOrZero(null)).toBe(0);
      expect(toHundredthsOrZero(undefined)).toBe(0);
      expect(toHundredthsOrZero('7.50')).toBe(750);
    });
  });

  it('formatHundredths prints two decimals with the sign in front', () => {
    expect(formatHundredths(-500)).toBe('-5.00');
    expect(formatHundredths(5)).toBe('0.05');
    expect(formatHundredths(123456)).toBe('1234.56');
    expect(formatHundredths(0)).toBe('0.00');
  });

  it('parseMinorUnits reads numeric balance columns', () => {
    expect(parseMinorUnits(null)).toBe(0);
    expect(parseMinorUnits('1500')).toBe(1500);
    expect(parseMinorUnits('-500.00')).toBe(-500);
    expect(() => parseMinorUnits('x')).toThrow(RangeError);
  });
});
