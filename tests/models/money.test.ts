/**
 * Money Tests
 */

import { describe, it, expect } from 'vitest';
import {
  addMoney,
  formatMinor,
  formatMoney,
  money,
  splitTotal,
  toMinorUnits,
  zero,
} from '../../src/models/money.js';

describe('toMinorUnits', () => {
  it('should_convertDecimalStringsExactly_when_parsing', () => {
    expect(toMinorUnits('0.29')).toBe(29);
    expect(toMinorUnits('1234.5')).toBe(123450);
    expect(toMinorUnits('20000')).toBe(2000000);
    expect(toMinorUnits(' 1,500.00 ')).toBe(150000);
  });

  it('should_roundThirdDecimalHalfAwayFromZero_when_present', () => {
    expect(toMinorUnits('0.125')).toBe(13);
    expect(toMinorUnits('0.124')).toBe(12);
    expect(toMinorUnits('-0.125')).toBe(-13);
  });

  it('should_convertNumbers_when_finite', () => {
    expect(toMinorUnits(0.1 + 0.2)).toBe(30);
    expect(toMinorUnits(3500)).toBe(350000);
  });

  it('should_returnUndefined_when_notAnAmount', () => {
    expect(toMinorUnits(Number.NaN)).toBeUndefined();
    expect(toMinorUnits('about 500')).toBeUndefined();
    expect(toMinorUnits(null)).toBeUndefined();
  });
});

describe('money helpers', () => {
  it('should_defaultToZeroInr_when_amountInvalid', () => {
    expect(money('free')).toEqual({ minor: 0, currency: 'INR' });
    expect(zero('USD')).toEqual({ minor: 0, currency: 'USD' });
  });

  it('should_addSameCurrency_when_currenciesMatch', () => {
    expect(addMoney(money(10, 'USD'), money('2.50', 'USD'))).toEqual({ minor: 1250, currency: 'USD' });
  });

  it('should_throw_when_currenciesDiffer', () => {
    expect(() => addMoney(money(1, 'USD'), money(1, 'INR'))).toThrow('Cannot add INR to USD');
  });

  it('should_formatTwoDecimals_when_rendering', () => {
    expect(formatMinor(123450)).toBe('1234.50');
    expect(formatMinor(5)).toBe('0.05');
    expect(formatMinor(-150)).toBe('-1.50');
    expect(formatMoney(money('20000'))).toBe('INR 20000.00');
  });
});

describe('splitTotal', () => {
  it('should_splitEightyFiveTenFive_when_totalEven', () => {
    const split = splitTotal(money(20000));

    expect(split.taxes.minor).toBe(200000);
    expect(split.fees.minor).toBe(100000);
    expect(split.basePrice.minor).toBe(1700000);
  });

  it('should_keepPartsSummingToTotal_when_rounding', () => {
    const split = splitTotal({ minor: 333, currency: 'INR' });

    // taxes round(33.3) = 33, fees round(16.65) = 17
    expect(split.taxes.minor).toBe(33);
    expect(split.fees.minor).toBe(17);
    expect(split.basePrice.minor + split.taxes.minor + split.fees.minor).toBe(333);
  });
});
