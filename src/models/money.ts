/**
 * Fixed-point money.
 *
 * Amounts travel through payloads as integer minor units (two decimal places)
 * so that canonical signing never sees a binary float.
 */

export interface Money {
  readonly minor: number;
  readonly currency: string;
}

export const DEFAULT_CURRENCY = 'INR';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

/**
 * Convert a major-unit amount to integer minor units.
 *
 * Decimal strings are converted digit by digit, so `"0.29"` is exactly 29.
 * The third decimal rounds half away from zero. Returns undefined when the
 * input is not a finite number or a plain decimal string.
 */
export function toMinorUnits(value: unknown): number | undefined {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    return toMinorUnits(value.toFixed(3));
  }
  if (typeof value !== 'string') return undefined;

  const match = DECIMAL_PATTERN.exec(value.trim().replace(/,/g, ''));
  if (!match) return undefined;

  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0').slice(0, 2));
  const roundUp = fraction.length > 2 && Number(fraction[2]) >= 5 ? 1 : 0;
  const minor = cents + roundUp;
  return sign === '-' ? -minor : minor;
}

export function money(amount: unknown, currency: string = DEFAULT_CURRENCY): Money {
  return { minor: toMinorUnits(amount) ?? 0, currency };
}

export function zero(currency: string = DEFAULT_CURRENCY): Money {
  return { minor: 0, currency };
}

export function addMoney(a: Money, b: Money): Money {
  if (a.currency !== b.currency) {
    throw new RangeError(`Cannot add ${b.currency} to ${a.currency}`);
  }
  return { minor: a.minor + b.minor, currency: a.currency };
}

/**
 * Render minor units as a fixed two-decimal string, e.g. 123450 -> "1234.50"
 */
export function formatMinor(minor: number): string {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const cents = String(abs % 100).padStart(2, '0');
  return `${sign}${Math.floor(abs / 100)}.${cents}`;
}

export function formatMoney(value: Money): string {
  return `${value.currency} ${formatMinor(value.minor)}`;
}

export interface CostSplit {
  basePrice: Money;
  taxes: Money;
  fees: Money;
  total: Money;
}

/**
 * Split a total into base/taxes/fees at 85/10/5 percent. Taxes and fees are
 * rounded to the nearest minor unit; base takes the remainder so the parts
 * always sum to the total.
 */
export function splitTotal(total: Money): CostSplit {
  const taxes = Math.round(total.minor * 0.1);
  const fees = Math.round(total.minor * 0.05);
  return {
    basePrice: { minor: total.minor - taxes - fees, currency: total.currency },
    taxes: { minor: taxes, currency: total.currency },
    fees: { minor: fees, currency: total.currency },
    total,
  };
}
