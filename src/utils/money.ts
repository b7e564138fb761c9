/**
 * Money helpers. Amounts travel as fixed-point decimal strings (the shape
 * postgres returns for `decimal` columns) and are added up in integer cents.
 */

export type Cents = number;

/** decimal(10,2): unit prices of products and order items. */
export const MIN_UNIT_PRICE_CENTS: Cents = 1;
export const MAX_UNIT_PRICE_CENTS: Cents = 9_999_999_999;
/** decimal(12,2): order totals. */
export const MAX_ORDER_TOTAL_CENTS: Cents = 999_999_999_999;

export const toCents = (amount: string | number): Cents =>
  Math.round(Number(amount) * 100);

export const fromCents = (cents: Cents): string => {
  const sign = cents < 0 ? "-" : "";
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, "0");
  return `${sign}${whole}.${fraction}`;
};

export const lineTotal = (unitPrice: string, quantity: number): Cents =>
  toCents(unitPrice) * quantity;

export const sumCents = (values: Cents[]): Cents =>
  values.reduce((sum, value) => sum + value, 0);

export const centsToNumber = (cents: Cents): number => cents / 100;

export const moneyToNumber = (amount: string): number =>
  centsToNumber(toCents(amount));
