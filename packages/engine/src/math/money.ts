import Decimal from 'decimal.js';

const CURRENCY = 'KES';

/** Rounds to the smallest currency unit, half-up. */
export function roundMoney(amount: Decimal.Value): Decimal {
  return new Decimal(amount).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function toCents(amount: Decimal.Value): number {
  return new Decimal(amount).times(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

export function fromCents(amountCents: number): Decimal {
  return new Decimal(amountCents).div(100);
}

// Basis points to percentage (1691 bps = 16.91%)
export function fromBps(bps: number): Decimal {
  return new Decimal(bps).div(100);
}

export function formatMoney(amount: Decimal.Value): string {
  const rounded = roundMoney(amount);
  const isNegative = rounded.isNegative() && !rounded.isZero();
  const [whole, fraction] = rounded.abs().toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${isNegative ? '-' : ''}${CURRENCY} ${grouped}.${fraction}`;
}

export function formatPercent(value: Decimal.Value, places = 2): string {
  return `${new Decimal(value).toFixed(places, Decimal.ROUND_HALF_UP)}%`;
}
