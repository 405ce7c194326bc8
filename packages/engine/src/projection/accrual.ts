import Decimal from 'decimal.js';

/** Nominal annual percentage over a fixed 365-day year, as a fraction. */
export function dailyRate(annualRatePercent: Decimal.Value): Decimal {
  return new Decimal(annualRatePercent).div(365).div(100);
}

/** One day's interest on `balance`, net of withholding tax. Unrounded. */
export function accrueDay(
  balance: Decimal.Value,
  rate: Decimal.Value,
  withholdingTaxPercent: Decimal.Value,
): Decimal {
  const gross = new Decimal(balance).times(rate);
  return gross.times(new Decimal(1).minus(new Decimal(withholdingTaxPercent).div(100)));
}
