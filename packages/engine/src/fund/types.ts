import type Decimal from 'decimal.js';

/** One investable fund. Rates are percentages (16.91 means 16.91% a year). */
export interface Fund {
  readonly id?: string;
  readonly name: string;
  readonly annualRate: Decimal;
  readonly annualFeeRate: Decimal;
  readonly minimumInvestment: Decimal;
}

export interface FundInput {
  id?: string;
  name: string;
  annualRate: Decimal.Value;
  annualFeeRate: Decimal.Value;
  minimumInvestment: Decimal.Value;
}

export interface FundCatalogEntry {
  name: string;
  annualRate: number;
  managementFee: number;
  minimumInvestment: number;
}

export interface SeedResult {
  inserted: number;
  skipped: string[];
}
