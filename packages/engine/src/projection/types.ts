import type Decimal from 'decimal.js';
import type { CalculationFailure } from '../errors.js';
import type { Fund } from '../fund/types.js';

/**
 * How each day's after-tax interest is carried into the balance.
 * `none` keeps full precision; `cent` rounds every day half-up to the cent.
 */
export type InterestRounding = 'none' | 'cent';

export interface ProjectionParams {
  readonly initialCapital: Decimal;
  readonly monthlyContribution: Decimal;
  readonly horizonMonths: number;
  readonly withholdingTaxPercent: Decimal;
  readonly applyManagementFee: boolean;
  /** First day of the first period, `YYYY-MM-DD`. */
  readonly startDate: string;
  readonly interestRounding: InterestRounding;
  readonly includeDailySeries: boolean;
}

export interface ProjectionParamsInput {
  initialCapital: Decimal.Value;
  monthlyContribution?: Decimal.Value;
  horizonMonths: number;
  withholdingTaxPercent: Decimal.Value;
  applyManagementFee: boolean;
  startDate: string;
  interestRounding?: InterestRounding;
  includeDailySeries?: boolean;
}

export interface DailyBalance {
  date: string;
  balance: Decimal;
  interest: Decimal;
}

export interface PeriodSummary {
  label: string;
  startDate: string;
  days: number;
  openingBalance: Decimal;
  contribution: Decimal;
  interest: Decimal;
  fee: Decimal;
  closingBalance: Decimal;
}

export interface PeriodResult extends PeriodSummary {
  daily: DailyBalance[];
}

export interface BalancePoint {
  label: string;
  balance: Decimal;
}

export interface ProjectionResult {
  readonly fundName: string;
  readonly finalBalance: Decimal;
  readonly totalInterest: Decimal;
  readonly totalFees: Decimal;
  readonly totalContributed: Decimal;
  readonly netReturnPercent: number;
  readonly balances: readonly BalancePoint[];
  readonly periods: readonly PeriodSummary[];
  readonly dailySeries?: readonly DailyBalance[];
}

export type ProjectionOutcome =
  | { ok: true; result: ProjectionResult }
  | { ok: false; error: CalculationFailure };

export interface RankedFund {
  fund: Fund;
  result: ProjectionResult;
}

export interface FundNotice {
  fund: Fund;
  reason: string;
}

export interface FundComparison {
  ranked: RankedFund[];
  excluded: FundNotice[];
  warnings: FundNotice[];
}

export interface Recommendation {
  recommended: string;
  explanation: string;
}
