import Decimal from 'decimal.js';
import { addMonths, monthLabel } from '../calendar/months.js';
import { CalculationFailure } from '../errors.js';
import type { Fund } from '../fund/types.js';
import { settlePeriod } from './settlement.js';
import type {
  BalancePoint,
  DailyBalance,
  PeriodResult,
  PeriodSummary,
  ProjectionOutcome,
  ProjectionParams,
  ProjectionResult,
} from './types.js';

function assertConsistent(period: PeriodResult): void {
  if (!period.closingBalance.isFinite() || !period.interest.isFinite()) {
    throw new Error(`non-finite balance in ${period.label}`);
  }
  if (period.interest.isNegative()) {
    throw new Error(`negative interest ${period.interest.toString()} in ${period.label}`);
  }
}

function runProjection(fund: Fund, params: ProjectionParams): ProjectionResult {
  let balance = params.initialCapital;
  let totalInterest = new Decimal(0);
  let totalFees = new Decimal(0);
  let totalContributed = params.initialCapital;
  let currentDate = params.startDate;

  const balances: BalancePoint[] = [{ label: monthLabel(currentDate), balance }];
  const periods: PeriodSummary[] = [];
  const dailySeries: DailyBalance[] = [];

  for (let month = 0; month < params.horizonMonths; month++) {
    const period = settlePeriod(fund, params, currentDate, month, balance);
    assertConsistent(period);

    balance = period.closingBalance;
    totalInterest = totalInterest.plus(period.interest);
    totalFees = totalFees.plus(period.fee);
    if (month > 0) {
      totalContributed = totalContributed.plus(params.monthlyContribution);
    }

    const { daily, ...summary } = period;
    periods.push(summary);
    if (params.includeDailySeries) {
      dailySeries.push(...daily);
    }

    currentDate = addMonths(currentDate, 1);
    balances.push({ label: monthLabel(currentDate), balance });
  }

  const netReturnPercent = totalContributed.isZero()
    ? 0
    : balance.minus(totalContributed).div(totalContributed).times(100).toNumber();

  return Object.freeze({
    fundName: fund.name,
    finalBalance: balance,
    totalInterest,
    totalFees,
    totalContributed,
    netReturnPercent,
    balances: Object.freeze(balances),
    periods: Object.freeze(periods),
    ...(params.includeDailySeries ? { dailySeries: Object.freeze(dailySeries) } : {}),
  });
}

/**
 * Projects one fund across the whole horizon. Errors raised while projecting
 * come back as a CalculationFailure naming the fund instead of being thrown.
 */
export function project(fund: Fund, params: ProjectionParams): ProjectionOutcome {
  try {
    return { ok: true, result: runProjection(fund, params) };
  } catch (err) {
    return { ok: false, error: new CalculationFailure(fund.name, err) };
  }
}
