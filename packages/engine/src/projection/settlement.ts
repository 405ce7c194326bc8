import Decimal from 'decimal.js';
import { addDays, daysInMonth, monthLabel } from '../calendar/months.js';
import type { Fund } from '../fund/types.js';
import { roundMoney } from '../math/money.js';
import { accrueDay, dailyRate } from './accrual.js';
import type { DailyBalance, PeriodResult, ProjectionParams } from './types.js';

/**
 * Monthly management fee on the average of the opening and pre-fee closing
 * balances, rounded half-up to the cent.
 */
export function computeManagementFee(
  openingBalance: Decimal.Value,
  closingBalance: Decimal.Value,
  annualFeeRate: Decimal.Value,
): Decimal {
  const averageBalance = new Decimal(openingBalance).plus(closingBalance).div(2);
  return roundMoney(averageBalance.times(annualFeeRate).div(100).div(12));
}

/**
 * Settles one calendar period: contribution first (every period but the
 * first), then one accrual per actual day of the start date's month, then the
 * management fee.
 */
export function settlePeriod(
  fund: Fund,
  params: ProjectionParams,
  startDate: string,
  periodIndex: number,
  openingBalance: Decimal,
): PeriodResult {
  const days = daysInMonth(startDate);
  const rate = dailyRate(fund.annualRate);

  const contribution = periodIndex > 0 ? params.monthlyContribution : new Decimal(0);
  let balance = openingBalance.plus(contribution);
  let interest = new Decimal(0);
  const daily: DailyBalance[] = [];

  for (let day = 0; day < days; day++) {
    let dayInterest = accrueDay(balance, rate, params.withholdingTaxPercent);
    if (params.interestRounding === 'cent') {
      dayInterest = roundMoney(dayInterest);
    }
    balance = balance.plus(dayInterest);
    interest = interest.plus(dayInterest);
    daily.push({ date: addDays(startDate, day), balance, interest: dayInterest });
  }

  let fee = new Decimal(0);
  if (params.applyManagementFee) {
    fee = computeManagementFee(openingBalance, balance, fund.annualFeeRate);
    balance = balance.minus(fee);
  }

  return {
    label: monthLabel(startDate),
    startDate,
    days,
    openingBalance,
    contribution,
    interest,
    fee,
    closingBalance: balance,
    daily,
  };
}
