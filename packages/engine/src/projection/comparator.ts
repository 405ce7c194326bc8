import type Decimal from 'decimal.js';
import { NoResultsFailure } from '../errors.js';
import { meetsMinimumInvestment } from '../fund/record.js';
import type { Fund } from '../fund/types.js';
import { formatMoney, formatPercent } from '../math/money.js';
import { project } from './engine.js';
import type {
  FundComparison,
  FundNotice,
  ProjectionParams,
  RankedFund,
  Recommendation,
} from './types.js';

function lowestMinimum(funds: Fund[]): Fund {
  return funds.reduce((low, fund) =>
    fund.minimumInvestment.lt(low.minimumInvestment) ? fund : low,
  );
}

function noResultsMessage(funds: Fund[], excluded: FundNotice[], capital: Decimal): string {
  if (funds.length === 0) {
    return 'No funds to compare';
  }
  if (excluded.length === funds.length) {
    const lowest = lowestMinimum(funds);
    return (
      `Initial capital of ${formatMoney(capital)} is below the minimum investment requirement. ` +
      `Lowest available option is ${formatMoney(lowest.minimumInvestment)} (${lowest.name})`
    );
  }
  return 'No valid results calculated for any fund';
}

/**
 * Projects every eligible fund under the same parameters and ranks them by
 * final balance, highest first. Funds above the initial capital's reach are
 * excluded; funds whose projection fails become warnings.
 */
export function compareFunds(funds: Fund[], params: ProjectionParams): FundComparison {
  const ranked: RankedFund[] = [];
  const excluded: FundNotice[] = [];
  const warnings: FundNotice[] = [];

  for (const fund of funds) {
    if (!meetsMinimumInvestment(fund, params.initialCapital)) {
      excluded.push({
        fund,
        reason:
          `Minimum investment of ${formatMoney(fund.minimumInvestment)} exceeds ` +
          `initial capital of ${formatMoney(params.initialCapital)}`,
      });
      continue;
    }

    const outcome = project(fund, params);
    if (outcome.ok) {
      ranked.push({ fund, result: outcome.result });
    } else {
      warnings.push({ fund, reason: outcome.error.message });
    }
  }

  if (ranked.length === 0) {
    throw new NoResultsFailure(noResultsMessage(funds, excluded, params.initialCapital));
  }

  // Array#sort is stable, so equal balances keep catalog order
  ranked.sort((a, b) => b.result.finalBalance.comparedTo(a.result.finalBalance));

  return { ranked, excluded, warnings };
}

export function recommendFund(comparison: FundComparison): Recommendation {
  const [best] = comparison.ranked;
  if (!best) {
    throw new NoResultsFailure('No ranked funds to recommend');
  }
  return {
    recommended: best.fund.name,
    explanation:
      `"${best.fund.name}" ends with the highest balance ` +
      `(${formatMoney(best.result.finalBalance)}, net return ${formatPercent(best.result.netReturnPercent)}).`,
  };
}
