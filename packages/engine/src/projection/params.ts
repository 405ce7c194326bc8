import Decimal from 'decimal.js';
import { isIsoDate } from '../calendar/months.js';
import { ConstructionError } from '../errors.js';
import type { ProjectionParams, ProjectionParamsInput } from './types.js';

function toDecimal(value: Decimal.Value, field: string): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw new ConstructionError(`${field} must be a number, got ${String(value)}`);
  }
  if (!parsed.isFinite()) {
    throw new ConstructionError(`${field} must be a finite number`);
  }
  return parsed;
}

export function createProjectionParams(input: ProjectionParamsInput): ProjectionParams {
  const initialCapital = toDecimal(input.initialCapital, 'Initial capital');
  if (initialCapital.lte(0)) {
    throw new ConstructionError('Initial capital must be positive');
  }

  const monthlyContribution = toDecimal(input.monthlyContribution ?? 0, 'Monthly contribution');
  if (monthlyContribution.isNegative()) {
    throw new ConstructionError('Monthly contribution cannot be negative');
  }

  if (!Number.isInteger(input.horizonMonths) || input.horizonMonths <= 0) {
    throw new ConstructionError('Investment period must be a positive whole number of months');
  }

  const withholdingTaxPercent = toDecimal(input.withholdingTaxPercent, 'Withholding tax');
  if (withholdingTaxPercent.isNegative() || withholdingTaxPercent.gt(100)) {
    throw new ConstructionError('Withholding tax must be between 0 and 100');
  }

  if (!isIsoDate(input.startDate)) {
    throw new ConstructionError(`Start date must be a calendar date (YYYY-MM-DD), got ${input.startDate}`);
  }

  return Object.freeze({
    initialCapital,
    monthlyContribution,
    horizonMonths: input.horizonMonths,
    withholdingTaxPercent,
    applyManagementFee: input.applyManagementFee,
    startDate: input.startDate,
    interestRounding: input.interestRounding ?? 'none',
    includeDailySeries: input.includeDailySeries ?? false,
  });
}
