import Decimal from 'decimal.js';
import { ConstructionError } from '../errors.js';
import type { Fund, FundInput } from './types.js';

function toDecimal(value: Decimal.Value, field: string, fundName: string): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw new ConstructionError(`Invalid ${field} for fund ${fundName}: ${String(value)}`);
  }
  if (!parsed.isFinite()) {
    throw new ConstructionError(`Invalid ${field} for fund ${fundName}: ${String(value)}`);
  }
  return parsed;
}

/**
 * Builds a frozen Fund record. Values outside their ranges throw
 * ConstructionError; nothing is clamped.
 */
export function createFund(input: FundInput): Fund {
  const name = input.name.trim();
  if (!name) {
    throw new ConstructionError('Fund name must be a non-empty string');
  }

  const annualRate = toDecimal(input.annualRate, 'rate', name);
  if (annualRate.lte(0)) {
    throw new ConstructionError(`Invalid rate for fund ${name}: must be greater than 0`);
  }

  const annualFeeRate = toDecimal(input.annualFeeRate, 'management fee', name);
  if (annualFeeRate.isNegative()) {
    throw new ConstructionError(`Invalid management fee for fund ${name}: must not be negative`);
  }

  const minimumInvestment = toDecimal(input.minimumInvestment, 'minimum investment', name);
  if (minimumInvestment.isNegative()) {
    throw new ConstructionError(`Invalid minimum investment for fund ${name}: must not be negative`);
  }

  const fund: Fund = {
    ...(input.id !== undefined ? { id: input.id } : {}),
    name,
    annualRate,
    annualFeeRate,
    minimumInvestment,
  };
  return Object.freeze(fund);
}

export function meetsMinimumInvestment(fund: Fund, capital: Decimal): boolean {
  return fund.minimumInvestment.lte(capital);
}
