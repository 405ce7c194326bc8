import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { computeManagementFee, settlePeriod } from '../src/projection/settlement.js';
import { createProjectionParams } from '../src/projection/params.js';
import { createFund } from '../src/fund/record.js';
import type { ProjectionParamsInput } from '../src/projection/types.js';

// 36.5% a year is exactly 0.1% a day
const flatFund = createFund({
  name: 'Flat',
  annualRate: 36.5,
  annualFeeRate: 1.2,
  minimumInvestment: 0,
});

function params(overrides: Partial<ProjectionParamsInput> = {}) {
  return createProjectionParams({
    initialCapital: 1000,
    monthlyContribution: 0,
    horizonMonths: 1,
    withholdingTaxPercent: 0,
    applyManagementFee: false,
    startDate: '2024-01-01',
    ...overrides,
  });
}

describe('computeManagementFee', () => {
  it('charges a twelfth of the annual fee on the average balance', () => {
    expect(computeManagementFee('1000', '1200', '1.2').toString()).toBe('1.1');
  });

  it('rounds half a cent up', () => {
    expect(computeManagementFee('1000', '1000', '0.006').toString()).toBe('0.01');
  });
});

describe('settlePeriod', () => {
  it('walks every day of a leap February', () => {
    const result = settlePeriod(
      flatFund,
      params({ withholdingTaxPercent: 100, applyManagementFee: true }),
      '2024-02-01',
      0,
      new Decimal(1200),
    );

    expect(result.label).toBe('February 2024');
    expect(result.days).toBe(29);
    expect(result.daily).toHaveLength(29);
    expect(result.daily[0].date).toBe('2024-02-01');
    expect(result.daily[28].date).toBe('2024-02-29');
    expect(result.contribution.toString()).toBe('0');
    expect(result.interest.toString()).toBe('0');
    expect(result.fee.toString()).toBe('1.2');
    expect(result.closingBalance.toString()).toBe('1198.8');
  });

  it('adds the contribution after the first period and charges the fee on the pre-contribution opening', () => {
    const result = settlePeriod(
      flatFund,
      params({ monthlyContribution: 500, withholdingTaxPercent: 100, applyManagementFee: true }),
      '2024-04-01',
      1,
      new Decimal(1000),
    );

    expect(result.contribution.toString()).toBe('500');
    expect(result.openingBalance.toString()).toBe('1000');
    // ((1000 + 1500) / 2) * 1.2% / 12
    expect(result.fee.toString()).toBe('1.25');
    expect(result.closingBalance.toString()).toBe('1498.75');
  });

  it('skips the contribution in the first period', () => {
    const result = settlePeriod(
      flatFund,
      params({ monthlyContribution: 500, withholdingTaxPercent: 100 }),
      '2024-01-01',
      0,
      new Decimal(1000),
    );
    expect(result.contribution.isZero()).toBe(true);
    expect(result.closingBalance.toString()).toBe('1000');
  });

  it('compounds daily on the running balance', () => {
    const result = settlePeriod(flatFund, params(), '2024-01-01', 0, new Decimal(1000));

    expect(result.daily[0].interest.toString()).toBe('1');
    expect(result.daily[0].balance.toString()).toBe('1001');
    expect(result.daily[1].interest.toString()).toBe('1.001');
    expect(result.daily[1].balance.toString()).toBe('1002.001');
    expect(result.fee.isZero()).toBe(true);
    expect(result.closingBalance.toNumber()).toBeCloseTo(1000 * 1.001 ** 31, 8);
  });

  it('reports interest equal to the sum of its daily entries', () => {
    const result = settlePeriod(
      flatFund,
      params({ withholdingTaxPercent: 15, applyManagementFee: true }),
      '2024-03-01',
      0,
      new Decimal('2500.55'),
    );

    const summed = result.daily.reduce((acc, day) => acc.plus(day.interest), new Decimal(0));
    expect(summed.eq(result.interest)).toBe(true);
    expect(
      result.openingBalance.plus(result.contribution).plus(result.interest).minus(result.fee).toNumber(),
    ).toBeCloseTo(result.closingBalance.toNumber(), 10);
  });

  it('keeps full precision on daily interest by default', () => {
    const result = settlePeriod(flatFund, params(), '2024-01-01', 0, new Decimal(1005));
    expect(result.daily[0].interest.toString()).toBe('1.005');
  });

  it('rounds each day to the cent under the cent policy', () => {
    const result = settlePeriod(
      flatFund,
      params({ interestRounding: 'cent' }),
      '2024-01-01',
      0,
      new Decimal(1005),
    );
    expect(result.daily[0].interest.toString()).toBe('1.01');
    expect(result.daily[0].balance.toString()).toBe('1006.01');
    // 1006.01 * 0.001 = 1.00601
    expect(result.daily[1].interest.toString()).toBe('1.01');
  });
});
