import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { createFund, meetsMinimumInvestment } from '../src/fund/record.js';
import { ConstructionError } from '../src/errors.js';

const valid = {
  name: '  Example Fund  ',
  annualRate: 16.91,
  annualFeeRate: '0.85',
  minimumInvestment: 1000,
};

describe('createFund', () => {
  it('builds a frozen record with decimal fields', () => {
    const fund = createFund(valid);
    expect(fund.name).toBe('Example Fund');
    expect(fund.annualRate.toString()).toBe('16.91');
    expect(fund.annualFeeRate.toString()).toBe('0.85');
    expect(fund.minimumInvestment.toString()).toBe('1000');
    expect(fund.id).toBeUndefined();
    expect(Object.isFrozen(fund)).toBe(true);
  });

  it('keeps the catalog id', () => {
    expect(createFund({ ...valid, id: 'fund-1' }).id).toBe('fund-1');
  });

  it('accepts a zero fee and a zero minimum investment', () => {
    const fund = createFund({ ...valid, annualFeeRate: 0, minimumInvestment: 0 });
    expect(fund.annualFeeRate.isZero()).toBe(true);
    expect(fund.minimumInvestment.isZero()).toBe(true);
  });

  it('rejects an empty name', () => {
    expect(() => createFund({ ...valid, name: '   ' })).toThrow(ConstructionError);
  });

  it('rejects a rate that is not positive', () => {
    expect(() => createFund({ ...valid, annualRate: 0 })).toThrow('Invalid rate for fund Example Fund');
    expect(() => createFund({ ...valid, annualRate: -1 })).toThrow(ConstructionError);
  });

  it('rejects a rate that is not a number', () => {
    expect(() => createFund({ ...valid, annualRate: 'abc' })).toThrow(ConstructionError);
  });

  it('rejects a negative fee', () => {
    expect(() => createFund({ ...valid, annualFeeRate: -0.1 })).toThrow(
      'Invalid management fee for fund Example Fund',
    );
  });

  it('rejects a negative minimum investment', () => {
    expect(() => createFund({ ...valid, minimumInvestment: -1 })).toThrow(
      'Invalid minimum investment for fund Example Fund',
    );
  });
});

describe('meetsMinimumInvestment', () => {
  it('allows capital equal to the minimum', () => {
    const fund = createFund(valid);
    expect(meetsMinimumInvestment(fund, new Decimal(1000))).toBe(true);
    expect(meetsMinimumInvestment(fund, new Decimal('999.99'))).toBe(false);
  });
});
