import { describe, it, expect } from 'vitest';
import { addDays, addMonths, daysInMonth, isIsoDate, monthLabel } from '../src/calendar/months.js';

describe('daysInMonth', () => {
  it('counts February in leap and common years', () => {
    expect(daysInMonth('2024-02-10')).toBe(29);
    expect(daysInMonth('2023-02-01')).toBe(28);
  });

  it('applies the leap rules to early years', () => {
    expect(daysInMonth('1900-02-01')).toBe(28);
    // Year 0 is a leap year; 1900 is not
    expect(daysInMonth('0000-02-01')).toBe(29);
    expect(addDays('0000-02-28', 1)).toBe('0000-02-29');
  });

  it('counts 30 and 31 day months', () => {
    expect(daysInMonth('2024-04-30')).toBe(30);
    expect(daysInMonth('2024-12-05')).toBe(31);
  });
});

describe('addMonths', () => {
  it('clamps Jan 31 to the end of February', () => {
    expect(addMonths('2024-01-31', 1)).toBe('2024-02-29');
    expect(addMonths('2023-01-31', 1)).toBe('2023-02-28');
  });

  it('carries the clamped day when advanced one month at a time', () => {
    expect(addMonths(addMonths('2024-01-31', 1), 1)).toBe('2024-03-29');
    expect(addMonths(addMonths('2023-01-31', 1), 1)).toBe('2023-03-28');
  });

  it('rolls over the year', () => {
    expect(addMonths('2024-11-15', 2)).toBe('2025-01-15');
  });

  it('moves backwards', () => {
    expect(addMonths('2024-03-15', -3)).toBe('2023-12-15');
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
  });
});

describe('monthLabel', () => {
  it('names the month and year', () => {
    expect(monthLabel('2024-01-15')).toBe('January 2024');
    expect(monthLabel('2025-12-01')).toBe('December 2025');
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('accepts dates before 1900', () => {
    expect(isIsoDate('1899-12-31')).toBe(true);
  });

  it('rejects impossible or malformed dates', () => {
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-13-01')).toBe(false);
    expect(isIsoDate('2024-1-01')).toBe(false);
  });
});
