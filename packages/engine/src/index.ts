export { createDb, schema, DEFAULT_DB_PATH } from './db/index.js';
export type { DB } from './db/index.js';
export { funds } from './db/schema.js';
export { migrate } from './db/migrate.js';

export { ConstructionError, CalculationFailure, NoResultsFailure } from './errors.js';

export { roundMoney, toCents, fromCents, fromBps, formatMoney, formatPercent } from './math/money.js';
export { isIsoDate, daysInMonth, addMonths, addDays, monthLabel } from './calendar/months.js';

export type { Fund, FundInput, FundCatalogEntry, SeedResult } from './fund/types.js';
export { createFund, meetsMinimumInvestment } from './fund/record.js';
export type { FundRow } from './fund/catalog.js';
export {
  fundFromRow,
  listFunds,
  getFund,
  addFund,
  deactivateFund,
  parseFundCatalog,
  readFundCatalog,
  loadDefaultCatalog,
  seedFunds,
} from './fund/catalog.js';

export type {
  InterestRounding,
  ProjectionParams,
  ProjectionParamsInput,
  DailyBalance,
  PeriodSummary,
  PeriodResult,
  BalancePoint,
  ProjectionResult,
  ProjectionOutcome,
  RankedFund,
  FundNotice,
  FundComparison,
  Recommendation,
} from './projection/types.js';
export { createProjectionParams } from './projection/params.js';
export { dailyRate, accrueDay } from './projection/accrual.js';
export { computeManagementFee, settlePeriod } from './projection/settlement.js';
export { project } from './projection/engine.js';
export { compareFunds, recommendFund } from './projection/comparator.js';
