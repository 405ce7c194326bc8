import { Hono } from 'hono';
import { z } from 'zod';
import {
  type DB,
  type Fund,
  type ProjectionParams,
  type ProjectionResult,
  compareFunds,
  createProjectionParams,
  formatMoney,
  formatPercent,
  fromBps,
  fromCents,
  getFund,
  listFunds,
  project,
  recommendFund,
  toCents,
} from '@yieldcast/engine';
import { calculationFailed, notFound, validationError } from '../errors.js';
import { formatFund } from './funds.js';

const paramsSchema = z.object({
  initialCapitalCents: z.number().int().positive(),
  monthlyContributionCents: z.number().int().min(0).default(0),
  horizonMonths: z.number().int().positive().max(600),
  withholdingTaxBps: z.number().int().min(0).max(10000),
  applyManagementFee: z.boolean().default(true),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  interestRounding: z.enum(['none', 'cent']).default('none'),
  includeDailySeries: z.boolean().default(false),
});

const projectRequestSchema = paramsSchema.extend({
  fundId: z.string().min(1),
});

const compareRequestSchema = paramsSchema.extend({
  fundIds: z.array(z.string().min(1)).min(1).max(50).optional(),
});

function today(): string {
  return new Date().toISOString().split('T')[0];
}

function toParams(data: z.infer<typeof paramsSchema>): ProjectionParams {
  return createProjectionParams({
    initialCapital: fromCents(data.initialCapitalCents),
    monthlyContribution: fromCents(data.monthlyContributionCents),
    horizonMonths: data.horizonMonths,
    withholdingTaxPercent: fromBps(data.withholdingTaxBps),
    applyManagementFee: data.applyManagementFee,
    startDate: data.startDate ?? today(),
    interestRounding: data.interestRounding,
    includeDailySeries: data.includeDailySeries,
  });
}

function requireFund(db: DB, id: string): Fund {
  const fund = getFund(db, id);
  if (!fund) throw notFound('Fund', id);
  return fund;
}

function formatProjection(result: ProjectionResult) {
  return {
    fundName: result.fundName,
    finalBalanceCents: toCents(result.finalBalance),
    finalBalanceFormatted: formatMoney(result.finalBalance),
    totalInterestCents: toCents(result.totalInterest),
    totalInterestFormatted: formatMoney(result.totalInterest),
    totalFeesCents: toCents(result.totalFees),
    totalFeesFormatted: formatMoney(result.totalFees),
    totalContributedCents: toCents(result.totalContributed),
    totalContributedFormatted: formatMoney(result.totalContributed),
    netReturnPercent: result.netReturnPercent,
    netReturnFormatted: formatPercent(result.netReturnPercent),
    balances: result.balances.map((point) => ({
      label: point.label,
      balanceCents: toCents(point.balance),
      balanceFormatted: formatMoney(point.balance),
    })),
    periods: result.periods.map((period) => ({
      label: period.label,
      startDate: period.startDate,
      days: period.days,
      openingBalanceCents: toCents(period.openingBalance),
      contributionCents: toCents(period.contribution),
      interestCents: toCents(period.interest),
      feeCents: toCents(period.fee),
      closingBalanceCents: toCents(period.closingBalance),
    })),
    ...(result.dailySeries
      ? {
          dailySeries: result.dailySeries.map((day) => ({
            date: day.date,
            balanceCents: toCents(day.balance),
            interestCents: toCents(day.interest),
          })),
        }
      : {}),
  };
}

export function projectionRoutes(db: DB) {
  const router = new Hono();

  // POST / — project a single catalog fund
  router.post('/', async (c) => {
    const body = await c.req.json();
    const parsed = projectRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const fund = requireFund(db, parsed.data.fundId);
    const outcome = project(fund, toParams(parsed.data));
    if (!outcome.ok) {
      throw calculationFailed(outcome.error.message);
    }

    return c.json({ fund: formatFund(fund), ...formatProjection(outcome.result) });
  });

  // POST /compare — rank catalog funds under one parameter set
  router.post('/compare', async (c) => {
    const body = await c.req.json();
    const parsed = compareRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const params = toParams(parsed.data);
    const candidates = parsed.data.fundIds
      ? parsed.data.fundIds.map((id) => requireFund(db, id))
      : listFunds(db);

    const comparison = compareFunds(candidates, params);
    for (const warning of comparison.warnings) {
      console.warn(`Warning: could not project ${warning.fund.name}: ${warning.reason}`);
    }

    return c.json({
      ranked: comparison.ranked.map((entry, idx) => ({
        rank: idx + 1,
        fund: formatFund(entry.fund),
        ...formatProjection(entry.result),
      })),
      excluded: comparison.excluded.map((notice) => ({
        fund: formatFund(notice.fund),
        reason: notice.reason,
      })),
      warnings: comparison.warnings.map((notice) => ({
        fund: formatFund(notice.fund),
        reason: notice.reason,
      })),
      ...recommendFund(comparison),
    });
  });

  return router;
}
