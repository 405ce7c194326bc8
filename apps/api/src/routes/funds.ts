import { Hono } from 'hono';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import {
  type DB,
  type Fund,
  funds,
  addFund,
  deactivateFund,
  formatMoney,
  formatPercent,
  fromBps,
  fromCents,
  getFund,
  listFunds,
  toCents,
} from '@yieldcast/engine';
import { AppError, notFound, validationError } from '../errors.js';

const createFundSchema = z.object({
  name: z.string().trim().min(1),
  annualRateBps: z.number().int().positive(),
  managementFeeBps: z.number().int().min(0).default(0),
  minimumInvestmentCents: z.number().int().min(0).default(0),
  note: z.string().optional(),
});

export function formatFund(fund: Fund) {
  return {
    id: fund.id ?? null,
    name: fund.name,
    annualRate: fund.annualRate.toFixed(),
    annualRateFormatted: formatPercent(fund.annualRate, Math.max(2, fund.annualRate.decimalPlaces())),
    managementFee: fund.annualFeeRate.toFixed(),
    managementFeeFormatted: formatPercent(fund.annualFeeRate, Math.max(2, fund.annualFeeRate.decimalPlaces())),
    minimumInvestment: fund.minimumInvestment.toFixed(),
    minimumInvestmentCents: toCents(fund.minimumInvestment),
    minimumInvestmentFormatted: formatMoney(fund.minimumInvestment),
  };
}

export function fundRoutes(db: DB) {
  const router = new Hono();

  // GET / — list active funds
  router.get('/', (c) => c.json(listFunds(db).map(formatFund)));

  // POST / — add a fund to the catalog
  router.post('/', async (c) => {
    const body = await c.req.json();
    const parsed = createFundSchema.safeParse(body);
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const data = parsed.data;
    const existing = db.select({ id: funds.id }).from(funds).where(eq(funds.name, data.name)).get();
    if (existing) {
      throw new AppError('CONFLICT', `Fund '${data.name}' already exists`, 409, 'Choose a different fund name');
    }

    const created = addFund(
      db,
      {
        name: data.name,
        annualRate: fromBps(data.annualRateBps),
        annualFeeRate: fromBps(data.managementFeeBps),
        minimumInvestment: fromCents(data.minimumInvestmentCents),
      },
      data.note,
    );
    return c.json(formatFund(created), 201);
  });

  // GET /:id — fund details
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const fund = getFund(db, id);
    if (!fund) throw notFound('Fund', id);
    return c.json(formatFund(fund));
  });

  // DELETE /:id — soft delete
  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!deactivateFund(db, id)) throw notFound('Fund', id);
    return c.json({ success: true });
  });

  return router;
}
