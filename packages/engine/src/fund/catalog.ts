import { readFileSync } from 'node:fs';
import { and, asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { DB } from '../db/index.js';
import { funds } from '../db/schema.js';
import { createFund } from './record.js';
import type { Fund, FundCatalogEntry, FundInput, SeedResult } from './types.js';

const DEFAULT_CATALOG_URL = new URL('../db/default-funds.json', import.meta.url);

const catalogSchema = z.object({
  funds: z.array(
    z.object({
      name: z.string().trim().min(1),
      annualRate: z.number().positive(),
      managementFee: z.number().min(0),
      minimumInvestment: z.number().min(0),
    }),
  ),
});

export type FundRow = typeof funds.$inferSelect;

export function fundFromRow(row: FundRow): Fund {
  return createFund({
    id: row.id,
    name: row.name,
    annualRate: row.annualRate,
    annualFeeRate: row.managementFee,
    minimumInvestment: row.minimumInvestment,
  });
}

export function listFunds(db: DB): Fund[] {
  return db
    .select()
    .from(funds)
    .where(eq(funds.isActive, true))
    .orderBy(asc(funds.name))
    .all()
    .map(fundFromRow);
}

export function getFund(db: DB, id: string): Fund | null {
  const row = db
    .select()
    .from(funds)
    .where(and(eq(funds.id, id), eq(funds.isActive, true)))
    .get();
  return row ? fundFromRow(row) : null;
}

/** Validates through createFund before anything is written. */
export function addFund(db: DB, input: FundInput, note?: string): Fund {
  const fund = createFund(input);
  const row = db
    .insert(funds)
    .values({
      name: fund.name,
      annualRate: fund.annualRate.toFixed(),
      managementFee: fund.annualFeeRate.toFixed(),
      minimumInvestment: fund.minimumInvestment.toFixed(),
      note: note ?? null,
    })
    .returning()
    .get();
  return fundFromRow(row);
}

export function deactivateFund(db: DB, id: string): boolean {
  const result = db
    .update(funds)
    .set({ isActive: false, updatedAt: new Date().toISOString() })
    .where(and(eq(funds.id, id), eq(funds.isActive, true)))
    .run();
  return result.changes > 0;
}

export function parseFundCatalog(raw: unknown): FundCatalogEntry[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid fund catalog: ${detail}`);
  }
  return parsed.data.funds;
}

export function readFundCatalog(path: string | URL): FundCatalogEntry[] {
  return parseFundCatalog(JSON.parse(readFileSync(path, 'utf-8')));
}

export function loadDefaultCatalog(): FundCatalogEntry[] {
  return readFundCatalog(DEFAULT_CATALOG_URL);
}

/** Inserts catalog entries whose name is not already stored. */
export function seedFunds(db: DB, entries: FundCatalogEntry[]): SeedResult {
  const result: SeedResult = { inserted: 0, skipped: [] };

  for (const entry of entries) {
    // createFund trims names, so look up the stored form
    const name = entry.name.trim();
    const existing = db.select({ id: funds.id }).from(funds).where(eq(funds.name, name)).get();
    if (existing) {
      result.skipped.push(name);
      continue;
    }
    addFund(db, {
      name,
      annualRate: entry.annualRate,
      annualFeeRate: entry.managementFee,
      minimumInvestment: entry.minimumInvestment,
    });
    result.inserted += 1;
  }

  return result;
}
