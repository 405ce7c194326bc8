import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const funds = sqliteTable('funds', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  name: text('name').notNull().unique(),
  // Decimal strings, stored at full precision
  annualRate: text('annual_rate').notNull(),
  managementFee: text('management_fee').notNull().default('0'),
  minimumInvestment: text('minimum_investment').notNull().default('0'),
  note: text('note'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_funds_active').on(table.isActive),
]);
