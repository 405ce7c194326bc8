import type { DB } from './index.js';

export function migrate(db: DB): void {
  db.$client.exec(`
    CREATE TABLE IF NOT EXISTS funds (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      annual_rate TEXT NOT NULL,
      management_fee TEXT NOT NULL DEFAULT '0',
      minimum_investment TEXT NOT NULL DEFAULT '0',
      note TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_funds_active ON funds(is_active);
  `);
}
