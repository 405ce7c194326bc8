import { createDb, DEFAULT_DB_PATH } from './index.js';
import { migrate } from './migrate.js';
import { loadDefaultCatalog, readFundCatalog, seedFunds } from '../fund/catalog.js';

const DB_PATH = process.env.YIELDCAST_DB_PATH ?? DEFAULT_DB_PATH;
const FUNDS_FILE = process.env.YIELDCAST_FUNDS_FILE;

const db = createDb(DB_PATH);
migrate(db);

const entries = FUNDS_FILE ? readFundCatalog(FUNDS_FILE) : loadDefaultCatalog();
const { inserted, skipped } = seedFunds(db, entries);

db.$client.close();

console.log('Setup complete. Database at', DB_PATH);
console.log(`Catalog:  ${FUNDS_FILE ?? 'bundled default funds'}`);
console.log(`Inserted: ${inserted}`);
if (skipped.length > 0) {
  console.log(`Skipped:  ${skipped.length} (already stored: ${skipped.join(', ')})`);
}
