import { createDb, migrate, DEFAULT_DB_PATH, type DB } from '@yieldcast/engine';

const dbPath = process.env.YIELDCAST_DB_PATH ?? DEFAULT_DB_PATH;
export const db: DB = createDb(dbPath);
migrate(db);
