import type { Hono } from 'hono';
import { createDb, migrate, type DB } from '@yieldcast/engine';

export function createMigratedDb(): DB {
  const db = createDb(':memory:');
  migrate(db);
  return db;
}

export interface ErrorBody {
  error: { code: string; message: string; suggestion: string };
}

export async function api<T>(app: Hono, method: string, path: string, body?: unknown) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json' },
  };
  if (body !== undefined) init.body = JSON.stringify(body);
  const res = await app.request(path, init);
  return { status: res.status, data: (await res.json()) as T };
}
