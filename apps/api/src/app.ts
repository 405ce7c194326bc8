import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { DB } from '@yieldcast/engine';
import { fundRoutes } from './routes/funds.js';
import { projectionRoutes } from './routes/projections.js';
import { apiKeyAuth } from './middleware/auth.js';
import { toAppError } from './errors.js';

export const API_VERSION = '0.1.0';

export function createApp(db: DB) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    const appError = toAppError(err);
    if (appError.status >= 500) {
      console.error(err);
    }
    return c.json(
      {
        error: {
          code: appError.code,
          message: appError.message,
          suggestion: appError.suggestion,
        },
      },
      appError.status,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: API_VERSION }));

  app.use('/api/v1/*', apiKeyAuth());

  app.route('/api/v1/funds', fundRoutes(db));
  app.route('/api/v1/projections', projectionRoutes(db));

  return app;
}
