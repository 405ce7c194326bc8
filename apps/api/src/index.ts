import { serve } from '@hono/node-server';
import { db } from './db.js';
import { API_VERSION, createApp } from './app.js';

const app = createApp(db);
const port = parseInt(process.env.PORT ?? '3000');

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Yieldcast API v${API_VERSION} → http://localhost:${info.port}`);
});
