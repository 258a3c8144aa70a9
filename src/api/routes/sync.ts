import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { parseInput } from '../../model/schema.js';
import { syncRaindropHighlights } from '../../sources/raindrop.js';

const SyncQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
});

export function syncRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sync/raindrop?since=<iso> — import new Raindrop highlights as pending sources
  app.post('/sync/raindrop', async (c) => {
    const { since } = parseInput(SyncQuerySchema, { since: c.req.query('since') }, 'sync query');
    const result = await syncRaindropHighlights(ctx.raindrop, ctx.lifecycle, {
      since: since ? new Date(since) : undefined,
    });
    return c.json(result);
  });

  // GET /api/sync/raindrop/status
  app.get('/sync/raindrop/status', async (c) => {
    return c.json(await ctx.raindrop.testConnection());
  });

  return app;
}
