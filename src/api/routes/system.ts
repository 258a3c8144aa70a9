import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { parseInput } from '../../model/schema.js';
import { LlmClient } from '../../drafting/client.js';
import { readJson } from './params.js';

const VERSION = '0.1.0';

const StatusBodySchema = z.object({ status: z.string().trim().min(1) });

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — basic health check with entity counts
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime(),
      sources: ctx.store.listSources({ limit: 0 }).total,
      cards: ctx.store.listCards({ limit: 0 }).total,
      due: ctx.reviews.listDue({ limit: 0 }).total_due,
    });
  });

  // GET /api/health/services — reachability of the drafting model and Raindrop
  app.get('/health/services', async (c) => {
    const [drafter, raindrop] = await Promise.all([
      new LlmClient(ctx.config.drafting).checkAvailable(),
      ctx.raindrop.testConnection(),
    ]);
    return c.json({
      drafter,
      raindrop: { ok: raindrop.connected, message: raindrop.message },
    });
  });

  // POST /api/status/:id — change the status of a source or card by id
  app.post('/status/:id', async (c) => {
    const { status } = parseInput(StatusBodySchema, await readJson(c), 'status change');
    return c.json(ctx.lifecycle.setStatus(c.req.param('id'), status));
  });

  return app;
}
