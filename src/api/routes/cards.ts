import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { CreateCardSchema, UpdateCardSchema, parseInput } from '../../model/schema.js';
import { CARD_STATUSES } from '../../model/types.js';
import { parsePagination, readJson } from './params.js';

const CardListQuerySchema = z.object({
  status: z.enum(CARD_STATUSES).optional(),
  source_id: z.string().min(1).optional(),
  tag: z.string().trim().min(1).optional(),
});

const DueQuerySchema = z.object({
  tag: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const ReviewBodySchema = z.object({
  rating: z.unknown(),
  response_time_ms: z.unknown().optional(),
});

export function cardRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/cards/due?tag=&limit= — registered before /cards/:id
  app.get('/cards/due', (c) => {
    const query = parseInput(DueQuerySchema, { tag: c.req.query('tag'), limit: c.req.query('limit') }, 'due query');
    return c.json(ctx.reviews.listDue(query));
  });

  app.get('/cards', (c) => {
    const filter = parseInput(
      CardListQuerySchema,
      { status: c.req.query('status'), source_id: c.req.query('source_id'), tag: c.req.query('tag') },
      'card filter',
    );
    const { page, per_page, limit, offset } = parsePagination(c);
    const { cards, total } = ctx.store.listCards({ ...filter, limit, offset });
    return c.json({ cards, total, page, per_page });
  });

  app.post('/cards', async (c) => {
    const input = parseInput(CreateCardSchema, await readJson(c), 'card');
    return c.json(ctx.lifecycle.createCard(input), 201);
  });

  app.get('/cards/:id', (c) => {
    return c.json(ctx.lifecycle.getCard(c.req.param('id')));
  });

  app.patch('/cards/:id', async (c) => {
    const patch = parseInput(UpdateCardSchema, await readJson(c), 'card update');
    return c.json(ctx.lifecycle.editCard(c.req.param('id'), patch));
  });

  app.delete('/cards/:id', (c) => {
    ctx.lifecycle.deleteCard(c.req.param('id'));
    return c.json({ ok: true });
  });

  // POST /api/cards/:id/review — body { rating, response_time_ms? }
  app.post('/cards/:id/review', async (c) => {
    const body = parseInput(ReviewBodySchema, (await readJson(c)) ?? {}, 'review');
    const { card, log } = ctx.reviews.submitReview(c.req.param('id'), body.rating, body.response_time_ms);
    return c.json({ card, log });
  });

  app.get('/cards/:id/history', (c) => {
    const id = c.req.param('id');
    return c.json({ card_id: id, reviews: ctx.reviews.history(id) });
  });

  return app;
}
