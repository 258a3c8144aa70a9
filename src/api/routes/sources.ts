import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { CardDraftSchema, CreateSourceSchema, UpdateSourceSchema, parseInput } from '../../model/schema.js';
import { ORIGIN_KINDS, SOURCE_STATUSES } from '../../model/types.js';
import { StaticDrafter } from '../../drafting/drafter.js';
import { parsePagination, readJson } from './params.js';

const SourceListQuerySchema = z.object({
  status: z.enum(SOURCE_STATUSES).optional(),
  origin_kind: z.enum(ORIGIN_KINDS).optional(),
  tag: z.string().trim().min(1).optional(),
});

const GenerateBodySchema = z
  .object({ cards: z.array(CardDraftSchema).optional() })
  .nullable();

export function sourceRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sources — capture a source; re-imports of an external key return the existing one
  app.post('/sources', async (c) => {
    const input = parseInput(CreateSourceSchema, await readJson(c), 'source');
    const strict = c.req.query('strict');
    const result = ctx.lifecycle.createSource(input, {
      strict: strict === undefined ? undefined : strict === 'true' || strict === '1',
    });
    return c.json(result, result.created ? 201 : 200);
  });

  // GET /api/sources?status=&origin_kind=&tag=&page=&per_page=
  app.get('/sources', (c) => {
    const filter = parseInput(
      SourceListQuerySchema,
      { status: c.req.query('status'), origin_kind: c.req.query('origin_kind'), tag: c.req.query('tag') },
      'source filter',
    );
    const { page, per_page, limit, offset } = parsePagination(c);
    const { sources, total } = ctx.store.listSources({ ...filter, limit, offset });
    return c.json({ sources, total, page, per_page });
  });

  app.get('/sources/:id', (c) => {
    return c.json(ctx.lifecycle.getSource(c.req.param('id')));
  });

  app.patch('/sources/:id', async (c) => {
    const patch = parseInput(UpdateSourceSchema, await readJson(c), 'source update');
    return c.json(ctx.lifecycle.editSource(c.req.param('id'), patch));
  });

  // POST /api/sources/:id/generate-cards — body { cards?: CardDraft[] } bypasses the configured drafter
  app.post('/sources/:id/generate-cards', async (c) => {
    const body = parseInput(GenerateBodySchema, await readJson(c), 'generation request');
    const drafter = body?.cards ? new StaticDrafter(body.cards) : ctx.drafter;
    const result = await ctx.lifecycle.generateCards(c.req.param('id'), drafter);
    return c.json(result, 201);
  });

  app.post('/sources/:id/approve', (c) => {
    return c.json(ctx.lifecycle.approve(c.req.param('id')));
  });

  app.post('/sources/:id/archive', (c) => {
    return c.json(ctx.lifecycle.archive(c.req.param('id')));
  });

  return app;
}
