import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { NotFoundError } from '../../shared/errors.js';
import { TagCreateSchema, parseInput } from '../../model/schema.js';
import { readJson } from './params.js';

export function tagRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/tags', (c) => {
    return c.json(ctx.store.listTags());
  });

  // POST /api/tags — body { name, color? }
  app.post('/tags', async (c) => {
    const input = parseInput(TagCreateSchema, await readJson(c), 'tag');
    return c.json(ctx.lifecycle.createTag(input), 201);
  });

  app.get('/tags/:id', (c) => {
    const id = c.req.param('id');
    const tag = ctx.store.getTag(id);
    if (!tag) throw new NotFoundError('tag', id);
    return c.json(tag);
  });

  app.get('/tags/:id/stats', (c) => {
    const id = c.req.param('id');
    const tag = ctx.store.getTag(id);
    if (!tag) throw new NotFoundError('tag', id);
    return c.json({ tag, ...ctx.store.tagStats(id) });
  });

  app.delete('/tags/:id', (c) => {
    const id = c.req.param('id');
    if (!ctx.store.deleteTag(id)) throw new NotFoundError('tag', id);
    return c.json({ ok: true });
  });

  return app;
}
