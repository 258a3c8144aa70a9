import { z } from 'zod';
import type { Context } from 'hono';
import { parseInput } from '../../model/schema.js';

export const PaginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(200).default(50),
});

export interface Pagination {
  page: number;
  per_page: number;
  limit: number;
  offset: number;
}

export function parsePagination(c: Context): Pagination {
  const { page, per_page } = parseInput(
    PaginationSchema,
    { page: c.req.query('page'), per_page: c.req.query('per_page') },
    'pagination',
  );
  return { page, per_page, limit: per_page, offset: (page - 1) * per_page };
}

/**
 * Read the JSON body, or null when it is absent or not JSON. Schema
 * validation downstream reports the problem.
 */
export async function readJson(c: Context): Promise<unknown> {
  return c.req.json<unknown>().catch(() => null);
}
