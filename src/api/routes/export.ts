import fs from 'node:fs';
import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { parseInput } from '../../model/schema.js';
import { exportToVault } from '../../export/exporter.js';
import { resolvePath } from '../../shared/utils.js';
import { readJson } from './params.js';

const ExportBodySchema = z
  .object({
    vault_path: z.string().trim().min(1).optional(),
    folder: z.string().trim().min(1).optional(),
  })
  .nullable();

export function exportRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/export — body { vault_path?, folder? } overrides the configured target
  app.post('/export', async (c) => {
    const body = parseInput(ExportBodySchema, await readJson(c), 'export request');
    const result = exportToVault(
      ctx.store,
      {
        vault_path: body?.vault_path ?? ctx.config.export.vault_path,
        folder: body?.folder ?? ctx.config.export.folder,
      },
      ctx.clock(),
    );
    return c.json(result);
  });

  // GET /api/export/obsidian/status — whether the configured vault can take an export
  app.get('/export/obsidian/status', (c) => {
    const { vault_path, folder } = ctx.config.export;
    if (!vault_path) {
      return c.json({ configured: false, message: 'Export vault path is not configured (export.vault_path)' });
    }
    const path = resolvePath(vault_path);
    if (!fs.existsSync(path)) {
      return c.json({ configured: true, path, exists: false, message: `Vault path does not exist: ${path}` });
    }
    return c.json({ configured: true, path, exists: true, learnings_folder: folder, message: 'Ready to export' });
  });

  return app;
}
