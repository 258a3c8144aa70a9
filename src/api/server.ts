import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { RecallDeckError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { getRecallDeckDir } from '../shared/utils.js';
import { SqliteStore } from '../store/sqliteStore.js';
import { LifecycleController } from '../lifecycle/controller.js';
import { ReviewService } from '../review/reviewService.js';
import { LlmCardDrafter, type CardDrafter } from '../drafting/drafter.js';
import { RaindropClient } from '../sources/raindrop.js';
import { sourceRoutes } from './routes/sources.js';
import { cardRoutes } from './routes/cards.js';
import { tagRoutes } from './routes/tags.js';
import { systemRoutes } from './routes/system.js';
import { exportRoutes } from './routes/export.js';
import { syncRoutes } from './routes/sync.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  store: SqliteStore;
  lifecycle: LifecycleController;
  reviews: ReviewService;
  drafter: CardDrafter;
  raindrop: RaindropClient;
  clock: () => Date;
}

export interface ContextOptions {
  drafter?: CardDrafter;
  clock?: () => Date;
}

/**
 * Wire the store, lifecycle controller and review service over one database.
 */
export function buildContext(db: Database.Database, config: Config, opts: ContextOptions = {}): AppContext {
  const clock = opts.clock ?? (() => new Date());
  const store = new SqliteStore(db);
  return {
    db,
    config,
    store,
    clock,
    lifecycle: new LifecycleController(store, {
      clock,
      review: config.review,
      strictDedup: config.sources.strict_dedup,
    }),
    reviews: new ReviewService(store, { clock, review: config.review }),
    drafter: opts.drafter ?? LlmCardDrafter.fromConfig(config.drafting),
    raindrop: new RaindropClient(config.raindrop),
  };
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', systemRoutes(ctx));
  app.route('/api', sourceRoutes(ctx));
  app.route('/api', cardRoutes(ctx));
  app.route('/api', tagRoutes(ctx));
  app.route('/api', exportRoutes(ctx));
  app.route('/api', syncRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof RecallDeckError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'VALIDATION_ERROR':
    case 'INVALID_RATING':
    case 'CONFIG_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'INVALID_TRANSITION':
    case 'DUPLICATE_EXTERNAL_KEY':
    case 'CONFLICT':
      return 409;
    case 'EXPORT_ERROR':
      return 422;
    case 'DRAFTER_ERROR':
      return 502;
    case 'INTEGRATION_ERROR':
      return 503;
    default:
      return 500;
  }
}

/**
 * Create ~/.recalldeck/config.yaml on first run.
 */
function autoInit(): void {
  const configPath = path.join(getRecallDeckDir(), 'config.yaml');
  if (!fs.existsSync(configPath) && !process.env['RECALLDECK_CONFIG']) {
    writeDefaultConfig(configPath);
    logger.info('First run: created ~/.recalldeck/config.yaml');
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(config.db.path);
  runMigrations(db);

  const app = createApp(buildContext(db, config));

  logger.info({ port, host }, 'Starting RecallDeck server');

  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}/api/health` }, 'RecallDeck server listening');
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
