#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getRecallDeckDir, resolvePath, truncate } from '../shared/utils.js';
import { RecallDeckError } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { buildContext, startServer, type AppContext } from '../api/server.js';
import {
  CardDraftSchema,
  CardStatusSchema,
  PositiveIntSchema,
  SourceStatusSchema,
  parseInput,
} from '../model/schema.js';
import { ORIGIN_KINDS, type Card, type Source } from '../model/types.js';
import { StaticDrafter, type CardDrafter } from '../drafting/drafter.js';
import { exportToVault } from '../export/exporter.js';
import { syncRaindropHighlights } from '../sources/raindrop.js';

const program = new Command();

program
  .name('recall-deck')
  .description('Turn captured highlights into spaced-repetition flashcards')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Initialize RecallDeck: create config and database')
  .action(async () => {
    const configPath = path.join(getRecallDeckDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log('✓ ~/.recalldeck/config.yaml created');
    } else {
      log('✓ ~/.recalldeck/config.yaml already exists');
    }

    const config = await loadConfig();
    const db = initDb(config.db.path);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${config.db.path} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${config.db.path} already up to date`);
    }
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check system health: config, database, drafter')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run recall-deck init)');
      } else {
        try {
          const ctx = buildContext(initDb(dbPath), config);
          const { drifted } = runMigrations(ctx.db);
          results.push(drifted.length > 0 ? `DB: ok (changed migrations: ${drifted.join(', ')})` : 'DB: ok');
          results.push(`Sources: ${ctx.store.listSources({ limit: 0 }).total}`);
          results.push(`Cards: ${ctx.store.listCards({ limit: 0 }).total}`);
          results.push(`Due: ${ctx.reviews.listDue({ limit: 0 }).total_due}`);
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        } finally {
          closeDb();
        }
      }

      results.push(config.drafting.base_url && config.drafting.model ? 'Drafter: configured' : 'Drafter: (unconfigured)');
      results.push(config.export.vault_path ? `Export: ${config.export.vault_path}` : 'Export: (no vault)');
      results.push(config.raindrop.token ? 'Raindrop: configured' : 'Raindrop: (no token)');
    } catch (err) {
      results.unshift(`Config: error (${errorMessage(err)})`);
    }

    log(`✓ ${results.join(' | ')}`);
  });

// === source ===
const sourceCmd = program.command('source').description('Capture and manage sources');

sourceCmd
  .command('add <text>')
  .description('Capture a highlight or note as a source')
  .option('-u, --url <url>', 'Origin URL')
  .option('-t, --title <title>', 'Origin title')
  .option('-k, --kind <kind>', `Origin kind (${ORIGIN_KINDS.join(', ')})`, 'manual_entry')
  .option('--key <externalKey>', 'External key for de-duplication')
  .option('--tag <name>', 'Tag (repeatable)', collect, [])
  .option('--strict', 'Fail instead of returning an existing source with the same key')
  .action(
    async (
      text: string,
      opts: { url?: string; title?: string; kind: string; key?: string; tag: string[]; strict?: boolean },
    ) => {
      await withContext((ctx) => {
        const { source, created } = ctx.lifecycle.createSource(
          {
            text,
            origin_kind: parseInput(z.enum(ORIGIN_KINDS), opts.kind, 'origin kind'),
            origin_url: opts.url,
            origin_title: opts.title,
            external_key: opts.key,
            tags: opts.tag,
          },
          { strict: opts.strict },
        );
        log(created ? `✓ Source captured: ${source.id}` : `Source already captured: ${source.id}`);
      });
    },
  );

sourceCmd
  .command('list')
  .description('List sources')
  .option('-s, --status <status>', 'Filter by status')
  .option('--tag <name>', 'Filter by tag')
  .option('-l, --limit <n>', 'Max sources to show', '50')
  .action(async (opts: { status?: string; tag?: string; limit: string }) => {
    await withContext((ctx) => {
      const status = opts.status ? parseInput(SourceStatusSchema, opts.status, 'source status') : undefined;
      const { sources, total } = ctx.store.listSources({ status, tag: opts.tag, limit: parseLimit(opts.limit) });

      if (sources.length === 0) {
        log('No sources. Use: recall-deck source add <text>');
        return;
      }
      for (const s of sources) {
        log(formatSource(s));
      }
      log(`\n${sources.length} of ${total} sources`);
    });
  });

sourceCmd
  .command('generate <sourceId>')
  .description('Draft cards for a source with the configured LLM, or from a JSON file')
  .option('-f, --file <path>', 'JSON file with an array of { front, back, hint?, tags? }')
  .action(async (sourceId: string, opts: { file?: string }) => {
    await withContextAsync(async (ctx) => {
      const drafter: CardDrafter = opts.file ? new StaticDrafter(readDraftFile(opts.file)) : ctx.drafter;
      log('Drafting cards...');
      const { cards, superseded } = await ctx.lifecycle.generateCards(sourceId, drafter);
      for (const card of cards) {
        log(formatCard(card));
      }
      log(`\n✓ ${cards.length} drafts stored${superseded > 0 ? `, ${superseded} earlier drafts replaced` : ''}`);
    });
  });

sourceCmd
  .command('approve <sourceId>')
  .description('Approve a source and activate its draft cards')
  .action(async (sourceId: string) => {
    await withContext((ctx) => {
      const { activated } = ctx.lifecycle.approve(sourceId);
      log(`✓ Source approved, ${activated.length} cards activated`);
    });
  });

sourceCmd
  .command('archive <sourceId>')
  .description('Archive a source')
  .action(async (sourceId: string) => {
    await withContext((ctx) => {
      ctx.lifecycle.archive(sourceId);
      log(`✓ Source archived: ${sourceId}`);
    });
  });

// === card ===
const cardCmd = program.command('card').description('Create and manage cards');

cardCmd
  .command('add <front> <back>')
  .description('Create a card by hand (active immediately unless --draft)')
  .option('--hint <hint>', 'Hint shown before the answer')
  .option('-s, --source <sourceId>', 'Link to a source')
  .option('--tag <name>', 'Tag (repeatable)', collect, [])
  .option('--draft', 'Keep the card as a draft')
  .action(
    async (front: string, back: string, opts: { hint?: string; source?: string; tag: string[]; draft?: boolean }) => {
      await withContext((ctx) => {
        const card = ctx.lifecycle.createCard({
          front,
          back,
          hint: opts.hint,
          source_id: opts.source,
          tags: opts.tag,
          activate: !opts.draft,
        });
        log(`✓ Card created: ${card.id} (${card.status})`);
      });
    },
  );

cardCmd
  .command('list')
  .description('List cards')
  .option('-s, --status <status>', 'Filter by status')
  .option('--source <sourceId>', 'Filter by source')
  .option('--tag <name>', 'Filter by tag')
  .option('-l, --limit <n>', 'Max cards to show', '50')
  .action(async (opts: { status?: string; source?: string; tag?: string; limit: string }) => {
    await withContext((ctx) => {
      const status = opts.status ? parseInput(CardStatusSchema, opts.status, 'card status') : undefined;
      const { cards, total } = ctx.store.listCards({
        status,
        source_id: opts.source,
        tag: opts.tag,
        limit: parseLimit(opts.limit),
      });

      if (cards.length === 0) {
        log('No cards.');
        return;
      }
      for (const card of cards) {
        log(formatCard(card));
      }
      log(`\n${cards.length} of ${total} cards`);
    });
  });

cardCmd
  .command('status <id> <status>')
  .description('Change the status of a card or source by id')
  .action(async (id: string, status: string) => {
    await withContext((ctx) => {
      const result = ctx.lifecycle.setStatus(id, status);
      const current = result.kind === 'source' ? result.source.status : result.card.status;
      log(`✓ ${result.kind} ${id} is now ${current}`);
    });
  });

// === due ===
program
  .command('due')
  .description('List cards due for review')
  .option('--tag <name>', 'Only cards with this tag')
  .option('-l, --limit <n>', 'Max cards to show', '20')
  .action(async (opts: { tag?: string; limit: string }) => {
    await withContext((ctx) => {
      const { cards, total_due } = ctx.reviews.listDue({ tag: opts.tag, limit: parseLimit(opts.limit) });
      for (const card of cards) {
        log(formatCard(card));
      }
      log(`\n${total_due} cards due`);
    });
  });

// === review ===
program
  .command('review <cardId> <rating>')
  .description('Rate a card: again, hard, good or easy (or 0-3)')
  .option('--time <ms>', 'Response time in milliseconds')
  .action(async (cardId: string, rating: string, opts: { time?: string }) => {
    await withContext((ctx) => {
      const value = /^\d+$/.test(rating) ? parseInt(rating, 10) : rating;
      const time = opts.time !== undefined ? Number(opts.time) : undefined;
      const { card } = ctx.reviews.submitReview(cardId, value, time);
      log(`✓ Next review in ${card.interval_days} day(s) at ${card.next_review ?? '-'} (ease ${card.ease_factor})`);
    });
  });

// === history ===
program
  .command('history <cardId>')
  .description('Show the review log of a card')
  .action(async (cardId: string) => {
    await withContext((ctx) => {
      const logs = ctx.reviews.history(cardId);
      if (logs.length === 0) {
        log('No reviews yet.');
        return;
      }
      for (const entry of logs) {
        log(
          `${entry.reviewed_at}  ${entry.rating.padEnd(5)}  ` +
            `${entry.interval_before}d → ${entry.interval_after}d  ease ${entry.ease_before} → ${entry.ease_after}`,
        );
      }
    });
  });

// === sync ===
program
  .command('sync')
  .description('Import new Raindrop.io highlights as pending sources')
  .option('--since <iso>', 'Only highlights created after this ISO timestamp')
  .action(async (opts: { since?: string }) => {
    const since = opts.since
      ? parseInput(z.string().datetime({ offset: true }), opts.since, 'since')
      : undefined;
    await withContextAsync(async (ctx) => {
      const result = await syncRaindropHighlights(ctx.raindrop, ctx.lifecycle, {
        since: since ? new Date(since) : undefined,
      });
      log(`✓ ${result.message} (${result.skipped_duplicates} already imported, ${result.total_highlights} total)`);
    });
  });

// === export ===
program
  .command('export')
  .description('Export approved sources and their cards as markdown notes')
  .option('--vault <path>', 'Vault directory (defaults to export.vault_path)')
  .option('--folder <name>', 'Folder inside the vault (defaults to export.folder)')
  .action(async (opts: { vault?: string; folder?: string }) => {
    await withContext((ctx) => {
      const result = exportToVault(ctx.store, {
        vault_path: opts.vault ?? ctx.config.export.vault_path,
        folder: opts.folder ?? ctx.config.export.folder,
      });
      log(`✓ ${result.sources_exported} sources and ${result.cards_exported} cards written to ${result.export_path}`);
    });
  });

// === server ===
program
  .command('server')
  .description('Start the API server')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer({
      port: opts.port ? parseInput(PositiveIntSchema.max(65535), opts.port, 'port') : undefined,
    });
  });

// ================================================================
// Helpers
// ================================================================

async function openContext(): Promise<{ ctx: AppContext; cleanup: () => void }> {
  const config: Config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run recall-deck init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);
  return { ctx: buildContext(db, config), cleanup: closeDb };
}

async function withContext(fn: (ctx: AppContext) => void): Promise<void> {
  const { ctx, cleanup } = await openContext();
  try {
    fn(ctx);
  } finally {
    cleanup();
  }
}

async function withContextAsync(fn: (ctx: AppContext) => Promise<void>): Promise<void> {
  const { ctx, cleanup } = await openContext();
  try {
    await fn(ctx);
  } finally {
    cleanup();
  }
}

function readDraftFile(file: string): z.infer<typeof CardDraftSchema>[] {
  const raw: unknown = JSON.parse(fs.readFileSync(resolvePath(file), 'utf-8'));
  return parseInput(z.array(CardDraftSchema), raw, 'card draft file');
}

function parseLimit(value: string): number {
  return parseInput(PositiveIntSchema, value, 'limit');
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function formatSource(s: Source): string {
  const tags = s.tags.length > 0 ? `  [${s.tags.map((t) => t.name).join(', ')}]` : '';
  return `${s.id}  ${s.status.padEnd(15)} ${String(s.card_count).padStart(3)} cards  ${truncate(s.origin_title ?? s.text, 50)}${tags}`;
}

function formatCard(card: Card): string {
  const due = card.next_review ? card.next_review.slice(0, 10) : '-';
  return `${card.id}  ${card.status.padEnd(9)} due ${due.padEnd(10)}  ${truncate(card.front, 60)}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  const prefix = err instanceof RecallDeckError ? `✗ [${err.code}]` : '✗';
  // eslint-disable-next-line no-console
  console.error(`${prefix} ${errorMessage(err)}`);
  process.exitCode = 1;
});
