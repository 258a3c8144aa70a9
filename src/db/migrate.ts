import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationOptions {
  /** Directory of numbered `.sql` files. Defaults to the bundled migrations. */
  dir?: string;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  /** Applied migrations whose file no longer matches the recorded checksum. */
  drifted: string[];
}

interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

interface MigrationRow {
  name: string;
  checksum: string | null;
}

function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function checksumOf(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function readMigrationFiles(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }

  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, sql, checksum: checksumOf(sql) };
    });
}

/**
 * Apply pending migrations in file-name order, each in its own transaction.
 * Already-applied files are compared against their recorded sha256; a
 * mismatch is logged and reported but never re-run.
 */
export function runMigrations(db: Database.Database, opts: MigrationOptions = {}): MigrationResult {
  ensureMigrationsTable(db);

  const recorded = new Map(
    db
      .prepare<[], MigrationRow>('SELECT name, checksum FROM _migrations')
      .all()
      .map((row): [string, string | null] => [row.name, row.checksum]),
  );
  const files = readMigrationFiles(opts.dir ?? defaultMigrationsDir());

  const applied: string[] = [];
  const skipped = [...recorded.keys()];
  const drifted: string[] = [];

  const insert = db.prepare<[string, string]>('INSERT INTO _migrations (name, checksum) VALUES (?, ?)');

  for (const file of files) {
    if (recorded.has(file.name)) {
      const checksum = recorded.get(file.name);
      if (checksum && checksum !== file.checksum) {
        drifted.push(file.name);
        logger.warn(
          { migration: file.name, recorded: checksum, current: file.checksum },
          'Applied migration has changed on disk',
        );
      }
      continue;
    }

    const runInTransaction = db.transaction(() => {
      db.exec(file.sql);
      insert.run(file.name, file.checksum);
    });

    try {
      runInTransaction();
      applied.push(file.name);
      logger.info({ migration: file.name }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${file.name}`, {
        migration: file.name,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { applied, skipped, drifted };
}
