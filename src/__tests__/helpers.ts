import Database from 'better-sqlite3';
import { runMigrations } from '../db/migrate.js';

export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

export interface TestClock {
  clock: () => Date;
  set(iso: string): void;
  advanceDays(days: number): void;
}

export function createTestClock(start = '2024-03-10T12:00:00.000Z'): TestClock {
  let current = new Date(start).getTime();
  return {
    clock: () => new Date(current),
    set(iso) {
      current = new Date(iso).getTime();
    },
    advanceDays(days) {
      current += days * 24 * 60 * 60 * 1000;
    },
  };
}
