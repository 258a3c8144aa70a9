import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

const DAY_MS = 24 * 60 * 60 * 1000;

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

/**
 * Full-precision UTC timestamp. Stored timestamps sort lexicographically.
 */
export function nowISO(date: Date = new Date()): string {
  return date.toISOString();
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works for both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getRecallDeckDir(): string {
  return resolvePath('~/.recalldeck');
}

/**
 * Trim, lower-case and de-duplicate tag names, dropping empties.
 */
export function normalizeTagNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name) seen.add(name);
  }
  return [...seen];
}

/**
 * Create a filesystem-safe slug from free text.
 */
export function slugify(text: string, maxLength = 50): string {
  let slug = text.toLowerCase().replace(/[/\\:*?"<>|#[\]\s]+/g, '-');
  slug = slug.replace(/-{2,}/g, '-').replace(/^-+|-+$/g, '');
  slug = slug.slice(0, maxLength).replace(/-+$/, '');
  return slug || 'untitled';
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
