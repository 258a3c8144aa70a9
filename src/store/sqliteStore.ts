import type Database from 'better-sqlite3';
import {
  CARD_STATUSES,
  ORIGIN_KINDS,
  RATINGS,
  SOURCE_STATUSES,
  type Card,
  type OriginKind,
  type ReviewLog,
  type Source,
  type Tag,
} from '../model/types.js';
import { ConflictError, DbError, NotFoundError } from '../shared/errors.js';
import { generateId, normalizeTagNames } from '../shared/utils.js';
import type {
  CardFilter,
  CardPatch,
  NewCard,
  NewSource,
  Repository,
  SourceFilter,
  SourcePatch,
  TagStats,
} from './repository.js';

// ================================================================
// Row shapes
// ================================================================

interface SourceRow {
  id: string;
  text: string;
  origin_kind: string;
  origin_url: string | null;
  origin_title: string | null;
  external_key: string | null;
  highlight_color: string | null;
  status: string;
  created_at: string;
  updated_at: string;
}

interface CardRow {
  id: string;
  front: string;
  back: string;
  hint: string | null;
  source_id: string | null;
  status: string;
  ease_factor: number;
  interval_days: number;
  repetitions: number;
  next_review: string | null;
  last_reviewed: string | null;
  created_at: string;
  updated_at: string;
}

interface ReviewLogRow extends Omit<ReviewLog, 'rating'> {
  rating: string;
}

interface CountRow {
  count: number;
}

type TagLink = { table: 'source_tags'; column: 'source_id' } | { table: 'card_tags'; column: 'card_id' };

const SOURCE_LINK: TagLink = { table: 'source_tags', column: 'source_id' };
const CARD_LINK: TagLink = { table: 'card_tags', column: 'card_id' };

function oneOf<T extends string>(values: readonly T[], value: string, column: string): T {
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new DbError(`Unexpected ${column} value in database: ${value}`, { column, value });
  }
  return match;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes('UNIQUE');
}

/**
 * better-sqlite3 implementation of the repository boundary.
 */
export class SqliteStore implements Repository {
  constructor(private readonly db: Database.Database) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ================================================================
  // Sources
  // ================================================================

  insertSource(input: NewSource, now: string): Source {
    const id = generateId();
    try {
      this.db
        .prepare(
          `INSERT INTO sources
           (id, text, origin_kind, origin_url, origin_title, external_key, highlight_color,
            status, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, 'pending_review', ?, ?)`,
        )
        .run(
          id,
          input.text,
          input.origin_kind,
          input.origin_url ?? null,
          input.origin_title ?? null,
          input.external_key ?? null,
          input.highlight_color ?? null,
          now,
          now,
        );
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('Source external key already exists', {
          origin_kind: input.origin_kind,
          external_key: input.external_key,
        });
      }
      throw new DbError(`Failed to insert source: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.replaceTags(SOURCE_LINK, id, input.tags ?? [], now);
    return this.requireSource(id);
  }

  getSource(id: string): Source | undefined {
    const row = this.db.prepare<[string], SourceRow>('SELECT * FROM sources WHERE id = ?').get(id);
    return row ? this.hydrateSource(row) : undefined;
  }

  findSourceByExternalKey(originKind: OriginKind, externalKey: string): Source | undefined {
    const row = this.db
      .prepare<[string, string], SourceRow>(
        'SELECT * FROM sources WHERE origin_kind = ? AND external_key = ?',
      )
      .get(originKind, externalKey);
    return row ? this.hydrateSource(row) : undefined;
  }

  updateSource(id: string, patch: SourcePatch, now: string): Source {
    this.requireSource(id);

    const sets: string[] = ['updated_at = ?'];
    const values: unknown[] = [now];

    if (patch.text !== undefined) {
      sets.push('text = ?');
      values.push(patch.text);
    }
    if (patch.origin_url !== undefined) {
      sets.push('origin_url = ?');
      values.push(patch.origin_url);
    }
    if (patch.origin_title !== undefined) {
      sets.push('origin_title = ?');
      values.push(patch.origin_title);
    }
    if (patch.status !== undefined) {
      sets.push('status = ?');
      values.push(patch.status);
    }

    values.push(id);
    this.db.prepare(`UPDATE sources SET ${sets.join(', ')} WHERE id = ?`).run(...values);

    if (patch.tags !== undefined) {
      this.replaceTags(SOURCE_LINK, id, patch.tags, now);
    }
    return this.requireSource(id);
  }

  listSources(filter: SourceFilter = {}): { sources: Source[]; total: number } {
    const where: string[] = [];
    const params: unknown[] = [];

    if (filter.status) {
      where.push('s.status = ?');
      params.push(filter.status);
    }
    if (filter.origin_kind) {
      where.push('s.origin_kind = ?');
      params.push(filter.origin_kind);
    }
    if (filter.tag) {
      where.push(
        `EXISTS (SELECT 1 FROM source_tags st JOIN tags t ON t.id = st.tag_id
                 WHERE st.source_id = s.id AND t.name = ?)`,
      );
      params.push(filter.tag.trim());
    }

    const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    const total =
      this.db.prepare<unknown[], CountRow>(`SELECT COUNT(*) AS count FROM sources s ${clause}`).get(...params)
        ?.count ?? 0;

    const rows = this.db
      .prepare<unknown[], SourceRow>(
        `SELECT s.* FROM sources s ${clause}
         ORDER BY s.created_at DESC, s.id ASC
         LIMIT ? OFFSET ?`,
      )
      .all(...params, filter.limit ?? -1, filter.offset ?? 0);

    return { sources: rows.map((row) => this.hydrateSource(row)), total };
  }

  // ================================================================
  // Cards
  // ================================================================

  insertCard(input: NewCard, now: string): Card {
    const id = generateId();
    try {
      this.db
        .prepare(
          `INSERT INTO cards
           (id, front, back, hint, source_id, status, ease_factor, interval_days, repetitions,
            next_review, last_reviewed, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, NULL, ?, ?)`,
        )
        .run(
          id,
          input.front,
          input.back,
          input.hint ?? null,
          input.source_id ?? null,
          input.status,
          input.ease_factor,
          input.interval_days,
          input.repetitions,
          input.next_review,
          now,
          now,
        );
    } catch (err) {
      throw new DbError(`Failed to insert card: ${err instanceof Error ? err.message : String(err)}`, {
        source_id: input.source_id ?? null,
      });
    }

    this.replaceTags(CARD_LINK, id, input.tags ?? [], now);
    return this.requireCard(id);
  }

  getCard(id: string): Card | undefined {
    const row = this.db.prepare<[string], CardRow>('SELECT * FROM cards WHERE id = ?').get(id);
    return row ? this.hydrateCard(row) : undefined;
  }

  updateCard(id: string, patch: CardPatch, now: string): Card {
    this.requireCard(id);

    const sets: string[] = ['updated_at = ?'];
    const values: unknown[] = [now];
    const columns = [
      'front',
      'back',
      'hint',
      'status',
      'ease_factor',
      'interval_days',
      'repetitions',
      'next_review',
      'last_reviewed',
    ] as const;

    for (const column of columns) {
      const value = patch[column];
      if (value !== undefined) {
        sets.push(`${column} = ?`);
        values.push(value);
      }
    }

    values.push(id);
    this.db.prepare(`UPDATE cards SET ${sets.join(', ')} WHERE id = ?`).run(...values);

    if (patch.tags !== undefined) {
      this.replaceTags(CARD_LINK, id, patch.tags, now);
    }
    return this.requireCard(id);
  }

  deleteCard(id: string): boolean {
    const result = this.db.prepare('DELETE FROM cards WHERE id = ?').run(id);
    return result.changes > 0;
  }

  listCards(filter: CardFilter = {}): { cards: Card[]; total: number } {
    const where: string[] = [];
    const params: unknown[] = [];

    if (filter.status) {
      where.push('c.status = ?');
      params.push(filter.status);
    }
    if (filter.source_id) {
      where.push('c.source_id = ?');
      params.push(filter.source_id);
    }
    if (filter.tag) {
      where.push(
        `EXISTS (SELECT 1 FROM card_tags ct JOIN tags t ON t.id = ct.tag_id
                 WHERE ct.card_id = c.id AND t.name = ?)`,
      );
      params.push(filter.tag.trim());
    }

    const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    const total =
      this.db.prepare<unknown[], CountRow>(`SELECT COUNT(*) AS count FROM cards c ${clause}`).get(...params)
        ?.count ?? 0;

    const rows = this.db
      .prepare<unknown[], CardRow>(
        `SELECT c.* FROM cards c ${clause}
         ORDER BY c.created_at DESC, c.id ASC
         LIMIT ? OFFSET ?`,
      )
      .all(...params, filter.limit ?? -1, filter.offset ?? 0);

    return { cards: rows.map((row) => this.hydrateCard(row)), total };
  }

  // ================================================================
  // Review logs
  // ================================================================

  appendReviewLog(entry: Omit<ReviewLog, 'id'>): ReviewLog {
    const id = generateId();
    this.db
      .prepare(
        `INSERT INTO review_logs
         (id, card_id, rating, ease_before, interval_before, repetitions_before,
          ease_after, interval_after, repetitions_after, next_review, response_time_ms, reviewed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        entry.card_id,
        entry.rating,
        entry.ease_before,
        entry.interval_before,
        entry.repetitions_before,
        entry.ease_after,
        entry.interval_after,
        entry.repetitions_after,
        entry.next_review,
        entry.response_time_ms,
        entry.reviewed_at,
      );
    return { id, ...entry };
  }

  listReviewLogs(cardId: string): ReviewLog[] {
    return this.db
      .prepare<[string], ReviewLogRow>(
        // rowid breaks ties between reviews stamped with the same instant
        'SELECT * FROM review_logs WHERE card_id = ? ORDER BY reviewed_at DESC, rowid DESC',
      )
      .all(cardId)
      .map((row) => ({ ...row, rating: oneOf(RATINGS, row.rating, 'review_logs.rating') }));
  }

  // ================================================================
  // Tags
  // ================================================================

  listTags(): Tag[] {
    return this.db.prepare<[], Tag>('SELECT * FROM tags ORDER BY name ASC').all();
  }

  getTag(id: string): Tag | undefined {
    return this.db.prepare<[string], Tag>('SELECT * FROM tags WHERE id = ?').get(id);
  }

  findTagByName(name: string): Tag | undefined {
    return this.db.prepare<[string], Tag>('SELECT * FROM tags WHERE name = ?').get(name.trim());
  }

  createTag(name: string, color: string | null, now: string): Tag {
    const id = generateId();
    try {
      this.db
        .prepare('INSERT INTO tags (id, name, color, created_at) VALUES (?, ?, ?, ?)')
        .run(id, name, color, now);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Tag '${name}' already exists`, { name });
      }
      throw new DbError(`Failed to create tag: ${err instanceof Error ? err.message : String(err)}`);
    }
    return { id, name, color, created_at: now };
  }

  deleteTag(id: string): boolean {
    const result = this.db.prepare('DELETE FROM tags WHERE id = ?').run(id);
    return result.changes > 0;
  }

  tagStats(id: string): TagStats {
    const sources = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM source_tags WHERE tag_id = ?')
      .get(id);
    const cards = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM card_tags WHERE tag_id = ?')
      .get(id);
    return { source_count: sources?.count ?? 0, card_count: cards?.count ?? 0 };
  }

  // ================================================================
  // Helpers
  // ================================================================

  private requireSource(id: string): Source {
    const source = this.getSource(id);
    if (!source) throw new NotFoundError('source', id);
    return source;
  }

  private requireCard(id: string): Card {
    const card = this.getCard(id);
    if (!card) throw new NotFoundError('card', id);
    return card;
  }

  private ensureTags(names: readonly string[], now: string): Tag[] {
    return normalizeTagNames(names).map(
      (name) => this.findTagByName(name) ?? this.createTag(name, null, now),
    );
  }

  private replaceTags(link: TagLink, ownerId: string, names: readonly string[], now: string): void {
    const tags = this.ensureTags(names, now);
    this.db.prepare(`DELETE FROM ${link.table} WHERE ${link.column} = ?`).run(ownerId);
    const insert = this.db.prepare(`INSERT INTO ${link.table} (${link.column}, tag_id) VALUES (?, ?)`);
    for (const tag of tags) {
      insert.run(ownerId, tag.id);
    }
  }

  private tagsFor(link: TagLink, ownerId: string): Tag[] {
    return this.db
      .prepare<[string], Tag>(
        `SELECT t.* FROM tags t JOIN ${link.table} l ON l.tag_id = t.id
         WHERE l.${link.column} = ? ORDER BY t.name ASC`,
      )
      .all(ownerId);
  }

  private hydrateSource(row: SourceRow): Source {
    const count = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM cards WHERE source_id = ?')
      .get(row.id);
    return {
      ...row,
      origin_kind: oneOf(ORIGIN_KINDS, row.origin_kind, 'sources.origin_kind'),
      status: oneOf(SOURCE_STATUSES, row.status, 'sources.status'),
      tags: this.tagsFor(SOURCE_LINK, row.id),
      card_count: count?.count ?? 0,
    };
  }

  private hydrateCard(row: CardRow): Card {
    return {
      ...row,
      status: oneOf(CARD_STATUSES, row.status, 'cards.status'),
      tags: this.tagsFor(CARD_LINK, row.id),
    };
  }
}
