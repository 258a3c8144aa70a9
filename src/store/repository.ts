import type {
  Card,
  CardStatus,
  OriginKind,
  ReviewLog,
  SchedulingState,
  Source,
  SourceStatus,
  Tag,
} from '../model/types.js';

export interface NewSource {
  text: string;
  origin_kind: OriginKind;
  origin_url?: string | null;
  origin_title?: string | null;
  external_key?: string | null;
  highlight_color?: string | null;
  tags?: string[];
}

export interface SourcePatch {
  text?: string;
  origin_url?: string | null;
  origin_title?: string | null;
  status?: SourceStatus;
  tags?: string[];
}

export interface NewCard extends SchedulingState {
  front: string;
  back: string;
  hint?: string | null;
  source_id?: string | null;
  status: CardStatus;
  next_review: string | null;
  tags?: string[];
}

export interface CardPatch extends Partial<SchedulingState> {
  front?: string;
  back?: string;
  hint?: string | null;
  status?: CardStatus;
  next_review?: string | null;
  last_reviewed?: string | null;
  tags?: string[];
}

export interface SourceFilter {
  status?: SourceStatus;
  origin_kind?: OriginKind;
  tag?: string;
  limit?: number;
  offset?: number;
}

export interface CardFilter {
  status?: CardStatus;
  source_id?: string;
  tag?: string;
  limit?: number;
  offset?: number;
}

export interface TagStats {
  source_count: number;
  card_count: number;
}

/**
 * Durable storage for sources, cards, tags and review logs. The lifecycle
 * controller and review service depend only on this interface.
 *
 * Tag names passed in are expected to be normalized already. Timestamps are
 * ISO-8601 strings supplied by the caller so that a single operation stamps
 * every row it touches with the same instant.
 */
export interface Repository {
  /** Run `fn` atomically; any throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T;

  insertSource(input: NewSource, now: string): Source;
  getSource(id: string): Source | undefined;
  findSourceByExternalKey(originKind: OriginKind, externalKey: string): Source | undefined;
  updateSource(id: string, patch: SourcePatch, now: string): Source;
  listSources(filter?: SourceFilter): { sources: Source[]; total: number };

  insertCard(input: NewCard, now: string): Card;
  getCard(id: string): Card | undefined;
  updateCard(id: string, patch: CardPatch, now: string): Card;
  deleteCard(id: string): boolean;
  listCards(filter?: CardFilter): { cards: Card[]; total: number };

  /** Append-only: logs are never updated or removed. */
  appendReviewLog(entry: Omit<ReviewLog, 'id'>): ReviewLog;
  listReviewLogs(cardId: string): ReviewLog[];

  listTags(): Tag[];
  getTag(id: string): Tag | undefined;
  findTagByName(name: string): Tag | undefined;
  createTag(name: string, color: string | null, now: string): Tag;
  deleteTag(id: string): boolean;
  tagStats(id: string): TagStats;
}

/**
 * The read-only slice handed to export collaborators.
 */
export type ExportReader = Pick<Repository, 'listSources' | 'listCards'>;
