export const ORIGIN_KINDS = [
  'manual_entry',
  'browser_capture',
  'link_import',
  // Reserved for producers that are not wired up yet
  'readwise_import',
  'alfred',
  'ios_shortcut',
] as const;
export type OriginKind = (typeof ORIGIN_KINDS)[number];

export const SOURCE_STATUSES = ['pending_review', 'cards_generated', 'approved', 'archived'] as const;
export type SourceStatus = (typeof SOURCE_STATUSES)[number];

export const CARD_STATUSES = ['draft', 'active', 'suspended', 'mastered'] as const;
export type CardStatus = (typeof CARD_STATUSES)[number];

/**
 * Recall quality, ordered from forgotten to effortless. The array index is
 * the rating's ordinal value (0-3).
 */
export const RATINGS = ['again', 'hard', 'good', 'easy'] as const;
export type Rating = (typeof RATINGS)[number];

export interface Tag {
  id: string;
  name: string;
  color: string | null;
  created_at: string;
}

export interface Source {
  id: string;
  text: string;
  origin_kind: OriginKind;
  origin_url: string | null;
  origin_title: string | null;
  external_key: string | null;
  highlight_color: string | null;
  status: SourceStatus;
  created_at: string;
  updated_at: string;
  tags: Tag[];
  card_count: number;
}

export interface SchedulingState {
  ease_factor: number;
  interval_days: number;
  repetitions: number;
}

export interface Card extends SchedulingState {
  id: string;
  front: string;
  back: string;
  hint: string | null;
  source_id: string | null;
  status: CardStatus;
  next_review: string | null;
  last_reviewed: string | null;
  created_at: string;
  updated_at: string;
  tags: Tag[];
}

export interface ReviewLog {
  id: string;
  card_id: string;
  rating: Rating;
  ease_before: number;
  interval_before: number;
  repetitions_before: number;
  ease_after: number;
  interval_after: number;
  repetitions_after: number;
  next_review: string;
  response_time_ms: number | null;
  reviewed_at: string;
}

/**
 * A proposed card produced by a drafting collaborator (LLM, extension,
 * or a human typing it in).
 */
export interface CardDraft {
  front: string;
  back: string;
  hint?: string | null;
  tags?: string[];
}
