import type { Card } from '../model/types.js';

export interface DueOptions {
  tag?: string;
  limit?: number;
}

export interface DueResult {
  cards: Card[];
  total_due: number;
}

export function isDue(card: Card, now: Date): boolean {
  if (card.status !== 'active') return false;
  if (card.next_review === null) return true;
  return Date.parse(card.next_review) <= now.getTime();
}

/**
 * Most overdue first: never-scheduled cards, then earliest next_review,
 * then id.
 */
export function compareDue(a: Card, b: Card): number {
  if (a.next_review !== b.next_review) {
    if (a.next_review === null) return -1;
    if (b.next_review === null) return 1;
    const diff = Date.parse(a.next_review) - Date.parse(b.next_review);
    if (diff !== 0) return diff;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Select the due cards from a candidate set. The tag filter narrows the set
 * before counting; the limit only caps the returned cards.
 */
export function selectDue(candidates: readonly Card[], now: Date, opts: DueOptions = {}): DueResult {
  const tag = opts.tag?.trim().toLowerCase();
  const due = candidates
    .filter((card) => isDue(card, now))
    .filter((card) => !tag || card.tags.some((t) => t.name.toLowerCase() === tag))
    .sort(compareDue);

  const limited = opts.limit !== undefined ? due.slice(0, Math.max(0, opts.limit)) : due;
  return { cards: limited, total_due: due.length };
}
