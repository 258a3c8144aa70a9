import type { CardStatus, SourceStatus } from '../model/types.js';
import { InvalidTransitionError } from '../shared/errors.js';

export const SOURCE_TRANSITIONS: Readonly<Record<SourceStatus, readonly SourceStatus[]>> = {
  // cards_generated -> cards_generated is a regeneration
  pending_review: ['cards_generated', 'archived'],
  cards_generated: ['cards_generated', 'approved', 'archived'],
  approved: ['archived'],
  archived: [],
};

export const CARD_TRANSITIONS: Readonly<Record<CardStatus, readonly CardStatus[]>> = {
  draft: ['active'],
  active: ['suspended', 'mastered'],
  suspended: ['active'],
  mastered: [],
};

/** Statuses the review scheduler accepts ratings for. Mastery is advisory. */
export const REVIEWABLE_CARD_STATUSES: readonly CardStatus[] = ['active', 'mastered'];

export function canTransitionSource(from: SourceStatus, to: SourceStatus): boolean {
  return SOURCE_TRANSITIONS[from].includes(to);
}

export function canTransitionCard(from: CardStatus, to: CardStatus): boolean {
  return CARD_TRANSITIONS[from].includes(to);
}

export function assertSourceTransition(id: string, from: SourceStatus, to: SourceStatus): void {
  if (!canTransitionSource(from, to)) {
    throw new InvalidTransitionError(`Source ${id} cannot move from ${from} to ${to}`, {
      entity: 'source',
      id,
      from,
      to,
    });
  }
}

export function assertCardTransition(id: string, from: CardStatus, to: CardStatus): void {
  if (!canTransitionCard(from, to)) {
    throw new InvalidTransitionError(`Card ${id} cannot move from ${from} to ${to}`, {
      entity: 'card',
      id,
      from,
      to,
    });
  }
}
