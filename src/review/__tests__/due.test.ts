import { describe, it, expect } from 'vitest';
import type { Card } from '../../model/types.js';
import { compareDue, isDue, selectDue } from '../due.js';

const NOW = new Date('2024-03-10T12:00:00.000Z');

function makeCard(id: string, overrides: Partial<Card> = {}): Card {
  return {
    id,
    front: `front ${id}`,
    back: `back ${id}`,
    hint: null,
    source_id: null,
    status: 'active',
    ease_factor: 2.5,
    interval_days: 1,
    repetitions: 1,
    next_review: '2024-03-09T12:00:00.000Z',
    last_reviewed: null,
    created_at: '2024-03-01T00:00:00.000Z',
    updated_at: '2024-03-01T00:00:00.000Z',
    tags: [],
    ...overrides,
  };
}

function tagged(name: string) {
  return [{ id: `t-${name}`, name, color: null, created_at: '2024-03-01T00:00:00.000Z' }];
}

describe('isDue', () => {
  it('is due when next_review is now or earlier', () => {
    expect(isDue(makeCard('a', { next_review: NOW.toISOString() }), NOW)).toBe(true);
    expect(isDue(makeCard('a', { next_review: '2024-03-10T12:00:00.001Z' }), NOW)).toBe(false);
  });

  it('treats an unscheduled active card as due', () => {
    expect(isDue(makeCard('a', { next_review: null }), NOW)).toBe(true);
  });

  it('never selects cards that are not active', () => {
    expect(isDue(makeCard('a', { status: 'suspended' }), NOW)).toBe(false);
    expect(isDue(makeCard('a', { status: 'mastered' }), NOW)).toBe(false);
    expect(isDue(makeCard('a', { status: 'draft', next_review: null }), NOW)).toBe(false);
  });
});

describe('compareDue', () => {
  it('puts unscheduled cards first, then earliest, then by id', () => {
    const cards = [
      makeCard('c', { next_review: '2024-03-05T00:00:00.000Z' }),
      makeCard('b', { next_review: '2024-03-01T00:00:00.000Z' }),
      makeCard('z', { next_review: null }),
      makeCard('a', { next_review: '2024-03-05T00:00:00.000Z' }),
    ];
    expect([...cards].sort(compareDue).map((c) => c.id)).toEqual(['z', 'b', 'a', 'c']);
  });
});

describe('selectDue', () => {
  const candidates = [
    makeCard('1', { next_review: '2024-03-08T00:00:00.000Z', tags: tagged('rust') }),
    makeCard('2', { next_review: '2024-03-07T00:00:00.000Z' }),
    makeCard('3', { next_review: '2024-04-01T00:00:00.000Z', tags: tagged('rust') }),
    makeCard('4', { next_review: '2024-03-09T00:00:00.000Z', tags: tagged('rust'), status: 'suspended' }),
    makeCard('5', { next_review: '2024-03-09T00:00:00.000Z', tags: tagged('rust') }),
  ];

  it('returns due cards most overdue first', () => {
    const result = selectDue(candidates, NOW);
    expect(result.cards.map((c) => c.id)).toEqual(['2', '1', '5']);
    expect(result.total_due).toBe(3);
  });

  it('filters by tag case-insensitively', () => {
    const result = selectDue(candidates, NOW, { tag: 'RUST' });
    expect(result.cards.map((c) => c.id)).toEqual(['1', '5']);
    expect(result.total_due).toBe(2);
  });

  it('caps the returned cards but not the total', () => {
    const result = selectDue(candidates, NOW, { limit: 1 });
    expect(result.cards.map((c) => c.id)).toEqual(['2']);
    expect(result.total_due).toBe(3);
  });

  it('returns an empty list when nothing is due', () => {
    expect(selectDue([], NOW)).toEqual({ cards: [], total_due: 0 });
  });
});
