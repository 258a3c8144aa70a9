import { describe, it, expect } from 'vitest';
import {
  assertCardTransition,
  assertSourceTransition,
  canTransitionCard,
  canTransitionSource,
} from '../transitions.js';
import { InvalidTransitionError } from '../../shared/errors.js';

describe('source transitions', () => {
  it('allows the forward path and regeneration', () => {
    expect(canTransitionSource('pending_review', 'cards_generated')).toBe(true);
    expect(canTransitionSource('cards_generated', 'cards_generated')).toBe(true);
    expect(canTransitionSource('cards_generated', 'approved')).toBe(true);
    expect(canTransitionSource('approved', 'archived')).toBe(true);
  });

  it('rejects skipping generation and leaving archived', () => {
    expect(canTransitionSource('pending_review', 'approved')).toBe(false);
    expect(canTransitionSource('approved', 'cards_generated')).toBe(false);
    expect(canTransitionSource('archived', 'pending_review')).toBe(false);
  });

  it('throws with the attempted edge in the details', () => {
    let caught: unknown;
    try {
      assertSourceTransition('s1', 'archived', 'approved');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({
      code: 'INVALID_TRANSITION',
      details: { entity: 'source', id: 's1', from: 'archived', to: 'approved' },
    });
  });
});

describe('card transitions', () => {
  it('allows activation, suspension and mastery', () => {
    expect(canTransitionCard('draft', 'active')).toBe(true);
    expect(canTransitionCard('active', 'suspended')).toBe(true);
    expect(canTransitionCard('suspended', 'active')).toBe(true);
    expect(canTransitionCard('active', 'mastered')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(canTransitionCard('draft', 'suspended')).toBe(false);
    expect(canTransitionCard('suspended', 'mastered')).toBe(false);
    expect(canTransitionCard('mastered', 'active')).toBe(false);
    expect(() => assertCardTransition('c1', 'active', 'draft')).toThrow(InvalidTransitionError);
  });
});
