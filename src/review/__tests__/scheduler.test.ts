import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCHEDULER_PARAMS,
  initialSchedulingState,
  parseRating,
  parseResponseTime,
  schedule,
} from '../scheduler.js';
import { InvalidRatingError } from '../../shared/errors.js';

const NOW = new Date('2024-03-10T12:00:00.000Z');

describe('initialSchedulingState', () => {
  it('starts at the initial ease with no history', () => {
    expect(initialSchedulingState()).toEqual({ ease_factor: 2.5, interval_days: 0, repetitions: 0 });
  });
});

describe('schedule', () => {
  it('good on a fresh card schedules one day out', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 0, repetitions: 0 }, 'good', NOW);
    expect(next).toEqual({
      ease_factor: 2.5,
      interval_days: 1,
      repetitions: 1,
      next_review: '2024-03-11T12:00:00.000Z',
    });
  });

  it('second good success schedules six days out', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 1, repetitions: 1 }, 'good', NOW);
    expect(next.interval_days).toBe(6);
    expect(next.repetitions).toBe(2);
  });

  it('later good successes multiply by the ease factor', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 6, repetitions: 2 }, 'good', NOW);
    expect(next.interval_days).toBe(15);
    expect(next.repetitions).toBe(3);
    expect(next.ease_factor).toBe(2.5);
    expect(next.next_review).toBe('2024-03-25T12:00:00.000Z');
  });

  it('again resets repetitions and lowers the ease', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 15, repetitions: 3 }, 'again', NOW);
    expect(next).toEqual({
      ease_factor: 2.3,
      interval_days: 1,
      repetitions: 0,
      next_review: '2024-03-11T12:00:00.000Z',
    });
  });

  it('ease never falls below the minimum', () => {
    const next = schedule({ ease_factor: 1.4, interval_days: 3, repetitions: 2 }, 'again', NOW);
    expect(next.ease_factor).toBe(1.3);
  });

  it('hard grows the interval slowly and lowers the ease', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 6, repetitions: 2 }, 'hard', NOW);
    expect(next.interval_days).toBe(7);
    expect(next.ease_factor).toBe(2.35);
    expect(next.repetitions).toBe(3);
  });

  it('easy applies the bonus on top of the good interval', () => {
    const next = schedule({ ease_factor: 2.0, interval_days: 6, repetitions: 3 }, 'easy', NOW);
    expect(next.interval_days).toBe(16);
    expect(next.ease_factor).toBe(2.15);
    expect(next.repetitions).toBe(4);
  });

  it('easy on the second success rounds the bonus interval', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 1, repetitions: 1 }, 'easy', NOW);
    expect(next.interval_days).toBe(8);
  });

  it('ease never rises above the maximum', () => {
    const next = schedule({ ease_factor: 3.0, interval_days: 10, repetitions: 3 }, 'easy', NOW);
    expect(next.ease_factor).toBe(3.0);
    expect(next.interval_days).toBe(39);
  });

  it('clamps intervals to the configured maximum', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 300, repetitions: 5 }, 'good', NOW);
    expect(next.interval_days).toBe(365);
    expect(next.next_review).toBe('2025-03-10T12:00:00.000Z');
  });

  it('honours custom parameters', () => {
    const params = { ...DEFAULT_SCHEDULER_PARAMS, max_interval_days: 30 };
    const next = schedule({ ease_factor: 2.5, interval_days: 20, repetitions: 4 }, 'good', NOW, params);
    expect(next.interval_days).toBe(30);
  });

  it('hard stops lowering the ease at the minimum', () => {
    const next = schedule({ ease_factor: 1.35, interval_days: 4, repetitions: 2 }, 'hard', NOW);
    expect(next.ease_factor).toBe(1.3);
    expect(next.interval_days).toBe(5);
  });

  it('keeps the ease at or above the minimum over long failure streaks', () => {
    let state = { ease_factor: 2.5, interval_days: 10, repetitions: 4 };
    const ratings = ['again', 'hard', 'hard', 'again', 'again', 'hard'] as const;
    for (let round = 0; round < 20; round++) {
      for (const rating of ratings) {
        state = schedule(state, rating, NOW);
        expect(state.ease_factor).toBeGreaterThanOrEqual(1.3);
      }
    }
    expect(state.ease_factor).toBe(1.3);
  });

  it('always schedules the next review after the review instant', () => {
    const fresh = { ease_factor: 2.5, interval_days: 0, repetitions: 0 };
    for (const rating of ['again', 'hard', 'good', 'easy'] as const) {
      const next = schedule(fresh, rating, NOW);
      expect(next.interval_days).toBeGreaterThanOrEqual(1);
      expect(new Date(next.next_review).getTime()).toBeGreaterThan(NOW.getTime());
    }
  });

  it('never shrinks the interval on a remembered rating', () => {
    const next = schedule({ ease_factor: 2.5, interval_days: 10, repetitions: 0 }, 'good', NOW);
    expect(next.interval_days).toBe(10);
  });
});

describe('parseRating', () => {
  it('accepts names in any case', () => {
    expect(parseRating('GOOD')).toBe('good');
    expect(parseRating(' hard ')).toBe('hard');
  });

  it('accepts ordinals 0-3', () => {
    expect(parseRating(0)).toBe('again');
    expect(parseRating(3)).toBe('easy');
  });

  it('rejects anything else', () => {
    expect(() => parseRating(4)).toThrow(InvalidRatingError);
    expect(() => parseRating(-1)).toThrow(InvalidRatingError);
    expect(() => parseRating(1.5)).toThrow(InvalidRatingError);
    expect(() => parseRating('meh')).toThrow(InvalidRatingError);
    expect(() => parseRating(undefined)).toThrow(InvalidRatingError);
  });
});

describe('parseResponseTime', () => {
  it('treats a missing value as null', () => {
    expect(parseResponseTime(undefined)).toBeNull();
    expect(parseResponseTime(null)).toBeNull();
  });

  it('accepts non-negative integers', () => {
    expect(parseResponseTime(1200)).toBe(1200);
    expect(parseResponseTime(0)).toBe(0);
  });

  it('rejects negatives, fractions and strings', () => {
    expect(() => parseResponseTime(-5)).toThrow(InvalidRatingError);
    expect(() => parseResponseTime(1.5)).toThrow(InvalidRatingError);
    expect(() => parseResponseTime('100')).toThrow(InvalidRatingError);
  });
});
