/**
 * SM-2 family review scheduler.
 *
 * Each card carries an ease factor, an interval in days and a count of
 * consecutive successful repetitions. A rating produces a new state:
 *
 * - again: repetitions reset, interval 1 day, ease - again_penalty
 * - hard:  interval * hard_multiplier, ease - hard_penalty
 * - good:  1 day, then 6 days, then interval * ease
 * - easy:  good's interval * easy_bonus, ease + easy_ease_bonus
 *
 * Ease never drops below min_ease, intervals stay within
 * [1, max_interval_days] and never shrink on a remembered rating.
 */

import type { Config } from '../shared/config.js';
import { generateDefaultConfig } from '../shared/config.js';
import { InvalidRatingError } from '../shared/errors.js';
import { addDays, nowISO } from '../shared/utils.js';
import { RATINGS, type Rating, type SchedulingState } from '../model/types.js';

export type SchedulerParams = Config['review'];

export const DEFAULT_SCHEDULER_PARAMS: SchedulerParams = generateDefaultConfig().review;

export interface ScheduledState extends SchedulingState {
  next_review: string;
}

export function initialSchedulingState(params: SchedulerParams = DEFAULT_SCHEDULER_PARAMS): SchedulingState {
  return { ease_factor: params.initial_ease, interval_days: 0, repetitions: 0 };
}

/**
 * Accept a rating name (any case) or its ordinal 0-3.
 */
export function parseRating(value: unknown): Rating {
  if (typeof value === 'string') {
    const name = value.trim().toLowerCase();
    const match = RATINGS.find((r) => r === name);
    if (match) return match;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    const byOrdinal = RATINGS[value];
    if (byOrdinal) return byOrdinal;
  }
  throw new InvalidRatingError(`Invalid rating: ${JSON.stringify(value)}`, {
    allowed: [...RATINGS],
  });
}

export function parseResponseTime(value: unknown): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
  throw new InvalidRatingError(`Invalid response time: ${JSON.stringify(value)}`);
}

function roundEase(ease: number): number {
  return Math.round(ease * 100) / 100;
}

function successInterval(repetitions: number, previous: number, ease: number): number {
  if (repetitions === 1) return 1;
  if (repetitions === 2) return 6;
  return Math.round(previous * ease);
}

/**
 * Compute the next scheduling state for a rating given at `now`.
 */
export function schedule(
  state: SchedulingState,
  rating: Rating,
  now: Date,
  params: SchedulerParams = DEFAULT_SCHEDULER_PARAMS,
): ScheduledState {
  const previous = state.interval_days;
  let { ease_factor: ease, repetitions } = state;
  let interval = 1;

  switch (rating) {
    case 'again':
      repetitions = 0;
      ease = Math.max(params.min_ease, ease - params.again_penalty);
      break;

    case 'hard':
      repetitions += 1;
      interval = Math.max(1, Math.round(previous * params.hard_multiplier));
      ease = Math.max(params.min_ease, ease - params.hard_penalty);
      break;

    case 'good':
      repetitions += 1;
      interval = successInterval(repetitions, previous, ease);
      break;

    case 'easy':
      repetitions += 1;
      interval = Math.round(successInterval(repetitions, previous, ease) * params.easy_bonus);
      ease = Math.min(params.max_ease, ease + params.easy_ease_bonus);
      break;
  }

  if (rating !== 'again') {
    interval = Math.max(interval, previous);
  }
  interval = Math.min(params.max_interval_days, Math.max(1, interval));

  return {
    ease_factor: roundEase(ease),
    interval_days: interval,
    repetitions,
    next_review: nowISO(addDays(now, interval)),
  };
}
