import type { Card, ReviewLog } from '../model/types.js';
import type { Repository } from '../store/repository.js';
import { REVIEWABLE_CARD_STATUSES } from '../lifecycle/transitions.js';
import { InvalidTransitionError, NotFoundError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';
import { selectDue, type DueOptions, type DueResult } from './due.js';
import {
  DEFAULT_SCHEDULER_PARAMS,
  parseRating,
  parseResponseTime,
  schedule,
  type SchedulerParams,
} from './scheduler.js';

export interface ReviewServiceOptions {
  clock?: () => Date;
  review?: SchedulerParams;
}

export interface ReviewOutcome {
  card: Card;
  log: ReviewLog;
}

/**
 * Applies ratings to cards and answers due-queue queries. The scheduling
 * math itself lives in scheduler.ts; this class only loads, validates and
 * persists.
 */
export class ReviewService {
  private readonly clock: () => Date;
  private readonly params: SchedulerParams;

  constructor(
    private readonly repo: Repository,
    opts: ReviewServiceOptions = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
    this.params = opts.review ?? DEFAULT_SCHEDULER_PARAMS;
  }

  /**
   * Rate a card. Input is validated before any read or write; the card update
   * and its review log commit together or not at all.
   */
  submitReview(cardId: string, rating: unknown, responseTimeMs?: unknown): ReviewOutcome {
    const parsedRating = parseRating(rating);
    const responseTime = parseResponseTime(responseTimeMs);

    return this.repo.transaction(() => {
      const card = this.repo.getCard(cardId);
      if (!card) throw new NotFoundError('card', cardId);
      if (!REVIEWABLE_CARD_STATUSES.includes(card.status)) {
        throw new InvalidTransitionError(`Cannot review card with status '${card.status}'`, {
          entity: 'card',
          id: card.id,
          from: card.status,
        });
      }

      const reviewedAt = this.clock();
      const stamp = nowISO(reviewedAt);
      const next = schedule(card, parsedRating, reviewedAt, this.params);

      const updated = this.repo.updateCard(
        card.id,
        {
          ease_factor: next.ease_factor,
          interval_days: next.interval_days,
          repetitions: next.repetitions,
          next_review: next.next_review,
          last_reviewed: stamp,
        },
        stamp,
      );

      const log = this.repo.appendReviewLog({
        card_id: card.id,
        rating: parsedRating,
        ease_before: card.ease_factor,
        interval_before: card.interval_days,
        repetitions_before: card.repetitions,
        ease_after: next.ease_factor,
        interval_after: next.interval_days,
        repetitions_after: next.repetitions,
        next_review: next.next_review,
        response_time_ms: responseTime,
        reviewed_at: stamp,
      });

      logger.debug(
        { card_id: card.id, rating: parsedRating, interval: next.interval_days, ease: next.ease_factor },
        'Review recorded',
      );
      return { card: updated, log };
    });
  }

  listDue(opts: DueOptions = {}): DueResult {
    const { cards } = this.repo.listCards({ status: 'active' });
    return selectDue(cards, this.clock(), opts);
  }

  history(cardId: string): ReviewLog[] {
    if (!this.repo.getCard(cardId)) throw new NotFoundError('card', cardId);
    return this.repo.listReviewLogs(cardId);
  }
}
