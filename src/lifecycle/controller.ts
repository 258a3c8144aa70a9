import type { CardDrafter } from '../drafting/drafter.js';
import type { Card, CardDraft, CardStatus, Source, SourceStatus, Tag } from '../model/types.js';
import {
  CardDraftSchema,
  CardStatusSchema,
  CreateCardSchema,
  CreateSourceSchema,
  SourceStatusSchema,
  TagCreateSchema,
  UpdateCardSchema,
  UpdateSourceSchema,
  parseInput,
  type CreateCardInput,
  type CreateSourceInput,
  type UpdateCardInput,
  type UpdateSourceInput,
} from '../model/schema.js';
import { initialSchedulingState, DEFAULT_SCHEDULER_PARAMS, type SchedulerParams } from '../review/scheduler.js';
import type { Repository } from '../store/repository.js';
import {
  DuplicateExternalKeyError,
  InvalidTransitionError,
  NotFoundError,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { normalizeTagNames, nowISO } from '../shared/utils.js';
import { assertCardTransition, assertSourceTransition } from './transitions.js';

export interface LifecycleOptions {
  clock?: () => Date;
  review?: SchedulerParams;
  /** Reject re-imported external keys instead of returning the existing source. */
  strictDedup?: boolean;
}

export interface CreateSourceResult {
  source: Source;
  created: boolean;
}

export interface GenerationResult {
  source: Source;
  cards: Card[];
  /** Unapproved drafts replaced by this generation. */
  superseded: number;
}

export interface ApprovalResult {
  source: Source;
  activated: Card[];
}

export type StatusChangeResult = { kind: 'source'; source: Source } | { kind: 'card'; card: Card };

/**
 * Owns the source and card state machines. Every mutation runs inside a
 * repository transaction and is validated against the transition tables
 * before anything is written.
 */
export class LifecycleController {
  private readonly clock: () => Date;
  private readonly params: SchedulerParams;
  private readonly strictDedup: boolean;

  constructor(
    private readonly repo: Repository,
    opts: LifecycleOptions = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
    this.params = opts.review ?? DEFAULT_SCHEDULER_PARAMS;
    this.strictDedup = opts.strictDedup ?? false;
  }

  // ================================================================
  // Sources
  // ================================================================

  createSource(input: CreateSourceInput, opts: { strict?: boolean } = {}): CreateSourceResult {
    const data = parseInput(CreateSourceSchema, input, 'source');
    const strict = opts.strict ?? this.strictDedup;

    return this.repo.transaction(() => {
      if (data.external_key) {
        const existing = this.repo.findSourceByExternalKey(data.origin_kind, data.external_key);
        if (existing) {
          if (strict) {
            throw new DuplicateExternalKeyError(data.origin_kind, data.external_key, existing.id);
          }
          logger.debug(
            { source_id: existing.id, external_key: data.external_key },
            'Source already imported, skipping',
          );
          return { source: existing, created: false };
        }
      }

      const source = this.repo.insertSource(
        { ...data, tags: normalizeTagNames(data.tags) },
        this.stamp(),
      );
      logger.info({ source_id: source.id, origin_kind: source.origin_kind }, 'Source captured');
      return { source, created: true };
    });
  }

  getSource(id: string): Source {
    const source = this.repo.getSource(id);
    if (!source) throw new NotFoundError('source', id);
    return source;
  }

  editSource(id: string, input: UpdateSourceInput): Source {
    const patch = parseInput(UpdateSourceSchema, input, 'source update');

    return this.repo.transaction(() => {
      const source = this.getSource(id);
      if (source.status === 'archived') {
        throw new InvalidTransitionError(`Source ${id} is archived and cannot be edited`, {
          entity: 'source',
          id,
          from: source.status,
        });
      }
      return this.repo.updateSource(
        id,
        {
          text: patch.text,
          origin_url: patch.origin_url === '' ? null : patch.origin_url,
          origin_title: patch.origin_title === '' ? null : patch.origin_title,
          tags: patch.tags ? normalizeTagNames(patch.tags) : undefined,
        },
        this.stamp(),
      );
    });
  }

  /**
   * Check that the source may (re)enter cards_generated. Called before the
   * drafting collaborator runs so a doomed request never reaches it.
   */
  assertCanGenerate(sourceId: string): Source {
    const source = this.getSource(sourceId);
    assertSourceTransition(source.id, source.status, 'cards_generated');
    return source;
  }

  /**
   * Persist a batch of drafts for the source, replacing any drafts from an
   * earlier generation, and move the source to cards_generated.
   */
  requestCardGeneration(sourceId: string, drafts: readonly CardDraft[]): GenerationResult {
    const valid = drafts.map((draft, i) => parseInput(CardDraftSchema, draft, `card draft #${i + 1}`));

    return this.repo.transaction(() => {
      const source = this.assertCanGenerate(sourceId);
      const now = this.stamp();

      const stale = this.repo.listCards({ source_id: source.id, status: 'draft' }).cards;
      for (const card of stale) {
        this.repo.deleteCard(card.id);
      }

      const sourceTags = source.tags.map((t) => t.name);
      const cards = valid.map((draft) =>
        this.repo.insertCard(
          {
            front: draft.front,
            back: draft.back,
            hint: draft.hint ?? null,
            source_id: source.id,
            status: 'draft',
            ...initialSchedulingState(this.params),
            next_review: null,
            tags: normalizeTagNames([...draft.tags, ...sourceTags]),
          },
          now,
        ),
      );

      const updated = this.repo.updateSource(source.id, { status: 'cards_generated' }, now);
      logger.info(
        { source_id: source.id, drafted: cards.length, superseded: stale.length },
        'Card drafts stored',
      );
      return { source: updated, cards, superseded: stale.length };
    });
  }

  /**
   * Ask the drafting collaborator for drafts and store them. Drafter
   * failures propagate unchanged and leave the source untouched.
   */
  async generateCards(sourceId: string, drafter: CardDrafter): Promise<GenerationResult> {
    const source = this.assertCanGenerate(sourceId);
    const drafts = await drafter.draft(source);
    // The source may have moved while the drafter ran; requestCardGeneration re-checks.
    return this.requestCardGeneration(sourceId, drafts);
  }

  approve(sourceId: string): ApprovalResult {
    return this.repo.transaction(() => {
      const source = this.getSource(sourceId);
      assertSourceTransition(source.id, source.status, 'approved');
      const now = this.stamp();

      const drafts = this.repo.listCards({ source_id: source.id, status: 'draft' }).cards;
      const activated = drafts.map((card) => this.activate(card, now));
      const updated = this.repo.updateSource(source.id, { status: 'approved' }, now);

      logger.info({ source_id: source.id, activated: activated.length }, 'Source approved');
      return { source: updated, activated };
    });
  }

  archive(sourceId: string): Source {
    return this.repo.transaction(() => {
      const source = this.getSource(sourceId);
      assertSourceTransition(source.id, source.status, 'archived');
      const updated = this.repo.updateSource(source.id, { status: 'archived' }, this.stamp());
      logger.info({ source_id: source.id, from: source.status }, 'Source archived');
      return updated;
    });
  }

  /**
   * Direct status change for a source. Only approval and archival can be
   * requested this way; cards_generated is reached through generation.
   */
  setSourceStatus(sourceId: string, target: SourceStatus): Source {
    switch (target) {
      case 'approved':
        return this.approve(sourceId).source;
      case 'archived':
        return this.archive(sourceId);
      default: {
        const source = this.getSource(sourceId);
        throw new InvalidTransitionError(
          `Source ${sourceId} cannot be set to ${target} directly`,
          { entity: 'source', id: sourceId, from: source.status, to: target },
        );
      }
    }
  }

  // ================================================================
  // Cards
  // ================================================================

  getCard(id: string): Card {
    const card = this.repo.getCard(id);
    if (!card) throw new NotFoundError('card', id);
    return card;
  }

  /**
   * Create a card by hand. It starts as a draft and, unless `activate` is
   * false, is activated in the same transaction.
   */
  createCard(input: CreateCardInput): Card {
    const data = parseInput(CreateCardSchema, input, 'card');

    return this.repo.transaction(() => {
      if (data.source_id) this.assertSourceNotArchived(this.getSource(data.source_id), 'link a card to it');
      const now = this.stamp();

      const card = this.repo.insertCard(
        {
          front: data.front,
          back: data.back,
          hint: data.hint ?? null,
          source_id: data.source_id ?? null,
          status: 'draft',
          ...initialSchedulingState(this.params),
          next_review: null,
          tags: normalizeTagNames(data.tags),
        },
        now,
      );
      return data.activate ? this.activate(card, now) : card;
    });
  }

  /**
   * Edit card content. Scheduling state is never touched, whatever the status.
   */
  editCard(cardId: string, input: UpdateCardInput): Card {
    const patch = parseInput(UpdateCardSchema, input, 'card update');

    return this.repo.transaction(() => {
      this.getCard(cardId);
      return this.repo.updateCard(
        cardId,
        {
          front: patch.front,
          back: patch.back,
          hint: patch.hint === '' ? null : patch.hint,
          tags: patch.tags ? normalizeTagNames(patch.tags) : undefined,
        },
        this.stamp(),
      );
    });
  }

  deleteCard(cardId: string): void {
    this.repo.transaction(() => {
      const card = this.getCard(cardId);
      if (card.status !== 'draft') {
        throw new InvalidTransitionError(`Card ${cardId} is ${card.status}; only drafts can be deleted`, {
          entity: 'card',
          id: cardId,
          from: card.status,
        });
      }
      this.repo.deleteCard(cardId);
    });
  }

  setCardStatus(cardId: string, target: CardStatus): Card {
    return this.repo.transaction(() => {
      const card = this.getCard(cardId);
      assertCardTransition(card.id, card.status, target);
      const activating = card.status === 'draft' && target === 'active';
      if (activating && card.source_id) {
        const source = this.repo.getSource(card.source_id);
        if (source) this.assertSourceNotArchived(source, `activate card ${card.id}`);
      }
      const now = this.stamp();

      // Activation from draft starts a fresh schedule; resuming from suspended keeps it.
      const updated = activating
        ? this.activate(card, now)
        : this.repo.updateCard(card.id, { status: target }, now);

      logger.info({ card_id: card.id, from: card.status, to: target }, 'Card status changed');
      return updated;
    });
  }

  /**
   * Resolve an id to a source or a card and apply the status change.
   */
  setStatus(entityId: string, target: string): StatusChangeResult {
    if (this.repo.getSource(entityId)) {
      const status = parseInput(SourceStatusSchema, target, 'source status');
      return { kind: 'source', source: this.setSourceStatus(entityId, status) };
    }
    if (this.repo.getCard(entityId)) {
      const status = parseInput(CardStatusSchema, target, 'card status');
      return { kind: 'card', card: this.setCardStatus(entityId, status) };
    }
    throw new NotFoundError('entity', entityId);
  }

  // ================================================================
  // Tags
  // ================================================================

  createTag(input: { name: string; color?: string | null }): Tag {
    const data = parseInput(TagCreateSchema, input, 'tag');
    const [name = data.name] = normalizeTagNames([data.name]);
    return this.repo.createTag(name, data.color ?? null, this.stamp());
  }

  // ================================================================
  // Helpers
  // ================================================================

  private assertSourceNotArchived(source: Source, action: string): void {
    if (source.status !== 'archived') return;
    throw new InvalidTransitionError(`Source ${source.id} is archived; cannot ${action}`, {
      entity: 'source',
      id: source.id,
      from: source.status,
    });
  }

  private activate(card: Card, now: string): Card {
    return this.repo.updateCard(
      card.id,
      {
        status: 'active',
        ...initialSchedulingState(this.params),
        next_review: now,
        last_reviewed: null,
      },
      now,
    );
  }

  private stamp(): string {
    return nowISO(this.clock());
  }
}
