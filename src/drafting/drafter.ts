import type { CardDraft, Source } from '../model/types.js';
import type { Config } from '../shared/config.js';
import { DrafterError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { LlmClient } from './client.js';
import { parseCardDrafts } from './parse.js';
import { buildCardDraftMessages, CARD_PROMPT_VERSION } from './prompts.js';

/**
 * Anything that can propose cards for a source. Implementations may be slow
 * or fail; callers surface their errors unchanged.
 */
export interface CardDrafter {
  draft(source: Source): Promise<CardDraft[]>;
}

/**
 * Drafts cards by prompting an OpenAI-compatible chat model.
 */
export class LlmCardDrafter implements CardDrafter {
  constructor(
    private readonly client: LlmClient,
    private readonly maxCards: number,
  ) {}

  static fromConfig(config: Config['drafting']): LlmCardDrafter {
    return new LlmCardDrafter(new LlmClient(config), config.max_cards);
  }

  async draft(source: Source): Promise<CardDraft[]> {
    if (!this.client.isConfigured()) {
      throw new DrafterError('Card drafter is not configured (drafting.base_url / drafting.model)');
    }

    const response = await this.client.chat(buildCardDraftMessages(source, this.maxCards));
    const drafts = parseCardDrafts(response.content, this.maxCards);

    logger.info(
      { source_id: source.id, drafts: drafts.length, model: response.model, prompt: CARD_PROMPT_VERSION },
      'Cards drafted',
    );
    return drafts;
  }
}

/**
 * Returns a fixed batch of drafts. Used when a human supplies the cards.
 */
export class StaticDrafter implements CardDrafter {
  constructor(private readonly drafts: readonly CardDraft[]) {}

  draft(): Promise<CardDraft[]> {
    return Promise.resolve([...this.drafts]);
  }
}
