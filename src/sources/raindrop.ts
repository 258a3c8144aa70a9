import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { IntegrationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { LifecycleController } from '../lifecycle/controller.js';

const HighlightSchema = z.object({
  _id: z.union([z.string(), z.number()]),
  text: z.string().default(''),
  color: z.string().nullish(),
  link: z.string().nullish(),
  title: z.string().nullish(),
  created: z.string().nullish(),
});

const HighlightsPageSchema = z.object({
  items: z.array(HighlightSchema).default([]),
});

const UserSchema = z.object({
  user: z.object({ email: z.string().nullish() }).default({}),
});

export interface RaindropHighlight {
  /** Dedup key for the source created from this highlight. */
  external_key: string;
  text: string;
  color: string;
  url: string | null;
  title: string | null;
  created: string | null;
}

export interface ConnectionStatus {
  connected: boolean;
  message: string;
}

export interface SyncOptions {
  /** Only import highlights created after this instant. */
  since?: Date;
}

export interface SyncResult {
  synced: number;
  skipped_duplicates: number;
  flashcard_ready: number;
  total_highlights: number;
  message: string;
}

/**
 * Read-only client for the Raindrop.io REST API.
 */
export class RaindropClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly perPage: number;
  private readonly timeoutMs: number;
  readonly flashcardColor: string;

  constructor(config: Config['raindrop']) {
    this.baseUrl = config.base_url.replace(/\/+$/, '');
    this.token = config.token;
    this.perPage = config.per_page;
    this.timeoutMs = config.timeout_ms;
    this.flashcardColor = config.flashcard_color.toLowerCase();
  }

  isConfigured(): boolean {
    return this.token.length > 0;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const parsed = UserSchema.safeParse(await this.get('/user'));
      const email = parsed.success ? parsed.data.user.email : null;
      return { connected: true, message: `Connected as ${email ?? 'unknown'}` };
    } catch (err) {
      return { connected: false, message: err instanceof Error ? err.message : String(err) };
    }
  }

  async getHighlights(page: number): Promise<RaindropHighlight[]> {
    const parsed = HighlightsPageSchema.safeParse(
      await this.get(`/highlights?page=${page}&perpage=${this.perPage}`),
    );
    if (!parsed.success) {
      throw new IntegrationError('Raindrop highlights response has an unexpected shape', { page });
    }

    return parsed.data.items.map((item) => ({
      external_key: `raindrop_highlight_${item._id}`,
      text: item.text.trim(),
      color: (item.color ?? 'yellow').toLowerCase(),
      url: item.link || null,
      title: item.title || null,
      created: item.created ?? null,
    }));
  }

  /**
   * Page through every highlight until a short or empty page.
   */
  async getAllHighlights(opts: SyncOptions = {}): Promise<RaindropHighlight[]> {
    const all: RaindropHighlight[] = [];
    for (let page = 0; ; page++) {
      const batch = await this.getHighlights(page);
      all.push(...batch);
      if (batch.length < this.perPage) break;
    }

    const since = opts.since?.getTime();
    if (since === undefined) return all;
    return all.filter((h) => h.created !== null && new Date(h.created).getTime() > since);
  }

  private async get(endpoint: string): Promise<unknown> {
    if (!this.isConfigured()) {
      throw new IntegrationError('Raindrop token not configured (raindrop.token or RECALLDECK_RAINDROP_TOKEN)');
    }

    const url = `${this.baseUrl}${endpoint}`;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Authorization: `Bearer ${this.token}` },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new IntegrationError(`Raindrop request timed out after ${this.timeoutMs}ms`, { url });
      }
      throw new IntegrationError(`Raindrop request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
      });
    }

    if (response.status === 401) {
      throw new IntegrationError('Invalid Raindrop token', { status: 401 });
    }
    if (!response.ok) {
      throw new IntegrationError(`Raindrop API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        url,
      });
    }

    try {
      return await response.json();
    } catch {
      throw new IntegrationError('Raindrop response is not valid JSON', { url });
    }
  }
}

/**
 * Import Raindrop highlights as pending sources. Already-imported highlights
 * are counted as duplicates; highlights in the flashcard color are counted
 * as ready for drafting.
 */
export async function syncRaindropHighlights(
  client: RaindropClient,
  lifecycle: LifecycleController,
  opts: SyncOptions = {},
): Promise<SyncResult> {
  const status = await client.testConnection();
  if (!status.connected) {
    throw new IntegrationError(status.message);
  }

  const highlights = await client.getAllHighlights(opts);
  let synced = 0;
  let skipped = 0;
  let flashcardReady = 0;

  for (const highlight of highlights) {
    if (!highlight.text) continue;

    const { created } = lifecycle.createSource(
      {
        text: highlight.text,
        origin_kind: 'link_import',
        origin_url: highlight.url,
        origin_title: highlight.title,
        external_key: highlight.external_key,
        highlight_color: highlight.color,
      },
      { strict: false },
    );

    if (!created) {
      skipped++;
      continue;
    }
    synced++;
    if (highlight.color === client.flashcardColor) flashcardReady++;
  }

  logger.info(
    { synced, skipped_duplicates: skipped, flashcard_ready: flashcardReady, total: highlights.length },
    'Raindrop sync finished',
  );

  return {
    synced,
    skipped_duplicates: skipped,
    flashcard_ready: flashcardReady,
    total_highlights: highlights.length,
    message: `Synced ${synced} new highlights, ${flashcardReady} ready for card generation`,
  };
}
