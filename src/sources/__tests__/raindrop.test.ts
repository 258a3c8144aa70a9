import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { RaindropClient, syncRaindropHighlights } from '../raindrop.js';
import { LifecycleController } from '../../lifecycle/controller.js';
import { SqliteStore } from '../../store/sqliteStore.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { IntegrationError } from '../../shared/errors.js';
import { createTestClock, openTestDb } from '../../__tests__/helpers.js';

const BASE = 'https://raindrop.test/rest/v1';

const fetchMock = vi.fn<typeof fetch>();

let db: Database.Database;
let store: SqliteStore;
let lifecycle: LifecycleController;

function raindrop(overrides: Partial<ReturnType<typeof generateDefaultConfig>['raindrop']> = {}) {
  return { ...generateDefaultConfig().raindrop, token: 'test-token', base_url: `${BASE}/`, per_page: 2, ...overrides };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const PAGES: Record<string, unknown[]> = {
  '0': [
    { _id: 'h1', text: '  Ownership moves on assignment  ', color: 'orange', link: 'https://example.test/a', title: 'Rust book', created: '2024-03-01T10:00:00.000Z' },
    { _id: 'h2', text: 'Borrows never outlive the owner', link: 'https://example.test/a', title: 'Rust book', created: '2024-03-05T10:00:00.000Z' },
  ],
  '1': [{ _id: 42, text: 'Lifetimes are inferred', color: 'Orange', link: '', created: '2024-03-09T10:00:00.000Z' }],
};

function serveRaindrop(): void {
  fetchMock.mockImplementation((input) => {
    const url = new URL(String(input));
    if (url.pathname.endsWith('/user')) {
      return Promise.resolve(json({ result: true, user: { email: 'reader@example.test' } }));
    }
    return Promise.resolve(json({ result: true, items: PAGES[url.searchParams.get('page') ?? ''] ?? [] }));
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
  db = openTestDb();
  store = new SqliteStore(db);
  lifecycle = new LifecycleController(store, { clock: createTestClock().clock });
});

afterEach(() => {
  vi.unstubAllGlobals();
  db.close();
});

describe('RaindropClient', () => {
  it('reports the connected account', async () => {
    serveRaindrop();
    const client = new RaindropClient(raindrop());

    expect(await client.testConnection()).toEqual({ connected: true, message: 'Connected as reader@example.test' });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE}/user`);
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('does not call the API without a token', async () => {
    const client = new RaindropClient(raindrop({ token: '' }));
    expect(client.isConfigured()).toBe(false);
    expect(await client.testConnection()).toEqual({
      connected: false,
      message: 'Raindrop token not configured (raindrop.token or RECALLDECK_RAINDROP_TOKEN)',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports a rejected token', async () => {
    fetchMock.mockResolvedValue(json({ result: false }, 401));
    const client = new RaindropClient(raindrop());
    expect(await client.testConnection()).toEqual({ connected: false, message: 'Invalid Raindrop token' });
  });

  it('reports network failures', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));
    const client = new RaindropClient(raindrop());
    expect(await client.testConnection()).toEqual({
      connected: false,
      message: 'Raindrop request failed: ECONNREFUSED',
    });
  });

  it('pages through highlights until a short page', async () => {
    serveRaindrop();
    const highlights = await new RaindropClient(raindrop()).getAllHighlights();

    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}/highlights?page=0&perpage=2`,
      `${BASE}/highlights?page=1&perpage=2`,
    ]);
    expect(highlights).toEqual([
      {
        external_key: 'raindrop_highlight_h1',
        text: 'Ownership moves on assignment',
        color: 'orange',
        url: 'https://example.test/a',
        title: 'Rust book',
        created: '2024-03-01T10:00:00.000Z',
      },
      {
        external_key: 'raindrop_highlight_h2',
        text: 'Borrows never outlive the owner',
        color: 'yellow',
        url: 'https://example.test/a',
        title: 'Rust book',
        created: '2024-03-05T10:00:00.000Z',
      },
      {
        external_key: 'raindrop_highlight_42',
        text: 'Lifetimes are inferred',
        color: 'orange',
        url: null,
        title: null,
        created: '2024-03-09T10:00:00.000Z',
      },
    ]);
  });

  it('keeps only highlights created after since', async () => {
    serveRaindrop();
    const highlights = await new RaindropClient(raindrop()).getAllHighlights({
      since: new Date('2024-03-04T00:00:00.000Z'),
    });
    expect(highlights.map((h) => h.external_key)).toEqual(['raindrop_highlight_h2', 'raindrop_highlight_42']);
  });

  it('rejects a malformed highlights page', async () => {
    fetchMock.mockResolvedValue(json({ items: 'nope' }));
    await expect(new RaindropClient(raindrop()).getHighlights(0)).rejects.toThrow(IntegrationError);
  });
});

describe('syncRaindropHighlights', () => {
  it('imports new highlights as pending link imports', async () => {
    serveRaindrop();
    const result = await syncRaindropHighlights(new RaindropClient(raindrop()), lifecycle);

    expect(result).toEqual({
      synced: 3,
      skipped_duplicates: 0,
      flashcard_ready: 2,
      total_highlights: 3,
      message: 'Synced 3 new highlights, 2 ready for card generation',
    });

    const imported = store.findSourceByExternalKey('link_import', 'raindrop_highlight_h1');
    expect(imported).toMatchObject({
      text: 'Ownership moves on assignment',
      origin_kind: 'link_import',
      origin_url: 'https://example.test/a',
      origin_title: 'Rust book',
      highlight_color: 'orange',
      status: 'pending_review',
    });
  });

  it('counts already-imported highlights as duplicates', async () => {
    serveRaindrop();
    const client = new RaindropClient(raindrop());
    await syncRaindropHighlights(client, lifecycle);

    const again = await syncRaindropHighlights(client, lifecycle);
    expect(again).toMatchObject({ synced: 0, skipped_duplicates: 3, flashcard_ready: 0, total_highlights: 3 });
    expect(store.listSources().total).toBe(3);
  });

  it('fails before importing anything when the connection is refused', async () => {
    fetchMock.mockResolvedValue(json({}, 401));
    await expect(syncRaindropHighlights(new RaindropClient(raindrop()), lifecycle)).rejects.toThrow(
      'Invalid Raindrop token',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(store.listSources().total).toBe(0);
  });
});
