import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LlmCardDrafter, StaticDrafter } from '../drafter.js';
import { LlmClient } from '../client.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { DrafterError } from '../../shared/errors.js';
import type { Source } from '../../model/types.js';

const SOURCE: Source = {
  id: 'src-1',
  text: 'A closure captures variables from its enclosing scope.',
  origin_kind: 'manual_entry',
  origin_url: null,
  origin_title: 'JS notes',
  external_key: null,
  highlight_color: null,
  status: 'pending_review',
  created_at: '2024-03-10T12:00:00.000Z',
  updated_at: '2024-03-10T12:00:00.000Z',
  tags: [],
  card_count: 0,
};

const fetchMock = vi.fn<typeof fetch>();

function drafting(overrides: Partial<ReturnType<typeof generateDefaultConfig>['drafting']> = {}) {
  return { ...generateDefaultConfig().drafting, model: 'test-model', ...overrides };
}

function completion(content: string): Response {
  return new Response(
    JSON.stringify({ model: 'test-model', choices: [{ message: { content } }], usage: { total_tokens: 42 } }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('LlmCardDrafter', () => {
  it('prompts the chat endpoint and parses the drafts', async () => {
    fetchMock.mockResolvedValue(completion('[{"front":"What does a closure capture?","back":"Enclosing variables"}]'));
    const drafter = LlmCardDrafter.fromConfig(drafting({ api_key: 'test-secret', base_url: 'http://llm.test/v1/' }));

    const drafts = await drafter.draft(SOURCE);
    expect(drafts).toEqual([{ front: 'What does a closure capture?', back: 'Enclosing variables', hint: null, tags: [] }]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'test-model', max_tokens: 1024 });
  });

  it('omits the Authorization header without an api key', async () => {
    fetchMock.mockResolvedValue(completion('[{"front":"Q","back":"A"}]'));
    await LlmCardDrafter.fromConfig(drafting()).draft(SOURCE);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('caps drafts at max_cards', async () => {
    const cards = JSON.stringify([1, 2, 3].map((n) => ({ front: `Q${n}`, back: `A${n}` })));
    fetchMock.mockResolvedValue(completion(cards));
    const drafts = await LlmCardDrafter.fromConfig(drafting({ max_cards: 2 })).draft(SOURCE);
    expect(drafts).toHaveLength(2);
  });

  it('raises DrafterError on HTTP errors', async () => {
    fetchMock.mockResolvedValue(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));
    await expect(LlmCardDrafter.fromConfig(drafting()).draft(SOURCE)).rejects.toThrow(DrafterError);
  });

  it('raises DrafterError on network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    await expect(LlmCardDrafter.fromConfig(drafting()).draft(SOURCE)).rejects.toThrow('LLM request failed: fetch failed');
  });

  it('raises DrafterError on empty content', async () => {
    fetchMock.mockResolvedValue(completion(''));
    await expect(LlmCardDrafter.fromConfig(drafting()).draft(SOURCE)).rejects.toThrow('LLM returned empty content');
  });

  it('refuses to run when no model is configured', async () => {
    const drafter = new LlmCardDrafter(new LlmClient(drafting({ model: '' })), 5);
    await expect(drafter.draft(SOURCE)).rejects.toThrow(DrafterError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('StaticDrafter', () => {
  it('returns a copy of the fixed drafts', async () => {
    const drafts = [{ front: 'Q', back: 'A' }];
    const result = await new StaticDrafter(drafts).draft();
    expect(result).toEqual(drafts);
    expect(result).not.toBe(drafts);
  });
});

describe('LlmClient.checkAvailable', () => {
  function models(ids: string[]): Response {
    return new Response(JSON.stringify({ data: ids.map((id) => ({ id })) }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  it('finds the configured model in the model list', async () => {
    fetchMock.mockResolvedValue(models(['other', 'test-model']));
    const client = new LlmClient(drafting({ base_url: 'http://llm.test/v1' }));

    expect(await client.checkAvailable()).toEqual({ ok: true, message: 'LLM reachable with model test-model' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://llm.test/v1/models');
  });

  it('lists what is available when the model is missing', async () => {
    fetchMock.mockResolvedValue(models(['other']));
    const client = new LlmClient(drafting());
    expect(await client.checkAvailable()).toEqual({
      ok: false,
      message: "LLM reachable but model 'test-model' not found. Available: other",
    });
  });

  it('reports an unreachable endpoint', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));
    const client = new LlmClient(drafting({ base_url: 'http://llm.test/v1' }));
    expect(await client.checkAvailable()).toEqual({
      ok: false,
      message: 'LLM not reachable at http://llm.test/v1: ECONNREFUSED',
    });
  });
});
