import { z } from 'zod';
import type { CardDraft } from '../model/types.js';
import { logger } from '../shared/logger.js';

const FALLBACK_FRONT = 'What is the key point of this text?';
const FALLBACK_BACK_CHARS = 500;

const LlmCardSchema = z.object({
  front: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1)),
  back: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1)),
  hint: z.string().nullish().catch(null),
  tags: z.array(z.string()).catch([]),
});

/**
 * Strip markdown code fences from LLM output.
 */
function stripCodeFences(raw: string): string {
  return raw
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Accept a bare array, an object with a `cards` array, or a single card object.
 */
function toCandidateList(json: unknown): unknown[] {
  if (Array.isArray(json)) return json;
  if (json !== null && typeof json === 'object') {
    const cards: unknown = 'cards' in json ? json.cards : undefined;
    return Array.isArray(cards) ? cards : [json];
  }
  return [];
}

function validateCandidates(candidates: unknown[]): CardDraft[] {
  const drafts: CardDraft[] = [];
  for (const candidate of candidates) {
    const result = LlmCardSchema.safeParse(candidate);
    if (result.success) {
      drafts.push({
        front: result.data.front,
        back: result.data.back,
        hint: result.data.hint?.trim() || null,
        tags: result.data.tags,
      });
    } else {
      logger.debug({ error: result.error.message }, 'Dropping malformed card draft');
    }
  }
  return drafts;
}

function tryParseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/**
 * Turn raw LLM output into card drafts.
 *
 * Falls back to extracting the first [...] block when the output is not
 * JSON, and to a single "key point" card when nothing parses at all.
 */
export function parseCardDrafts(rawOutput: string, maxCards: number): CardDraft[] {
  const cleaned = stripCodeFences(rawOutput);

  let parsed = tryParseJson(cleaned);
  if (!parsed.ok) {
    const arrayMatch = cleaned.match(/\[[\s\S]*\]/);
    if (arrayMatch) parsed = tryParseJson(arrayMatch[0]);
  }

  if (!parsed.ok) {
    logger.warn({ raw: cleaned.slice(0, 200) }, 'LLM output is not JSON, using fallback card');
    return [
      {
        front: FALLBACK_FRONT,
        back: cleaned.slice(0, FALLBACK_BACK_CHARS) || FALLBACK_FRONT,
        hint: null,
        tags: [],
      },
    ];
  }

  return validateCandidates(toCandidateList(parsed.value)).slice(0, maxCards);
}
