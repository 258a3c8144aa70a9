import { describe, it, expect } from 'vitest';
import { parseCardDrafts } from '../parse.js';

describe('parseCardDrafts', () => {
  it('parses a fenced JSON array', () => {
    const raw = '```json\n[{"front":"Q1","back":"A1","hint":"H","tags":["x"]}]\n```';
    expect(parseCardDrafts(raw, 5)).toEqual([{ front: 'Q1', back: 'A1', hint: 'H', tags: ['x'] }]);
  });

  it('accepts an object with a cards array', () => {
    const raw = JSON.stringify({ cards: [{ front: 'Q', back: 'A' }] });
    expect(parseCardDrafts(raw, 5)).toEqual([{ front: 'Q', back: 'A', hint: null, tags: [] }]);
  });

  it('accepts a single card object', () => {
    expect(parseCardDrafts('{"front":"Q","back":"A"}', 5)).toHaveLength(1);
  });

  it('extracts the array from surrounding prose', () => {
    const raw = 'Here you go: [{"front":"Q","back":"A"}] hope it helps';
    expect(parseCardDrafts(raw, 5).map((d) => d.front)).toEqual(['Q']);
  });

  it('drops malformed items and coerces loose fields', () => {
    const raw = JSON.stringify([
      { front: 'Missing back' },
      { front: 42, back: 'forty-two', tags: 'not-a-list', hint: '  ' },
    ]);
    expect(parseCardDrafts(raw, 5)).toEqual([{ front: '42', back: 'forty-two', hint: null, tags: [] }]);
  });

  it('caps the number of drafts', () => {
    const raw = JSON.stringify([1, 2, 3].map((n) => ({ front: `Q${n}`, back: `A${n}` })));
    expect(parseCardDrafts(raw, 2).map((d) => d.front)).toEqual(['Q1', 'Q2']);
  });

  it('falls back to a single key-point card for non-JSON output', () => {
    expect(parseCardDrafts('Ownership means one owner per value.', 5)).toEqual([
      {
        front: 'What is the key point of this text?',
        back: 'Ownership means one owner per value.',
        hint: null,
        tags: [],
      },
    ]);
  });
});
