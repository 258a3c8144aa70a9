import { stringify as yamlStringify } from 'yaml';
import type { Card, Source } from '../model/types.js';
import { slugify, truncate } from '../shared/utils.js';

const INDEX_RECENT_SOURCES = 20;

function frontmatter(fields: Record<string, unknown>): string {
  const defined = Object.fromEntries(
    Object.entries(fields).filter(([, value]) => value !== undefined && value !== null),
  );
  return `---\n${yamlStringify(defined)}---`;
}

function sourceTitle(source: Source): string {
  return source.origin_title ?? truncate(source.text, 50);
}

export function sourceFileName(source: Source): string {
  return `${source.id}-${slugify(source.origin_title ?? source.text.slice(0, 30))}.md`;
}

export function cardFileName(card: Card): string {
  return `${card.id}-${slugify(card.front.slice(0, 30))}.md`;
}

function wikiLink(folder: 'sources' | 'cards', fileName: string, label: string): string {
  return `[[${folder}/${fileName.replace(/\.md$/, '')}|${label}]]`;
}

/**
 * Render a source as an Obsidian note, linking to its cards.
 */
export function renderSourceMarkdown(source: Source, cards: readonly Card[]): string {
  const lines: string[] = [
    frontmatter({
      id: source.id,
      type: 'source',
      origin_kind: source.origin_kind,
      status: source.status,
      created: source.created_at,
      updated: source.updated_at,
      tags: source.tags.length > 0 ? source.tags.map((t) => t.name) : undefined,
      url: source.origin_url,
    }),
    '',
    `# ${source.origin_title ?? 'Source'}`,
    '',
  ];

  if (source.origin_url) {
    lines.push(`[Original Source](${source.origin_url})`, '');
  }

  lines.push('## Highlight', '', ...source.text.split('\n').map((l) => `> ${l}`), '');

  if (cards.length > 0) {
    lines.push('## Cards', '');
    for (const card of cards) {
      lines.push(`- ${wikiLink('cards', cardFileName(card), truncate(card.front, 50))}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Render a card as an Obsidian note with its scheduling state in frontmatter.
 */
export function renderCardMarkdown(card: Card, source?: Source): string {
  const lines: string[] = [
    frontmatter({
      id: card.id,
      type: 'card',
      status: card.status,
      ease_factor: card.ease_factor,
      interval_days: card.interval_days,
      repetitions: card.repetitions,
      next_review: card.next_review,
      created: card.created_at,
      tags: card.tags.length > 0 ? card.tags.map((t) => t.name) : undefined,
      source_id: card.source_id,
    }),
    '',
    '## Question',
    '',
    card.front,
    '',
    '## Answer',
    '',
    card.back,
    '',
  ];

  if (card.hint) {
    lines.push('## Hint', '', card.hint, '');
  }

  if (source) {
    lines.push('## Source', '', `![[sources/${sourceFileName(source).replace(/\.md$/, '')}]]`, '');
  }

  return lines.join('\n');
}

export function renderIndexMarkdown(sources: readonly Source[], cardCount: number, generatedAt: string): string {
  const recent = [...sources]
    .sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0))
    .slice(0, INDEX_RECENT_SOURCES);

  return [
    frontmatter({ updated: generatedAt }),
    '',
    '# Learnings Index',
    '',
    `**${sources.length}** sources | **${cardCount}** cards`,
    '',
    '## Recent Sources',
    '',
    ...recent.map((s) => `- ${wikiLink('sources', sourceFileName(s), sourceTitle(s))}`),
    '',
  ].join('\n');
}
