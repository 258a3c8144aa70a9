import fs from 'node:fs';
import path from 'node:path';
import type { Card, Source } from '../model/types.js';
import type { ExportReader } from '../store/repository.js';
import type { Config } from '../shared/config.js';
import { ExportError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO, resolvePath } from '../shared/utils.js';
import { cardFileName, renderCardMarkdown, renderIndexMarkdown, renderSourceMarkdown, sourceFileName } from './markdown.js';

export interface ExportResult {
  sources_exported: number;
  cards_exported: number;
  export_path: string;
}

export interface ExportSnapshot {
  sources: Array<{ source: Source; cards: Card[] }>;
}

/**
 * Read approved sources with their non-draft cards.
 */
export function collectExportSnapshot(reader: ExportReader): ExportSnapshot {
  const { sources } = reader.listSources({ status: 'approved' });
  return {
    sources: sources.map((source) => ({
      source,
      cards: reader
        .listCards({ source_id: source.id })
        .cards.filter((card) => card.status !== 'draft'),
    })),
  };
}

/**
 * Write the snapshot as markdown notes under <vault>/<folder>.
 */
export function exportToVault(
  reader: ExportReader,
  opts: Config['export'],
  now: Date = new Date(),
): ExportResult {
  if (!opts.vault_path) {
    throw new ExportError('Export vault path is not configured (export.vault_path)');
  }
  const vaultPath = resolvePath(opts.vault_path);
  if (!fs.existsSync(vaultPath)) {
    throw new ExportError(`Export vault not found at ${vaultPath}`, { vault_path: vaultPath });
  }

  const basePath = path.join(vaultPath, opts.folder);
  const sourcesDir = path.join(basePath, 'sources');
  const cardsDir = path.join(basePath, 'cards');
  fs.mkdirSync(sourcesDir, { recursive: true });
  fs.mkdirSync(cardsDir, { recursive: true });

  const snapshot = collectExportSnapshot(reader);
  let cardCount = 0;

  for (const { source, cards } of snapshot.sources) {
    fs.writeFileSync(path.join(sourcesDir, sourceFileName(source)), renderSourceMarkdown(source, cards), 'utf-8');
    for (const card of cards) {
      fs.writeFileSync(path.join(cardsDir, cardFileName(card)), renderCardMarkdown(card, source), 'utf-8');
      cardCount++;
    }
  }

  const sources = snapshot.sources.map((entry) => entry.source);
  fs.writeFileSync(path.join(basePath, 'index.md'), renderIndexMarkdown(sources, cardCount, nowISO(now)), 'utf-8');

  logger.info({ sources: sources.length, cards: cardCount, path: basePath }, 'Markdown export complete');
  return { sources_exported: sources.length, cards_exported: cardCount, export_path: basePath };
}
