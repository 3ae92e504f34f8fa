/**
 * Traces adversaries back to the source documents they were published in.
 *
 * A SourceIndex is built per batch from explicit configuration and holds the
 * normalized text of every candidate document. Lookups are word-bounded
 * phrase searches, so "TROLL" does not match "CONTROLLER".
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

import type { Adversary } from '../types/adversary.js';
import type { PdfPage, SourceDocument, SourceKind, SourceMatch } from '../types/source.js';
import type { ConverterConfig } from '../config/schema.js';
import { cleanText } from '../ingestion/text-cleaner.js';
import { linearizePage } from '../ingestion/parsers/pdf-layout.js';
import { loadPdfPages } from '../ingestion/parsers/pdf-loader.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('source-finder');

/**
 * Uppercase, drop everything but letters, digits and spaces, collapse spaces.
 */
export function normalizeForSearch(text: string): string {
  return text
    .toUpperCase()
    .replace(/[^A-Z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Word-bounded search of normalized text. Both arguments must already be
 * normalized.
 */
export function containsPhrase(haystack: string, needle: string): boolean {
  if (!needle) return false;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    const before = index === 0 || haystack[index - 1] === ' ';
    const end = index + needle.length;
    const after = end === haystack.length || haystack[end] === ' ';
    if (before && after) return true;
    index = haystack.indexOf(needle, index + 1);
  }
  return false;
}

export function createSourceDocument(
  fileName: string,
  displayName: string,
  kind: SourceKind,
  pages: readonly string[],
): SourceDocument {
  return {
    fileName,
    displayName,
    kind,
    pages: pages.map((page) => normalizeForSearch(cleanText(page))),
  };
}

export class SourceIndex {
  constructor(
    private readonly documents: readonly SourceDocument[],
    /** Origin file name to preferred display name. */
    private readonly canonicalSources: Readonly<Record<string, string>> = {},
  ) {}

  get size(): number {
    return this.documents.length;
  }

  private search(document: SourceDocument, needle: string): SourceMatch | undefined {
    const page = document.pages.findIndex((text) => containsPhrase(text, needle));
    if (page === -1) return undefined;
    return document.kind === 'pdf'
      ? { sourceName: document.displayName, sourcePage: page + 1 }
      : { sourceName: document.displayName };
  }

  /**
   * Find the source of a record by name. When several documents contain the
   * name, the canonical source for the record's origin file wins, otherwise
   * the first document in configuration order.
   */
  attribute(record: Adversary): SourceMatch | undefined {
    const needle = normalizeForSearch(record.name);
    if (!needle) return undefined;

    const preferred = record.sourceFile ? this.canonicalSources[basename(record.sourceFile)] : undefined;
    if (preferred) {
      for (const document of this.documents) {
        if (document.displayName !== preferred) continue;
        const match = this.search(document, needle);
        if (match) return match;
      }
    }

    for (const document of this.documents) {
      const match = this.search(document, needle);
      if (match) return match;
    }
    return undefined;
  }
}

/**
 * Fill a record's source fields from the index unless it already has a
 * source. Returns true when a source was added.
 */
export function applyAttribution(record: Adversary, index: SourceIndex): boolean {
  if (record.sourceName) return false;
  const match = index.attribute(record);
  if (!match) return false;
  record.sourceName = match.sourceName;
  if (match.sourcePage !== undefined) record.sourcePage = match.sourcePage;
  return true;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export type PdfPageLoader = (data: Uint8Array, file?: string) => Promise<PdfPage[]>;

export interface LoadSourceOptions {
  /** Directory holding the configured source files. */
  sourcesDir: string;
  loadPdf?: PdfPageLoader;
}

/**
 * Build an index from the configured sources that exist on disk. A source
 * that cannot be read is logged and left out.
 */
export async function loadSourceIndex(config: ConverterConfig, options: LoadSourceOptions): Promise<SourceIndex> {
  const loadPdf = options.loadPdf ?? loadPdfPages;

  const documents = await Promise.all(
    config.sources.map(async (entry): Promise<SourceDocument | undefined> => {
      const path = join(options.sourcesDir, entry.file);
      if (!existsSync(path)) {
        logger.debug(`Source not present: ${path}`);
        return undefined;
      }

      try {
        if (entry.kind === 'pdf') {
          const pages = await loadPdf(await readFile(path), entry.file);
          const texts = pages.map((page) => linearizePage(page).join('\n'));
          return createSourceDocument(entry.file, entry.displayName, 'pdf', texts);
        }
        const text = await readFile(path, 'utf-8');
        return createSourceDocument(entry.file, entry.displayName, 'md', [text]);
      } catch (err) {
        logger.warn(`Could not read source ${path}: ${err instanceof Error ? err.message : String(err)}`);
        return undefined;
      }
    }),
  );

  const loaded = documents.filter((d): d is SourceDocument => d !== undefined);
  logger.debug(`Source index holds ${loaded.length} of ${config.sources.length} configured sources`);
  return new SourceIndex(loaded, config.canonicalSources);
}
