/**
 * Unit tests for source attribution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  normalizeForSearch,
  containsPhrase,
  createSourceDocument,
  SourceIndex,
  applyAttribution,
  loadSourceIndex,
} from '@/attribution/source-finder.js';
import { createAdversary } from '@/model/adversary.js';
import { parseConfig } from '@/config/loader.js';
import type { PdfPage } from '@/types/source.js';

describe('normalizeForSearch', () => {
  it('uppercases and drops punctuation', () => {
    expect(normalizeForSearch('Dragon Lich:  Decay-Bringer')).toBe('DRAGON LICH DECAYBRINGER');
  });
});

describe('containsPhrase', () => {
  it('matches on word boundaries only', () => {
    expect(containsPhrase('THE CONTROLLER AND THE TROLL', 'TROLL')).toBe(true);
    expect(containsPhrase('THE CONTROLLER', 'TROLL')).toBe(false);
    expect(containsPhrase('ANY', '')).toBe(false);
  });
});

describe('SourceIndex', () => {
  const bestiary = createSourceDocument('bestiary.pdf', 'Test Bestiary', 'pdf', [
    'Introduction and credits',
    'GOBLIN SNEAK\nTier 1 Skulk\nOGRE',
  ]);
  const menagerie = createSourceDocument('menagerie.md', 'Test Menagerie', 'md', ['# Ogre\n# Marsh Light']);

  it('returns the 1-based page of a PDF match', () => {
    const index = new SourceIndex([bestiary, menagerie]);
    expect(index.attribute(createAdversary('Goblin Sneak'))).toEqual({ sourceName: 'Test Bestiary', sourcePage: 2 });
  });

  it('returns no page for a Markdown match', () => {
    const index = new SourceIndex([bestiary, menagerie]);
    expect(index.attribute(createAdversary('MARSH LIGHT'))).toEqual({ sourceName: 'Test Menagerie' });
  });

  it('prefers the first document in order', () => {
    const index = new SourceIndex([menagerie, bestiary]);
    expect(index.attribute(createAdversary('OGRE'))).toEqual({ sourceName: 'Test Menagerie' });
  });

  it('prefers the canonical source for the origin file', () => {
    const index = new SourceIndex([menagerie, bestiary], { 'ogres.pdf': 'Test Bestiary' });
    const record = createAdversary('OGRE', { sourceFile: 'ogres.pdf' });
    expect(index.attribute(record)).toEqual({ sourceName: 'Test Bestiary', sourcePage: 2 });
  });

  it('returns undefined when nothing matches', () => {
    expect(new SourceIndex([bestiary]).attribute(createAdversary('KRAKEN'))).toBeUndefined();
  });
});

describe('applyAttribution', () => {
  const index = new SourceIndex([createSourceDocument('b.pdf', 'Test Bestiary', 'pdf', ['OGRE'])]);

  it('fills missing source fields', () => {
    const record = createAdversary('OGRE');
    expect(applyAttribution(record, index)).toBe(true);
    expect(record.sourceName).toBe('Test Bestiary');
    expect(record.sourcePage).toBe(1);
  });

  it('keeps an existing source', () => {
    const record = createAdversary('OGRE', { sourceName: 'Elsewhere' });
    expect(applyAttribution(record, index)).toBe(false);
    expect(record.sourceName).toBe('Elsewhere');
  });
});

describe('loadSourceIndex', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sources-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the configured sources that exist', async () => {
    writeFileSync(join(dir, 'menagerie.md'), '## BOG HAG\n*Tier 2 Leader*\n');
    writeFileSync(join(dir, 'bestiary.pdf'), 'placeholder');

    const fakePage: PdfPage = {
      pageNumber: 1,
      width: 600,
      height: 800,
      fragments: [{ text: 'TROLL', x0: 40, x1: 65, top: 100, bottom: 110 }],
    };

    const config = parseConfig({
      sources: [
        { file: 'bestiary.pdf', displayName: 'Test Bestiary', kind: 'pdf' },
        { file: 'menagerie.md', displayName: 'Test Menagerie', kind: 'md' },
        { file: 'missing.md', displayName: 'Missing', kind: 'md' },
      ],
    });

    const index = await loadSourceIndex(config, { sourcesDir: dir, loadPdf: async () => [fakePage, fakePage] });

    expect(index.size).toBe(2);
    expect(index.attribute(createAdversary('Troll'))).toEqual({ sourceName: 'Test Bestiary', sourcePage: 1 });
    expect(index.attribute(createAdversary('Bog Hag'))).toEqual({ sourceName: 'Test Menagerie' });
  });

  it('leaves out a source that fails to load', async () => {
    writeFileSync(join(dir, 'broken.pdf'), 'placeholder');
    const config = parseConfig({ sources: [{ file: 'broken.pdf', displayName: 'Broken', kind: 'pdf' }] });

    const index = await loadSourceIndex(config, {
      sourcesDir: dir,
      loadPdf: async () => {
        throw new Error('bad xref table');
      },
    });

    expect(index.size).toBe(0);
  });
});
