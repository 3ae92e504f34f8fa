/**
 * Unit tests for the standardized Markdown writer.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  renderMarkdown,
  renderStatsLine,
  renderFeature,
  renderSourceLine,
  writeAdversaryFiles,
} from '@/reporting/markdown-writer.js';
import { parseMarkdownDocument } from '@/ingestion/normalizer.js';
import { createAdversary } from '@/model/adversary.js';
import type { Adversary } from '@/types/adversary.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeAdversary(overrides: Partial<Adversary> = {}): Adversary {
  return createAdversary('Goblin Sneak', {
    tier: 1,
    adversaryType: 'Skulk',
    description: 'A wiry goblin.',
    motivesTactics: 'Ambush, steal',
    difficulty: 11,
    thresholdMinor: 5,
    thresholdMajor: 9,
    hp: 3,
    stress: 2,
    attack: {
      modifier: 1,
      weaponName: 'Dagger',
      range: 'Melee',
      damage: { kind: 'dice', dice: '1d6', count: 1, sides: 6, bonus: 1, damageType: 'phy' },
    },
    experience: 'Stealth +2',
    features: [{ name: 'Backstab', featureType: 'Passive', description: 'Deal extra damage.' }],
    sourceName: 'Test Bestiary',
    sourcePage: 4,
    ...overrides,
  });
}

const FULL_RENDER = [
  '# GOBLIN SNEAK',
  '',
  '***Tier 1 Skulk***  ',
  '*A wiry goblin.*  ',
  '**Motives & Tactics:** Ambush, steal',
  '',
  '> **Difficulty:** 11 | **Thresholds:** 5/9 | **HP:** 3 | **Stress:** 2  ',
  '> **ATK:** +1 | **Dagger:** Melee | 1d6+1 phy  ',
  '> **Experience:** Stealth +2',
  '',
  '## FEATURES',
  '',
  '***Backstab - Passive:*** Deal extra damage.',
  '',
  '---',
  '',
  '*Source: Test Bestiary, p. 4*',
  '',
].join('\n');

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

describe('renderMarkdown', () => {
  it('renders a complete record', () => {
    expect(renderMarkdown(makeAdversary())).toBe(FULL_RENDER);
  });

  it('renders a bare record as just the heading', () => {
    expect(renderMarkdown(createAdversary('Marsh Light'))).toBe('# MARSH LIGHT\n');
  });

  it('omits the source divider without a source', () => {
    const output = renderMarkdown(makeAdversary({ sourceName: undefined, sourcePage: undefined }));
    expect(output.endsWith('***Backstab - Passive:*** Deal extra damage.\n')).toBe(true);
    expect(output).not.toContain('---');
  });

  it('renders an environment without a stat block', () => {
    const record = createAdversary('Collapsing Bridge', {
      tier: 1,
      adversaryType: 'Traversal',
      motivesTactics: 'Crumble, strand',
      difficulty: 12,
    });
    expect(renderMarkdown(record)).toBe(
      [
        '# COLLAPSING BRIDGE',
        '',
        '***Tier 1 Traversal***  ',
        '**Motives & Tactics:** Crumble, strand',
        '',
        '> **Difficulty:** 12  ',
        '',
      ].join('\n'),
    );
  });

  it('is stable when its output is parsed and rendered again', () => {
    const first = renderMarkdown(makeAdversary());
    const parsed = parseMarkdownDocument(first);

    expect(parsed.records).toHaveLength(1);
    expect(renderMarkdown(parsed.records[0])).toBe(first);
  });

  it.each(['Horde (3/HP)', 'Bruiser/Leader', 'Minion, Undead'])(
    'parses back into the same record as %s',
    (adversaryType) => {
      const record = makeAdversary({
        name: 'REED STALKER',
        tier: 2,
        adversaryType,
        thresholdMinor: 'None',
        thresholdMajor: 'None',
        features: [
          { name: 'Ambush', featureType: 'Passive', description: 'Gains advantage.' },
          { name: 'Fade Out', featureType: 'Fear Action', description: 'Spend a Fear to vanish.' },
          { name: 'Snap Back', featureType: 'Reaction', description: 'Strike when struck.' },
        ],
      });

      expect(parseMarkdownDocument(renderMarkdown(record)).records[0]).toEqual(record);
    },
  );
});

describe('renderStatsLine', () => {
  it('skips absent fields', () => {
    const record = makeAdversary({ thresholdMinor: undefined, thresholdMajor: undefined, stress: undefined });
    expect(renderStatsLine(record)).toBe('**Difficulty:** 11 | **HP:** 3');
  });

  it('renders None thresholds', () => {
    const record = makeAdversary({ thresholdMinor: 'None', thresholdMajor: 'None' });
    expect(renderStatsLine(record)).toBe('**Difficulty:** 11 | **Thresholds:** None | **HP:** 3 | **Stress:** 2');
  });

  it('returns undefined when every field is absent', () => {
    expect(renderStatsLine(createAdversary('Marsh Light'))).toBeUndefined();
  });
});

describe('renderFeature', () => {
  it('trims a missing description', () => {
    expect(renderFeature({ name: 'Lurk', featureType: 'Passive', description: '' })).toBe('***Lurk - Passive:***');
  });
});

describe('renderSourceLine', () => {
  it('leaves out the page when unknown', () => {
    expect(renderSourceLine(makeAdversary({ sourcePage: undefined }))).toBe('*Source: Test Bestiary*');
  });
});

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

describe('writeAdversaryFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'adversaries-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one file per record named after it', async () => {
    const result = await writeAdversaryFiles([makeAdversary({ name: 'Goblin Sneak!' })], dir);

    const path = join(dir, 'Goblin Sneak.md');
    expect(result.written).toEqual([{ name: 'Goblin Sneak!', path }]);
    expect(result.conflicts).toEqual([]);
    expect(readFileSync(path, 'utf-8')).toBe(renderMarkdown(makeAdversary({ name: 'Goblin Sneak!' })));
  });

  it('skips existing files unless overwrite is set', async () => {
    const path = join(dir, 'Goblin Sneak.md');
    writeFileSync(path, 'hand edited\n');

    const skipped = await writeAdversaryFiles([makeAdversary()], dir);
    expect(skipped.written).toEqual([]);
    expect(skipped.conflicts).toEqual([{ name: 'Goblin Sneak', path }]);
    expect(readFileSync(path, 'utf-8')).toBe('hand edited\n');

    const replaced = await writeAdversaryFiles([makeAdversary()], dir, { overwrite: true });
    expect(replaced.written).toHaveLength(1);
    expect(readFileSync(path, 'utf-8')).toBe(FULL_RENDER);
  });

  it('treats a second record with the same file name as a conflict', async () => {
    const result = await writeAdversaryFiles(
      [makeAdversary(), makeAdversary({ tier: 2 })],
      dir,
      { overwrite: true },
    );

    expect(result.written).toHaveLength(1);
    expect(result.conflicts).toEqual([{ name: 'Goblin Sneak', path: join(dir, 'Goblin Sneak.md') }]);
    expect(existsSync(join(dir, 'Goblin Sneak.md'))).toBe(true);
  });
});
