/**
 * Unit tests for the text cleaner.
 *
 * Tests: cleanText, normalizeWhitespace, isPageArtifact, stripPageArtifacts,
 * joinWrappedLines
 */

import { describe, it, expect } from 'vitest';
import {
  deduplicateText,
  cleanText,
  normalizeWhitespace,
  isPageArtifact,
  stripPageArtifacts,
  joinWrappedLines,
} from '@/ingestion/text-cleaner.js';

describe('cleanText', () => {
  it('expands ligature code points', () => {
    expect(cleanText('\uFB01re \uFB02ail e\uFB00ect')).toBe('fire flail effect');
  });

  it('rejoins words split after a ligature', () => {
    expect(cleanText('Diffi culty: 14')).toBe('Difficulty: 14');
    expect(cleanText('a fi re in the fi eld')).toBe('a fire in the field');
  });

  it('leaves real two-word phrases alone', () => {
    expect(cleanText('fi x the door')).toBe('fi x the door');
  });

  it('does not join across line breaks', () => {
    expect(cleanText('Diffi\nculty')).toBe('Diffi\nculty');
  });

  it('maps dashes and smart quotes to ASCII', () => {
    expect(cleanText('Claws \u2014 Action: it\u2019s \u201Cbad\u201D \u22121')).toBe(
      'Claws - Action: it\'s "bad" -1',
    );
  });

  it('removes control characters, BOM and soft hyphens', () => {
    expect(cleanText('\uFEFFsha\u00ADdow\u0007 beast\u200B')).toBe('shadow beast');
  });

  it('normalizes line endings', () => {
    expect(cleanText('one\r\ntwo\rthree')).toBe('one\ntwo\nthree');
  });

  it('is idempotent', () => {
    const once = cleanText('  The \uFB02ames   rise\u2014Diffi culty  \r\n\r\n\r\n\r\nnext ');
    expect(cleanText(once)).toBe(once);
  });
});

describe('normalizeWhitespace', () => {
  it('collapses runs, trims line ends and limits blank lines', () => {
    expect(normalizeWhitespace('a \t b  \n\n\n\nc   ')).toBe('a b\n\nc');
  });
});

describe('isPageArtifact', () => {
  it('matches standalone page numbers', () => {
    expect(isPageArtifact('12')).toBe(true);
    expect(isPageArtifact('Page 4')).toBe(true);
    expect(isPageArtifact('3 of 40')).toBe(true);
  });

  it('matches running headers case-insensitively', () => {
    expect(isPageArtifact('Adversaries', ['ADVERSARIES'])).toBe(true);
  });

  it('ignores content lines and blanks', () => {
    expect(isPageArtifact('HP: 12')).toBe(false);
    expect(isPageArtifact('   ')).toBe(false);
  });
});

describe('stripPageArtifacts', () => {
  it('drops artifact lines only', () => {
    expect(stripPageArtifacts('SRD\nGOBLIN\n7\nTier 1 Minion', ['SRD'])).toBe('GOBLIN\nTier 1 Minion');
  });
});

describe('joinWrappedLines', () => {
  it('joins with single spaces', () => {
    expect(joinWrappedLines(['A hulking  ', '', ' brute of stone.'])).toBe('A hulking brute of stone.');
  });

  it('repairs line-break hyphenation in PDF text', () => {
    expect(joinWrappedLines(['It lumbers for-', 'ward slowly'], { pdf: true })).toBe('It lumbers forward slowly');
  });

  it('keeps the hyphen before an uppercase continuation', () => {
    expect(joinWrappedLines(['DECAY-', 'BRINGER'], { pdf: true })).toBe('DECAY-BRINGER');
  });

  it('leaves hyphens alone outside PDF text', () => {
    expect(joinWrappedLines(['for-', 'ward'])).toBe('for- ward');
  });
});

describe('deduplicateText', () => {
  const goblin =
    'GOBLIN\nTier 1 Minion\nA wiry goblin that lurks in reed beds and steals bright things from careless travelers at dusk.';
  const ogre =
    'OGRE\nTier 2 Bruiser\nA hulking brute that smashes wagons, guards bridges and demands tolls in stolen silver coins.';

  it('cuts text that repeats itself in its second half', () => {
    expect(deduplicateText(`${goblin}\n${goblin}`)).toBe(goblin);
  });

  it('keeps text without a repeat', () => {
    const text = `${goblin}\n${ogre}`;
    expect(deduplicateText(text)).toBe(text);
  });

  it('leaves text shorter than two windows alone', () => {
    expect(deduplicateText('GOBLIN\nGOBLIN')).toBe('GOBLIN\nGOBLIN');
  });
});
