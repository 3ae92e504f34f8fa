/**
 * Unit tests for the PDF text-run splitter. Loading real documents is covered
 * by the layout and segmentation tests through hand-built pages.
 */

import { describe, it, expect } from 'vitest';
import { splitRunIntoWords } from '@/ingestion/parsers/pdf-loader.js';

describe('splitRunIntoWords', () => {
  it('estimates word boxes from character offsets', () => {
    expect(splitRunIntoWords('Tier 1 Minion', 40, 65, 100, 110)).toEqual([
      { text: 'Tier', x0: 40, x1: 60, top: 100, bottom: 110 },
      { text: '1', x0: 65, x1: 70, top: 100, bottom: 110 },
      { text: 'Minion', x0: 75, x1: 105, top: 100, bottom: 110 },
    ]);
  });

  it('returns nothing for an empty run', () => {
    expect(splitRunIntoWords('', 40, 0, 100, 110)).toEqual([]);
  });
});
