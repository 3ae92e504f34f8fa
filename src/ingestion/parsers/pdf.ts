/**
 * PDF block segmentation.
 *
 * Tier lines are the primary signal: each one closes the search for the
 * previous adversary and its name is found by looking back from it. When the
 * line just above a Tier line cannot be a name (it reads as prose or a stat
 * line), the nearest ALL-CAPS line within a short window is used instead.
 * Both passes are linear in the number of lines.
 */

import type { PdfLine, PdfPage, RawBlock } from '../../types/source.js';
import { EmptySourceError } from '../errors.js';
import { linearizeDocument, type LinearizeOptions } from './pdf-layout.js';
import { classifyLine, isAllCapsName, isTierLine } from './patterns.js';

/** How far above a Tier line the ALL-CAPS fallback looks for a name. */
const NAME_LOOKBACK = 5;

const MAX_NAME_LENGTH = 60;

/**
 * True when a line could be an adversary name: short, not a sentence, not a
 * structured stat-block line.
 */
function isPlausibleName(line: string): boolean {
  const text = line.trim();
  if (!text || text.length > MAX_NAME_LENGTH) return false;
  if (/[.!?]$/.test(text)) return false;
  if (!/^[A-Z0-9"'(]/.test(text)) return false;
  return classifyLine(text) === 'text';
}

/**
 * Index of the first line of the block whose Tier line is at `tierIndex`.
 * `floor` is the previous Tier line; the result is always above it.
 */
function resolveBlockStart(texts: readonly string[], tierIndex: number, floor: number): number {
  const above = tierIndex - 1;
  if (above <= floor) return tierIndex;

  // A name ending in ":" continues on the next line ("DRAGON LICH:" / "DECAY-BRINGER").
  const candidate = above - 1 > floor && texts[above - 1].trim().endsWith(':') ? above - 1 : above;
  if (isPlausibleName(texts[candidate])) return candidate;

  const limit = Math.max(floor + 1, tierIndex - NAME_LOOKBACK);
  for (let j = above - 1; j >= limit; j--) {
    if (isAllCapsName(texts[j])) {
      return j - 1 >= limit && texts[j - 1].trim().endsWith(':') && isAllCapsName(texts[j - 1]) ? j - 1 : j;
    }
  }

  // No name to be found; the block starts at its Tier line and fails to parse.
  return tierIndex;
}

/**
 * Line indexes at which adversary blocks start.
 */
export function findBlockStarts(texts: readonly string[]): number[] {
  const starts: number[] = [];
  let previousTier = -1;

  for (let i = 0; i < texts.length; i++) {
    if (!isTierLine(texts[i])) continue;
    starts.push(resolveBlockStart(texts, i, previousTier));
    previousTier = i;
  }

  return starts;
}

/**
 * Split a linearized document into one raw block per adversary. Lines before
 * the first block are front matter and are dropped.
 */
export function segmentPdfBlocks(lines: readonly PdfLine[], file?: string): RawBlock[] {
  const texts = lines.map((l) => l.text);
  const starts = findBlockStarts(texts);

  if (starts.length === 0) {
    throw new EmptySourceError(file);
  }

  return starts.map((start, index) => {
    const end = index + 1 < starts.length ? starts[index + 1] : lines.length;
    return {
      text: texts.slice(start, end).join('\n'),
      origin: 'pdf',
      dialect: 'pdf',
      page: lines[start].page,
      index,
    };
  });
}

export interface PdfBlockOptions extends LinearizeOptions {
  file?: string;
}

/**
 * Page geometry to raw blocks.
 */
export function extractPdfBlocks(pages: readonly PdfPage[], options: PdfBlockOptions = {}): RawBlock[] {
  return segmentPdfBlocks(linearizeDocument(pages, options), options.file);
}
