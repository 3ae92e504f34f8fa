/**
 * Page geometry to reading-order text.
 *
 * Each page is checked for a two-column layout by looking for the widest gap
 * between fragment start positions in the central band of the page. Columns
 * are read left then right, each top to bottom.
 */

import type { PdfFragment, PdfLine, PdfPage } from '../../types/source.js';
import { cleanText, deduplicateText, isPageArtifact } from '../text-cleaner.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Column gaps must be centred inside this band of the page width. */
const CENTER_BAND_START = 0.2;
const CENTER_BAND_END = 0.8;

/** Minimum gap width, as a fraction of page width, to count as a gutter. */
const MIN_GAP_RATIO = 0.03;

/** Maximum share of fragments allowed to cross the split position. */
const MAX_STRADDLE_RATIO = 0.1;

/** Gap between fragments, relative to line height, that reads as a space. */
const SPACE_GAP_RATIO = 0.2;

export interface ColumnOptions {
  minGapRatio?: number;
  maxStraddleRatio?: number;
}

// ---------------------------------------------------------------------------
// Column detection
// ---------------------------------------------------------------------------

/**
 * Return the x position splitting a two-column page, or undefined for a
 * single-column page.
 */
export function detectColumnSplit(page: PdfPage, options: ColumnOptions = {}): number | undefined {
  const { fragments, width } = page;
  if (fragments.length < 2 || width <= 0) return undefined;

  const positions = [...new Set(fragments.map((f) => Math.round(f.x0)))].sort((a, b) => a - b);
  const bandStart = width * CENTER_BAND_START;
  const bandEnd = width * CENTER_BAND_END;

  let bestGap = 0;
  let bestSplit: number | undefined;

  for (let i = 0; i < positions.length - 1; i++) {
    const gapStart = positions[i];
    const gapEnd = positions[i + 1];
    const center = (gapStart + gapEnd) / 2;
    const gap = gapEnd - gapStart;
    if (center > bandStart && center < bandEnd && gap > bestGap) {
      bestGap = gap;
      bestSplit = center;
    }
  }

  const minGap = width * (options.minGapRatio ?? MIN_GAP_RATIO);
  if (bestSplit === undefined || bestGap < minGap) return undefined;

  // A gap between start positions can still sit under running text, e.g. a
  // full-width title. Reject splits that too many fragments cross.
  const split = bestSplit;
  const straddling = fragments.filter((f) => f.x0 < split && f.x1 > split).length;
  if (straddling / fragments.length > (options.maxStraddleRatio ?? MAX_STRADDLE_RATIO)) {
    return undefined;
  }

  return split;
}

// ---------------------------------------------------------------------------
// Line grouping
// ---------------------------------------------------------------------------

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Group fragments into lines by vertical proximity, top to bottom.
 */
export function groupIntoLines(fragments: readonly PdfFragment[]): PdfFragment[][] {
  if (fragments.length === 0) return [];

  const heights = fragments.map((f) => f.bottom - f.top).filter((h) => h > 0);
  const tolerance = Math.max(2, median(heights) * 0.5);
  const sorted = [...fragments].sort((a, b) => a.top - b.top || a.x0 - b.x0);

  const lines: PdfFragment[][] = [];
  let current: PdfFragment[] = [];
  let lineTop = sorted[0].top;

  for (const fragment of sorted) {
    if (current.length > 0 && fragment.top - lineTop > tolerance) {
      lines.push(current);
      current = [];
      lineTop = fragment.top;
    }
    current.push(fragment);
  }
  if (current.length > 0) lines.push(current);

  return lines.map((line) => line.sort((a, b) => a.x0 - b.x0));
}

/**
 * Join a line's fragments left to right. Fragments that touch are joined
 * directly; anything further apart gets one space.
 */
export function joinLine(line: readonly PdfFragment[]): string {
  let text = '';
  let previous: PdfFragment | undefined;

  for (const fragment of line) {
    if (previous) {
      const height = Math.max(previous.bottom - previous.top, fragment.bottom - fragment.top, 1);
      const gap = fragment.x0 - previous.x1;
      text += gap > height * SPACE_GAP_RATIO ? ` ${fragment.text}` : fragment.text;
    } else {
      text = fragment.text;
    }
    previous = fragment;
  }

  return text.trim();
}

// ---------------------------------------------------------------------------
// Linearization
// ---------------------------------------------------------------------------

/**
 * Reading-order lines of one page: left column, then right column.
 */
export function linearizePage(page: PdfPage, options: ColumnOptions = {}): string[] {
  const split = detectColumnSplit(page, options);
  const columns =
    split === undefined
      ? [page.fragments]
      : [page.fragments.filter((f) => f.x0 < split), page.fragments.filter((f) => f.x0 >= split)];

  return columns.flatMap((column) => groupIntoLines(column).map(joinLine));
}

export interface LinearizeOptions extends ColumnOptions {
  /** Lines dropped when they appear on their own. */
  runningHeaders?: readonly string[];
}

/**
 * One cleaned stream of lines for a whole document, each tagged with its page.
 * A page whose text layer repeats itself is cut where the repeat begins.
 */
export function linearizeDocument(pages: readonly PdfPage[], options: LinearizeOptions = {}): PdfLine[] {
  const lines: PdfLine[] = [];

  for (const page of pages) {
    const texts = linearizePage(page, options)
      .map((raw) => cleanText(raw).trim())
      .filter((text) => text && !isPageArtifact(text, options.runningHeaders));

    for (const text of deduplicateText(texts.join('\n')).split('\n')) {
      if (text) lines.push({ text, page: page.pageNumber });
    }
  }

  return lines;
}
