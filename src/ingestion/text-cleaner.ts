/**
 * Text cleaning for extracted PDF and Markdown text.
 *
 * `cleanText` is pure, total and idempotent. The page-artifact and line-join
 * helpers are only applied to PDF-derived text, where running headers, page
 * numbers and justified-text hyphenation are layout noise.
 */

// ---------------------------------------------------------------------------
// Character tables
// ---------------------------------------------------------------------------

const LIGATURES: Record<string, string> = {
  '\uFB00': 'ff',
  '\uFB01': 'fi',
  '\uFB02': 'fl',
  '\uFB03': 'ffi',
  '\uFB04': 'ffl',
};

// BOM, C0 controls other than \t and \n, DEL, soft hyphen, zero-width spaces.
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\uFEFF\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u00AD\u200B-\u200D]/g;

// Unicode minus, figure/en/em dash, hyphen and non-breaking hyphen.
const DASHES = /[\u2212\u2010\u2011\u2012\u2013\u2014\u2015]/g;
const DOUBLE_QUOTES = /[\u201C\u201D\u201E\u201F]/g;
const SINGLE_QUOTES = /[\u2018\u2019\u201A\u201B]/g;

/**
 * Words that PDF text layers split right after a ligature glyph. Each entry is
 * the text before and after the break. Only splits whose first half is not a
 * word on its own are listed, so legitimate two-word phrases survive.
 */
const LIGATURE_SPLITS: ReadonlyArray<readonly [string, string]> = [
  ['Diffi', 'culty'],
  ['diffi', 'cult'],
  ['fi', 're'],
  ['fi', 'res'],
  ['fi', 'rst'],
  ['fi', 'nal'],
  ['fi', 'ght'],
  ['fi', 'ghts'],
  ['fi', 'ghting'],
  ['fi', 'eld'],
  ['fi', 'erce'],
  ['fi', 'gure'],
  ['fl', 'ail'],
  ['fl', 'ame'],
  ['fl', 'ames'],
  ['fl', 'ying'],
  ['fl', 'esh'],
  ['fl', 'ee'],
  ['fl', 'ees'],
  ['fl', 'oor'],
  ['ef', 'fect'],
  ['ef', 'fects'],
  ['suf', 'fer'],
  ['suf', 'fers'],
];

const LIGATURE_SPLIT_PATTERNS = LIGATURE_SPLITS.map(
  ([head, tail]) => new RegExp(`\\b(${head})[^\\S\\n]+(${tail})\\b`, 'gi'),
);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalize raw extracted text.
 *
 * Order: control characters and line endings, ligature code points, dashes
 * and quotes, ligature-split repair, whitespace collapse.
 */
export function cleanText(text: string): string {
  let result = text.replace(/\r\n?/g, '\n').replace(CONTROL_CHARS, '');

  result = result.replace(/[\uFB00-\uFB04]/g, (ch) => LIGATURES[ch] ?? ch);
  result = result
    .replace(DASHES, '-')
    .replace(DOUBLE_QUOTES, '"')
    .replace(SINGLE_QUOTES, "'");

  for (const pattern of LIGATURE_SPLIT_PATTERNS) {
    result = result.replace(pattern, '$1$2');
  }

  return normalizeWhitespace(result);
}

/**
 * Collapse in-line whitespace runs, trim line ends and limit blank lines to one.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/[^\S\n]+/g, ' ')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n');
}

const PAGE_NUMBER_PATTERNS = [
  /^\d+$/,
  /^page\s+\d+$/i,
  /^\d+\s+of\s+\d+$/i,
];

/**
 * True for a standalone page number or a configured running header.
 */
export function isPageArtifact(line: string, runningHeaders: readonly string[] = []): boolean {
  const stripped = line.trim();
  if (!stripped) return false;
  if (PAGE_NUMBER_PATTERNS.some((p) => p.test(stripped))) return true;
  const upper = stripped.toUpperCase();
  return runningHeaders.some((header) => header.toUpperCase() === upper);
}

/**
 * Drop page-number and running-header lines from PDF text.
 */
export function stripPageArtifacts(text: string, runningHeaders: readonly string[] = []): string {
  return text
    .split('\n')
    .filter((line) => !isPageArtifact(line, runningHeaders))
    .join('\n');
}

const DEDUPLICATE_WINDOW = 100;

/**
 * Cut a page's text where it starts over. Some PDF text layers carry a
 * two-column page twice; a window of the first half found again in the
 * second half marks where the copy begins. Text shorter than two windows is
 * returned as is.
 */
export function deduplicateText(text: string, windowSize = DEDUPLICATE_WINDOW): string {
  if (text.length < windowSize * 2) return text;

  const mid = Math.floor(text.length / 2);
  const firstHalf = text.slice(0, mid);
  const secondHalf = text.slice(mid);
  const step = Math.max(1, Math.floor(windowSize / 2));

  for (let i = 0; i < firstHalf.length - windowSize; i += step) {
    const at = secondHalf.indexOf(firstHalf.slice(i, i + windowSize));
    if (at !== -1) return text.slice(0, mid + at).trim();
  }
  return text;
}

export interface JoinOptions {
  /** Repair line-break hyphenation from justified PDF text. */
  pdf?: boolean;
}

/**
 * Join wrapped physical lines into one single-spaced string.
 *
 * For PDF text a line ending in `letter-` followed by a lowercase start is a
 * line-break hyphen and is removed; before an uppercase start the hyphen is
 * kept and the halves are joined directly ("DECAY-" + "BRINGER").
 */
export function joinWrappedLines(lines: readonly string[], options: JoinOptions = {}): string {
  let result = '';

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (!result) {
      result = line;
    } else if (options.pdf && /[A-Za-z]-$/.test(result)) {
      result = /^[a-z]/.test(line) ? result.slice(0, -1) + line : result + line;
    } else {
      result = `${result} ${line}`;
    }
  }

  return result.replace(/\s+/g, ' ').trim();
}
