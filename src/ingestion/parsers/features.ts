/**
 * Feature-section parsing.
 *
 * Header conventions are pure strategies from section lines to features, or
 * null when none of their headers occur. The type keyword in every header
 * must be followed by a colon; without that anchor a short match swallows
 * the first capitalized word of the description.
 */

import type { BlockOrigin } from '../../types/source.js';
import type { Feature } from '../../types/adversary.js';
import { FEATURE_TYPES } from '../../model/vocabulary.js';
import { joinWrappedLines } from '../text-cleaner.js';
import { isRuleLine, isSourceLine, stripMarkup } from './patterns.js';

export type FeatureStrategy = (lines: readonly string[], origin: BlockOrigin) => Feature[] | null;

// ---------------------------------------------------------------------------
// Emphasis headers
// ---------------------------------------------------------------------------

/**
 * Feature types are open ("Fear Action", "Evolution"), but carry no hyphen or
 * colon. The lazy name then extends past hyphens inside it
 * ("Multi-Attack - Action:") until a hyphen-free type reaches the colon.
 */
const TYPE = String.raw`([^*:\s-](?:[^*:-]*[^*:\s-])?)`;

/** Header forms, most specific first. */
const HEADER_PATTERNS: readonly RegExp[] = [
  // ***Name - Type:*** Description
  new RegExp(String.raw`^\*{3}([^*]+?)\s*-\s*${TYPE}:\*{3}\s*(.*)$`),
  // ***Name - Type***: Description
  new RegExp(String.raw`^\*{3}([^*]+?)\s*-\s*${TYPE}\*{3}\s*:\s*(.*)$`),
  // **Name - Type:** Description
  new RegExp(String.raw`^\*{2}([^*]+?)\s*-\s*${TYPE}:\*{2}\s*(.*)$`),
  // *Name - Type*: Description
  new RegExp(String.raw`^\*([^*]+?)\s*-\s*${TYPE}\*:\s*(.*)$`),
];

interface FeatureHeader {
  name: string;
  featureType: string;
  rest: string;
}

export function matchFeatureHeader(line: string): FeatureHeader | undefined {
  const text = line.trim();
  for (const pattern of HEADER_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return { name: match[1].trim(), featureType: match[2].trim(), rest: match[3].trim() };
    }
  }
  return undefined;
}

function endsSection(line: string): boolean {
  const plain = stripMarkup(line);
  return isRuleLine(line) || /^#/.test(line.trim()) || isSourceLine(plain);
}

/**
 * Features introduced by emphasized headers. Continuation lines are joined
 * with single spaces up to the next header, a rule, a heading or a Source
 * line.
 */
export const parseEmphasisFeatures: FeatureStrategy = (lines, origin) => {
  const features: Feature[] = [];
  let current: { header: FeatureHeader; body: string[] } | undefined;

  const flush = () => {
    if (!current) return;
    features.push({
      name: current.header.name,
      featureType: current.header.featureType,
      description: joinWrappedLines([current.header.rest, ...current.body], { pdf: origin === 'pdf' }),
    });
    current = undefined;
  };

  for (const line of lines) {
    const header = matchFeatureHeader(line);
    if (header) {
      flush();
      current = { header, body: [] };
    } else if (endsSection(line)) {
      flush();
      break;
    } else if (current) {
      current.body.push(line);
    }
  }
  flush();

  return features.length > 0 ? features : null;
};

// ---------------------------------------------------------------------------
// Plain-text headers (PDF)
// ---------------------------------------------------------------------------

const ANCHOR = new RegExp(`\\s*-\\s*(${FEATURE_TYPES.join('|')})\\s*:`, 'gi');

const CONNECTORS = new Set(['of', 'the', 'and', 'a', 'an', 'in', 'on', 'to', 'for', 'with', 'from', 'at', 'or']);

function isNameWord(word: string): boolean {
  return /^[A-Z"'(]/.test(word) && !/[.!?:;,]$/.test(word);
}

/**
 * Split the text before an anchor into the previous description and the
 * feature name: the trailing run of capitalized words (with connectors such
 * as "of" between them).
 */
export function splitTrailingName(prefix: string): { before: string; name: string } {
  const words = prefix.trim().split(/\s+/).filter(Boolean);
  let start = words.length;

  for (let i = words.length - 1; i >= 0; i--) {
    const word = words[i];
    if (isNameWord(word)) {
      start = i;
    } else if (!CONNECTORS.has(word.toLowerCase()) || i === 0) {
      break;
    }
  }

  return {
    before: words.slice(0, start).join(' '),
    name: words.slice(start).join(' '),
  };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Features written as `Name - Type: description` in running text. The
 * section is collapsed to one line and scanned once for type anchors.
 */
export const parsePlainFeatures: FeatureStrategy = (lines, origin) => {
  const region: string[] = [];
  for (const line of lines) {
    if (endsSection(line)) break;
    region.push(stripMarkup(line));
  }

  const text = joinWrappedLines(region, { pdf: origin === 'pdf' });
  const anchors = [...text.matchAll(ANCHOR)];
  if (anchors.length === 0) return null;

  const features: Feature[] = [];
  let cursor = 0;
  let pending: { name: string; featureType: string } | undefined;

  for (const anchor of anchors) {
    const index = anchor.index ?? 0;
    const prefix = text.slice(cursor, index);
    // The first name owns everything before its anchor.
    const { before, name } = pending ? splitTrailingName(prefix) : { before: '', name: prefix.trim() };

    if (pending) {
      features.push({ ...pending, description: before.trim() });
    }
    pending = { name, featureType: capitalize(anchor[1]) };
    cursor = index + anchor[0].length;
  }

  if (pending) {
    features.push({ ...pending, description: text.slice(cursor).trim() });
  }

  return features;
};

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Parse a feature section, trying strategies in the order suited to the
 * block's origin. The first strategy that finds anything wins.
 */
export function parseFeatures(lines: readonly string[], origin: BlockOrigin): Feature[] {
  const strategies: FeatureStrategy[] =
    origin === 'pdf' ? [parsePlainFeatures, parseEmphasisFeatures] : [parseEmphasisFeatures, parsePlainFeatures];

  for (const strategy of strategies) {
    const features = strategy(lines, origin);
    if (features) return features;
  }
  return [];
}

/**
 * True when a line opens a feature in either convention.
 */
export function looksLikeFeatureStart(line: string): boolean {
  if (matchFeatureHeader(line)) return true;
  ANCHOR.lastIndex = 0;
  const found = ANCHOR.test(stripMarkup(line));
  ANCHOR.lastIndex = 0;
  return found;
}
