/**
 * Line-level patterns shared by the block extractors and the block parser.
 * Every predicate takes a line with markup already removed.
 */

import { isKnownAdversaryType } from '../../model/vocabulary.js';

/**
 * Remove Markdown framing from one line: blockquote markers, heading hashes
 * and emphasis asterisks.
 */
export function stripMarkup(line: string): string {
  return line
    .replace(/^\s*(?:>\s*)+/, '')
    .replace(/^\s*#+(?:\s+|$)/, '')
    .replace(/\*+/g, '')
    .trim();
}

const TIER_PREFIX = /^Tier\s+\d+\s+(.+)$/i;
const TITLE_TYPE = /^[A-Z][\w'-]*(?:\s+[A-Z][\w'-]*){0,2}(?:\s*\([^)]*\))?$/;

/**
 * `Tier 1 Minion`, `Tier 2 Horde (3/HP)`, `Tier 3 Undead Leader` on an
 * unmarked line. The type must be a known type or a short run of capitalized
 * words so that prose starting with "Tier 2" is not taken for a tier line.
 */
export function isTierLine(line: string): boolean {
  const match = TIER_PREFIX.exec(line.trim());
  if (!match) return false;
  const rest = match[1].trim();
  return isKnownAdversaryType(rest) || TITLE_TYPE.test(rest);
}

const EMPHASIZED_TIER = /^\s*\*+\s*Tier\s+\d+\s+[^*\s][^*]*\*+\s*$/i;

/**
 * A Markdown tier line set in emphasis: `***Tier 2 Bruiser/Leader***`,
 * `*Tier 1 Minion, Undead*`. The emphasis delimits the line, so the type is
 * free text. Takes the line with its markup.
 */
export function isEmphasizedTierLine(raw: string): boolean {
  return EMPHASIZED_TIER.test(raw);
}

export function isFeaturesHeader(line: string): boolean {
  return /^features:?$/i.test(line.trim());
}

export function isRuleLine(line: string): boolean {
  return /^\s*-{3,}\s*$/.test(line);
}

export const SOURCE_LINE = /^Source:\s*(.+?)(?:,\s*p\.\s*(\d+))?\s*$/i;

export function isSourceLine(line: string): boolean {
  return SOURCE_LINE.test(line.trim());
}

const SECTION_WORDS = new Set([
  'FEATURES',
  'FEATURE',
  'ACTIONS',
  'ACTION',
  'REACTIONS',
  'REACTION',
  'PASSIVES',
  'PASSIVE',
  'EVOLUTION',
  'EXPERIENCE',
  'MOTIVES & TACTICS',
]);

/**
 * An ALL-CAPS name line such as `XERO, CASTLE KILLER` or `DRAGON LICH:`.
 */
export function isAllCapsName(line: string): boolean {
  const text = line.trim();
  if (text.length <= 3) return false;
  if (!/^[A-Z][A-Z0-9\s,:'&.()-]*$/.test(text)) return false;
  if (!/[A-Z]{2}/.test(text)) return false;
  return !SECTION_WORDS.has(text.replace(/:$/, ''));
}

export type LineKind =
  | 'blank'
  | 'tier'
  | 'features'
  | 'motives'
  | 'stats'
  | 'attack'
  | 'experience'
  | 'source'
  | 'rule'
  | 'text';

/**
 * Classify a markup-free line of a stat block.
 */
export function classifyLine(line: string): LineKind {
  const text = line.trim();
  if (!text) return 'blank';
  if (isRuleLine(text)) return 'rule';
  if (isTierLine(text)) return 'tier';
  if (isFeaturesHeader(text)) return 'features';
  if (/^(?:motives\s*(?:&|and)\s*tactics|impulses)\s*:/i.test(text)) return 'motives';
  if (isSourceLine(text)) return 'source';
  if (/^(?:ATK|Attack)\s*:/i.test(text)) return 'attack';
  if (/^experiences?\s*:/i.test(text)) return 'experience';
  if (/^(?:difficulty|thresholds?|hp|stress)\s*:/i.test(text)) return 'stats';
  return 'text';
}
