/**
 * Field-level parsing and formatting for the canonical adversary record.
 */

import type { Adversary, ThresholdValue } from '../types/adversary.js';
import { isEnvironmentType } from './vocabulary.js';

export function createAdversary(name: string, fields: Partial<Omit<Adversary, 'name'>> = {}): Adversary {
  return { name, features: [], ...fields };
}

// ---------------------------------------------------------------------------
// Tier line
// ---------------------------------------------------------------------------

export interface TierLine {
  tier: number;
  adversaryType?: string;
}

const TIER_LINE = /^Tier\s+(\d+)\b\s*(.*)$/i;

/**
 * Parse `Tier 2 Horde (3/HP)`. The type keeps any parenthetical verbatim.
 */
export function parseTierLine(text: string): TierLine | undefined {
  const match = TIER_LINE.exec(text.trim());
  if (!match) return undefined;
  const [, tier = '', rest = ''] = match;
  return {
    tier: Number.parseInt(tier, 10),
    adversaryType: rest.trim() || undefined,
  };
}

export function formatTierLine(tier: number | undefined, adversaryType: string | undefined): string {
  const parts: string[] = [];
  if (tier !== undefined) parts.push(`Tier ${tier}`);
  if (adversaryType) parts.push(adversaryType);
  return parts.join(' ');
}

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

export interface Thresholds {
  minor?: ThresholdValue;
  major?: ThresholdValue;
}

const THRESHOLD_PAIR = /^(\d+|none)?\s*\/\s*(\d+|none)?$/i;

function toThreshold(value: string | undefined): ThresholdValue | undefined {
  if (!value) return undefined;
  return /^none$/i.test(value) ? 'None' : Number.parseInt(value, 10);
}

/**
 * Parse `None`, `8/15`, `8/` or `/15`. Anything else yields no thresholds.
 */
export function parseThresholds(text: string): Thresholds {
  const trimmed = text.trim();
  if (/^none$/i.test(trimmed)) {
    return { minor: 'None', major: 'None' };
  }
  const match = THRESHOLD_PAIR.exec(trimmed);
  if (!match) return {};
  return { minor: toThreshold(match[1]), major: toThreshold(match[2]) };
}

/**
 * Render thresholds as `minor/major`, `None`, or undefined when both are absent.
 */
export function formatThresholds(minor: ThresholdValue | undefined, major: ThresholdValue | undefined): string | undefined {
  if (minor === undefined && major === undefined) return undefined;
  if (minor === 'None' && major === 'None') return 'None';
  return `${minor ?? ''}/${major ?? ''}`;
}

// ---------------------------------------------------------------------------
// Experience
// ---------------------------------------------------------------------------

export interface ExperienceEntry {
  skill: string;
  modifier?: number;
}

/**
 * Split `Tracker +2, Stealth +1` into entries. Entries without a trailing
 * modifier keep their text as the skill.
 */
export function parseExperience(text: string): ExperienceEntry[] {
  return text
    .split(',')
    .map((part) => part.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .map((part) => {
      const match = /^(.*?)\s*([+-]\s*\d+)$/.exec(part);
      if (!match || !match[1]) return { skill: part };
      return { skill: match[1], modifier: Number.parseInt(match[2].replace(/\s+/g, ''), 10) };
    });
}

export function formatExperience(entries: readonly ExperienceEntry[]): string {
  return entries
    .map((e) => (e.modifier === undefined ? e.skill : `${e.skill} ${e.modifier >= 0 ? '+' : ''}${e.modifier}`))
    .join(', ');
}

// ---------------------------------------------------------------------------
// Record helpers
// ---------------------------------------------------------------------------

/**
 * Environment stat blocks carry no combat stats. A record counts as one when
 * its type names an environment, or when both HP and Stress are absent.
 */
export function isEnvironment(record: Adversary): boolean {
  return isEnvironmentType(record.adversaryType) || (record.hp === undefined && record.stress === undefined);
}

/**
 * File name stem for a record: punctuation removed, spaces collapsed.
 */
export function safeFilename(name: string): string {
  const safe = name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
  return safe || 'unknown';
}
