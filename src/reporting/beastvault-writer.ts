/**
 * BeastVault JSON export.
 *
 * BeastVault library files are a JSON array of sparse entries with short
 * lowercase keys. Environments (no HP and no Stress) carry `impulses` instead
 * of `motives` and no combat fields. `xp` is always present on adversaries,
 * as an empty string when there is no experience.
 */

import { z } from 'zod';

import type { Adversary, Feature } from '../types/adversary.js';
import { formatDamage, isAttackEmpty } from '../model/attack.js';
import { formatExperience, formatThresholds, isEnvironment, parseExperience } from '../model/adversary.js';
import { writeFileAtomic } from '../utils/fs.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const BeastVaultFeatureSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  desc: z.string().optional(),
});

export const BeastVaultEntrySchema = z.object({
  name: z.string().optional(),
  tier: z.number().int().optional(),
  type: z.string().optional(),
  desc: z.string().optional(),
  difficulty: z.number().int().optional(),
  motives: z.string().optional(),
  impulses: z.string().optional(),
  hp: z.number().int().optional(),
  stress: z.number().int().optional(),
  attack: z.number().int().optional(),
  weapon: z.string().optional(),
  range: z.string().optional(),
  damage: z.string().optional(),
  thresholds: z.string().optional(),
  xp: z.string().optional(),
  source: z.string().optional(),
  features: z.array(BeastVaultFeatureSchema).optional(),
});

export const BeastVaultLibrarySchema = z.array(BeastVaultEntrySchema.strict());

export type BeastVaultFeature = z.infer<typeof BeastVaultFeatureSchema>;
export type BeastVaultEntry = z.infer<typeof BeastVaultEntrySchema>;

// ---------------------------------------------------------------------------
// Source tags
// ---------------------------------------------------------------------------

export const HOMEBREW_TAG = 'homebrew';

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Tag for a source display name: the configured tag, else a slug of the
 * name, else "homebrew" when the record has no source.
 */
export function resolveSourceTag(sourceName: string | undefined, tags: Readonly<Record<string, string>> = {}): string {
  if (!sourceName) return HOMEBREW_TAG;
  return tags[sourceName] ?? (slugify(sourceName) || HOMEBREW_TAG);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatFeature(feature: Feature): BeastVaultFeature {
  const entry: BeastVaultFeature = {};
  if (feature.name) entry.name = feature.name;
  if (feature.featureType) entry.type = feature.featureType;
  if (feature.description) entry.desc = feature.description;
  return entry;
}

export interface BeastVaultOptions {
  /** Tag applied to every entry, overriding per-record resolution. */
  sourceTag?: string;
  /** Source display name to tag. */
  sourceTags?: Readonly<Record<string, string>>;
}

export function formatBeastVaultEntry(record: Adversary, options: BeastVaultOptions = {}): BeastVaultEntry {
  const entry: BeastVaultEntry = {};
  const environment = isEnvironment(record);

  if (record.name) entry.name = record.name.toUpperCase();
  if (record.tier !== undefined) entry.tier = record.tier;
  if (record.adversaryType) entry.type = record.adversaryType;
  if (record.description) entry.desc = record.description;
  if (record.difficulty !== undefined) entry.difficulty = record.difficulty;

  if (record.motivesTactics) {
    if (environment) entry.impulses = record.motivesTactics;
    else entry.motives = record.motivesTactics;
  }

  if (!environment) {
    if (record.hp !== undefined) entry.hp = record.hp;
    if (record.stress !== undefined) entry.stress = record.stress;

    const attack = record.attack;
    if (attack && !isAttackEmpty(attack)) {
      if (attack.modifier !== undefined) entry.attack = attack.modifier;
      if (attack.weaponName) entry.weapon = attack.weaponName;
      if (attack.range) entry.range = attack.range;
      if (attack.damage) entry.damage = formatDamage(attack.damage);
    }

    const thresholds = formatThresholds(record.thresholdMinor, record.thresholdMajor);
    if (thresholds) entry.thresholds = thresholds;

    entry.xp = record.experience ? formatExperience(parseExperience(record.experience)) : '';
  }

  entry.source = options.sourceTag ?? resolveSourceTag(record.sourceName, options.sourceTags);

  if (record.features.length > 0) {
    entry.features = record.features.map(formatFeature);
  }

  return entry;
}

/**
 * The full library document: a JSON array with two-space indentation and a
 * trailing newline. Entries are checked against the library schema first.
 */
export function renderBeastVault(records: readonly Adversary[], options: BeastVaultOptions = {}): string {
  const entries = records.map((record) => formatBeastVaultEntry(record, options));
  BeastVaultLibrarySchema.parse(entries);
  return JSON.stringify(entries, null, 2) + '\n';
}

export async function writeBeastVault(
  records: readonly Adversary[],
  path: string,
  options: BeastVaultOptions = {},
): Promise<number> {
  await writeFileAtomic(path, renderBeastVault(records, options));
  return records.length;
}
