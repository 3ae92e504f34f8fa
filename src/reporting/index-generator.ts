/**
 * Index documents for a converted collection.
 */

import type { Adversary } from '../types/adversary.js';
import { formatThresholds, safeFilename } from '../model/adversary.js';
import { baseType } from '../model/vocabulary.js';

export const UNKNOWN_CATEGORY = 'Unknown';

export interface IndexOptions {
  title?: string;
  /** Adversary type (full or first word) to category name. */
  categories?: Readonly<Record<string, string>>;
}

function byName(a: Adversary, b: Adversary): number {
  return a.name.toUpperCase().localeCompare(b.name.toUpperCase(), 'en');
}

export function categoryOf(record: Adversary, categories: Readonly<Record<string, string>> = {}): string {
  const type = record.adversaryType?.trim();
  if (!type) return UNKNOWN_CATEGORY;
  const base = baseType(type);
  return categories[type] ?? categories[base] ?? (base || UNKNOWN_CATEGORY);
}

/**
 * Listing grouped by category. Categories are alphabetical with Unknown
 * last; names are alphabetical within a category. Each entry links to the
 * record's Markdown file.
 */
export function buildIndex(records: readonly Adversary[], options: IndexOptions = {}): string {
  const groups = new Map<string, Adversary[]>();
  for (const record of records) {
    const category = categoryOf(record, options.categories);
    const group = groups.get(category) ?? [];
    group.push(record);
    groups.set(category, group);
  }

  const categories = [...groups.keys()].sort((a, b) => {
    if (a === UNKNOWN_CATEGORY) return 1;
    if (b === UNKNOWN_CATEGORY) return -1;
    return a.localeCompare(b, 'en');
  });

  const lines = [`# ${options.title ?? 'Adversary Index'}`, ''];

  for (const category of categories) {
    lines.push(`## ${category}`, '');
    for (const record of [...(groups.get(category) ?? [])].sort(byName)) {
      const link = encodeURIComponent(`${safeFilename(record.name)}.md`);
      const tier = record.tier !== undefined ? `Tier ${record.tier}` : 'Tier ?';
      lines.push(`- [${record.name.toUpperCase()}](${link}) (${tier})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Per-tier quick-reference tables with a count summary.
 */
export function buildTierIndex(records: readonly Adversary[], title = 'Adversaries Master Index'): string {
  const byTier = new Map<number, Adversary[]>();
  for (const record of records) {
    const tier = record.tier ?? 0;
    byTier.set(tier, [...(byTier.get(tier) ?? []), record]);
  }

  const tiers = [...byTier.keys()].sort((a, b) => a - b);
  const tierName = (tier: number) => (tier > 0 ? `Tier ${tier}` : 'Unknown Tier');
  const cell = (value: number | string | undefined) => (value === undefined || value === '' ? '-' : String(value));

  const lines = [`# ${title}`, ''];

  for (const tier of tiers) {
    lines.push(`## ${tierName(tier)}`, '');
    lines.push('| Name | Type | Difficulty | Thresholds | HP | Stress |');
    lines.push('|------|------|------------|------------|----|--------|');
    for (const record of [...(byTier.get(tier) ?? [])].sort(byName)) {
      lines.push(
        `| ${record.name.toUpperCase()} | ${cell(record.adversaryType)} | ${cell(record.difficulty)} | ${cell(
          formatThresholds(record.thresholdMinor, record.thresholdMajor),
        )} | ${cell(record.hp)} | ${cell(record.stress)} |`,
      );
    }
    lines.push('');
  }

  lines.push('## Summary', '', `**Total adversaries:** ${records.length}`);
  for (const tier of tiers) {
    lines.push(`- ${tierName(tier)}: ${byTier.get(tier)?.length ?? 0}`);
  }

  return lines.join('\n') + '\n';
}
