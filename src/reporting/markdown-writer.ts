/**
 * Standardized Markdown output for adversary records.
 *
 * Grammar, one section per group with a blank line between groups:
 *
 *   # NAME
 *
 *   ***Tier N Type***
 *   *description*
 *   **Motives & Tactics:** text
 *
 *   > **Difficulty:** N | **Thresholds:** a/b | **HP:** N | **Stress:** N
 *   > **ATK:** +N | **Weapon:** Range | damage
 *   > **Experience:** text
 *
 *   ## FEATURES
 *
 *   ***Name - Type:*** description
 *
 *   ---
 *
 *   *Source: name, p. N*
 *
 * The tier, description, stat and ATK lines end in two spaces (a Markdown
 * hard break). Lines and stat fields with no backing value are omitted.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import type { Adversary, Feature } from '../types/adversary.js';
import { formatAttack, isAttackEmpty } from '../model/attack.js';
import { formatThresholds, formatTierLine, safeFilename } from '../model/adversary.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('markdown-writer');

const HARD_BREAK = '  ';

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function renderHeader(record: Adversary): string[] {
  const lines: string[] = [];
  const tierLine = formatTierLine(record.tier, record.adversaryType);
  if (tierLine) lines.push(`***${tierLine}***${HARD_BREAK}`);
  if (record.description) lines.push(`*${record.description.trim()}*${HARD_BREAK}`);
  if (record.motivesTactics) lines.push(`**Motives & Tactics:** ${record.motivesTactics}`);
  return lines;
}

/**
 * The stat fields present on a record, in fixed order.
 */
export function renderStatsLine(record: Adversary): string | undefined {
  const parts: string[] = [];
  if (record.difficulty !== undefined) parts.push(`**Difficulty:** ${record.difficulty}`);
  const thresholds = formatThresholds(record.thresholdMinor, record.thresholdMajor);
  if (thresholds !== undefined) parts.push(`**Thresholds:** ${thresholds}`);
  if (record.hp !== undefined) parts.push(`**HP:** ${record.hp}`);
  if (record.stress !== undefined) parts.push(`**Stress:** ${record.stress}`);
  return parts.length > 0 ? parts.join(' | ') : undefined;
}

function renderStatBlock(record: Adversary): string[] {
  const lines: string[] = [];
  const stats = renderStatsLine(record);
  if (stats) lines.push(`> ${stats}${HARD_BREAK}`);
  if (record.attack && !isAttackEmpty(record.attack)) {
    lines.push(`> **ATK:** ${formatAttack(record.attack, { emphasis: true })}${HARD_BREAK}`);
  }
  if (record.experience) lines.push(`> **Experience:** ${record.experience}`);
  return lines;
}

export function renderFeature(feature: Feature): string {
  return `***${feature.name} - ${feature.featureType}:*** ${feature.description}`.trimEnd();
}

function renderFeatures(record: Adversary): string[] {
  if (record.features.length === 0) return [];
  return ['## FEATURES', ...record.features.flatMap((f) => ['', renderFeature(f)])];
}

export function renderSourceLine(record: Adversary): string | undefined {
  if (!record.sourceName) return undefined;
  return record.sourcePage !== undefined
    ? `*Source: ${record.sourceName}, p. ${record.sourcePage}*`
    : `*Source: ${record.sourceName}*`;
}

function renderSource(record: Adversary): string[] {
  const source = renderSourceLine(record);
  return source ? ['---', '', source] : [];
}

/**
 * Render one record as standardized Markdown, ending in a single newline.
 */
export function renderMarkdown(record: Adversary): string {
  const sections: string[][] = [
    [`# ${record.name.toUpperCase()}`],
    renderHeader(record),
    renderStatBlock(record),
    renderFeatures(record),
    renderSource(record),
  ];

  return (
    sections
      .filter((lines) => lines.length > 0)
      .map((lines) => lines.join('\n'))
      .join('\n\n') + '\n'
  );
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

export interface WriteOptions {
  overwrite?: boolean;
}

export interface WrittenFile {
  name: string;
  path: string;
}

export type WriteConflict = WrittenFile;

export interface WriteResult {
  written: WrittenFile[];
  /** Destinations skipped because they already existed. */
  conflicts: WriteConflict[];
}

/**
 * Write one `<name>.md` file per record. Existing files are skipped unless
 * `overwrite` is set; two records mapping to the same file in one batch
 * always conflict.
 */
export async function writeAdversaryFiles(
  records: readonly Adversary[],
  outputDir: string,
  options: WriteOptions = {},
): Promise<WriteResult> {
  const result: WriteResult = { written: [], conflicts: [] };
  const claimed = new Set<string>();

  for (const record of records) {
    const path = join(outputDir, `${safeFilename(record.name)}.md`);
    const key = path.toLowerCase();

    if (claimed.has(key) || (!options.overwrite && existsSync(path))) {
      logger.warn(`Skipping existing file: ${path}`);
      result.conflicts.push({ name: record.name, path });
      continue;
    }

    claimed.add(key);
    await writeFileAtomic(path, renderMarkdown(record));
    result.written.push({ name: record.name, path });
  }

  return result;
}
