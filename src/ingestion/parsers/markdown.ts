/**
 * Markdown block segmentation.
 *
 * Two dialects are recognized. Each is a pure strategy that sniffs the text
 * and splits it into blocks, or returns null when the text is not in that
 * dialect. Strategies are tried in a fixed order.
 *
 * - standard: `# NAME`, `***Tier N Type***`, blockquote stat lines,
 *   `## FEATURES`, `***Name - Type:***` feature headers
 * - community: `## NAME`, `*Tier N Type*`, `**Difficulty: N | ...**`,
 *   `***FEATURES***`, `*Name - Type*:` feature headers
 *
 * Documents with several `##` entries are split on those headings first, and
 * each entry keeps its own dialect.
 */

import type { MarkdownDialect, RawBlock } from '../../types/source.js';
import { validateYaml } from '../../utils/yaml.js';
import { EmptySourceError, UnsupportedDialectError } from '../errors.js';
import { isEmphasizedTierLine, isTierLine, stripMarkup } from './patterns.js';

export interface SegmentationStrategy {
  dialect: MarkdownDialect;
  /** Cheap check for the dialect's markers. */
  sniff: (text: string) => boolean;
  /** Heading lines that open a new block. */
  isBlockHeading: (line: string) => boolean;
}

const STANDARD: SegmentationStrategy = {
  dialect: 'standard',
  sniff: (text) =>
    /^\s*\*{3}Tier\s+\d+/im.test(text) ||
    /^>\s*\*{2}(?:Difficulty|HP|ATK)\s*:\*{2}/im.test(text) ||
    /^##\s+FEATURES\s*$/im.test(text),
  isBlockHeading: (line) => /^#(?:\s|$)/.test(line),
};

const COMMUNITY: SegmentationStrategy = {
  dialect: 'community',
  sniff: (text) =>
    /^\s*\*Tier\s+\d+[^*]*\*\s*$/im.test(text) ||
    /\*\*Difficulty:\s*\d+/i.test(text),
  isBlockHeading: (line) => /^##(?:\s|$)/.test(line) && !/^##\s+FEATURES\s*$/i.test(line),
};

export const SEGMENTATION_STRATEGIES: readonly SegmentationStrategy[] = [STANDARD, COMMUNITY];

/**
 * Remove a leading YAML frontmatter block, if it parses.
 */
export function stripFrontmatter(text: string): string {
  const match = /^---\s*\n([\s\S]*?)\n---\s*(?:\n|$)([\s\S]*)$/.exec(text);
  if (!match) return text;
  return validateYaml(match[1]).valid ? match[2] : text;
}

function hasTierLine(line: string): boolean {
  return isEmphasizedTierLine(line) || isTierLine(stripMarkup(line));
}

/**
 * Split text at the strategy's block headings. Text before the first heading
 * becomes a block only when it contains a Tier line.
 */
export function splitOnHeadings(text: string, strategy: SegmentationStrategy): string[] {
  const chunks: string[][] = [[]];
  let inFence = false;

  for (const line of text.split('\n')) {
    if (/^\s*(```|~~~)/.test(line)) inFence = !inFence;
    if (!inFence && strategy.isBlockHeading(line)) {
      chunks.push([line]);
    } else {
      chunks[chunks.length - 1].push(line);
    }
  }

  const [preamble, ...blocks] = chunks;
  const result = blocks.map((lines) => lines.join('\n').trim());
  if (preamble.some(hasTierLine)) {
    result.unshift(preamble.join('\n').trim());
  }
  return result;
}

/**
 * Run one strategy: null when it does not recognize the text.
 */
export function applyStrategy(text: string, strategy: SegmentationStrategy): RawBlock[] | null {
  if (!strategy.sniff(text)) return null;
  const chunks = splitOnHeadings(text, strategy);
  if (chunks.length === 0) return null;
  return chunks.map((chunk, index) => ({
    text: chunk,
    origin: 'markdown',
    dialect: strategy.dialect,
    index,
  }));
}

const ENTRY_HEADING = /^##\s+[A-Z][A-Z0-9\s,:'&()-]*$/;

function isEntrySection(section: string): boolean {
  const [heading = '', ...body] = section.split('\n');
  if (!/^##\s/.test(heading)) return false;
  return ENTRY_HEADING.test(heading.trim()) || body.some(hasTierLine);
}

/**
 * Split a document that lists adversaries under `##` headings. A heading is
 * an entry when it is in capitals or its section holds a tier line; with
 * fewer than two entries, or no dialect markers at all, this returns null.
 */
export function splitEntrySections(text: string): RawBlock[] | null {
  if (!SEGMENTATION_STRATEGIES.some((strategy) => strategy.sniff(text))) return null;

  const sections = splitOnHeadings(text, COMMUNITY);
  if (sections.filter(isEntrySection).length < 2) return null;

  return sections.map(
    (section, index): RawBlock => ({
      text: section,
      origin: 'markdown',
      dialect: STANDARD.sniff(section) ? 'standard' : 'community',
      index,
    }),
  );
}

/**
 * Segment a multi-entry Markdown document into raw blocks.
 *
 * @throws EmptySourceError when the text is empty or a dialect is recognized
 *   but no block can be split out
 * @throws UnsupportedDialectError when no dialect is recognized
 */
export function segmentMarkdownBlocks(text: string, file?: string): RawBlock[] {
  const content = stripFrontmatter(text);
  if (!content.trim()) throw new EmptySourceError(file);

  const entries = splitEntrySections(content);
  if (entries) return entries;

  let recognized = false;
  for (const strategy of SEGMENTATION_STRATEGIES) {
    if (strategy.sniff(content)) recognized = true;
    const blocks = applyStrategy(content, strategy);
    if (blocks) return blocks;
  }

  if (recognized) throw new EmptySourceError(file);
  throw new UnsupportedDialectError(file);
}
